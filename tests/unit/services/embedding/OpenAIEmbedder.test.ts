/**
 * Unit tests for OpenAIEmbedder with an in-process client
 */

import { describe, it, expect, vi } from 'vitest';
import { OpenAIEmbedder, type EmbeddingsClient } from '../../../../src/services/embedding/OpenAIEmbedder.js';
import { EmbeddingUnavailableError } from '../../../../src/lib/errors/IndexErrors.js';

function fakeClient(create: EmbeddingsClient['embeddings']['create']): EmbeddingsClient {
  return { embeddings: { create } };
}

describe('OpenAIEmbedder', () => {
  it('should return the embedding from the API', async () => {
    const create = vi.fn(async () => ({ data: [{ embedding: [0.1, 0.2, 0.3] }] }));
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret', dimensions: 3, client: fakeClient(create) });

    const result = await embedder.embed('hello world');

    expect(result._unsafeUnwrap()).toEqual([0.1, 0.2, 0.3]);
    expect(create).toHaveBeenCalledWith({
      model: 'text-embedding-3-small',
      input: 'hello world',
      dimensions: 3,
    });
  });

  it('should return a zero vector for empty text without calling the API', async () => {
    const create = vi.fn(async () => ({ data: [{ embedding: [1, 1] }] }));
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret', dimensions: 2, client: fakeClient(create) });

    const result = await embedder.embed('   ');

    expect(result._unsafeUnwrap()).toEqual([0, 0]);
    expect(create).not.toHaveBeenCalled();
  });

  it('should map API failures to EmbeddingUnavailableError', async () => {
    const create = vi.fn(async (): Promise<{ data: Array<{ embedding: number[] }> }> => {
      throw new Error('401 Incorrect API key');
    });
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret', dimensions: 2, client: fakeClient(create) });

    const result = await embedder.embed('query');

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(EmbeddingUnavailableError);
    expect(error.message).toBe("Embedder 'openai-text-embedding-3-small-2' unavailable: 401 Incorrect API key");
    expect(error.retryable).toBe(true);
  });

  it('should reject a response without embeddings', async () => {
    const create = vi.fn(async () => ({ data: [] }));
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret', dimensions: 2, client: fakeClient(create) });

    const error = (await embedder.embed('query'))._unsafeUnwrapErr();
    expect(error.message).toBe(
      "Embedder 'openai-text-embedding-3-small-2' unavailable: response contained no embedding"
    );
  });

  it('should reject an embedding of the wrong length', async () => {
    const create = vi.fn(async () => ({ data: [{ embedding: [1, 2, 3] }] }));
    const embedder = new OpenAIEmbedder({
      apiKey: 'test-secret',
      dimensions: 2,
      model: 'custom-model',
      client: fakeClient(create),
    });

    const error = (await embedder.embed('query'))._unsafeUnwrapErr();
    expect(error.message).toBe("Embedder 'openai-custom-model-2' unavailable: expected 2 dimensions, got 3");
  });
});
