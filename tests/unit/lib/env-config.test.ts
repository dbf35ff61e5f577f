/**
 * Unit tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { createIndexConfig, loadIndexConfig, maskApiKey } from '../../../src/lib/env-config.js';
import { ConfigError, InvalidChunkConfigError } from '../../../src/lib/errors/IndexErrors.js';

describe('env-config', () => {
  describe('loadIndexConfig', () => {
    it('should apply defaults when nothing is set', () => {
      const config = loadIndexConfig({})._unsafeUnwrap();

      expect(config).toEqual({
        sourceUrl: undefined,
        chunkSize: 1000,
        chunkOverlap: 200,
        similarityThreshold: 0.12,
        maxContextLength: 600,
        fetchTimeoutMs: 10000,
        dataDir: '.snippetindex',
        indexFile: 'index.json',
        autoScrape: true,
        embedder: { type: 'hashing', dimensions: 1024 },
      });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it('should read and coerce environment variables', () => {
      const config = loadIndexConfig({
        SNIPPET_SOURCE_URL: ' https://example.test/about ',
        SNIPPET_CHUNK_SIZE: '500',
        SNIPPET_CHUNK_OVERLAP: '50',
        SNIPPET_SIMILARITY_THRESHOLD: '0.3',
        SNIPPET_AUTO_SCRAPE: 'false',
        SNIPPET_EMBED_DIMENSIONS: '256',
      })._unsafeUnwrap();

      expect(config.sourceUrl).toBe('https://example.test/about');
      expect(config.chunkSize).toBe(500);
      expect(config.chunkOverlap).toBe(50);
      expect(config.similarityThreshold).toBe(0.3);
      expect(config.autoScrape).toBe(false);
      expect(config.embedder).toEqual({ type: 'hashing', dimensions: 256 });
    });

    it('should treat empty variables as unset', () => {
      const config = loadIndexConfig({ SNIPPET_CHUNK_SIZE: '  ', SNIPPET_SOURCE_URL: '' })._unsafeUnwrap();
      expect(config.chunkSize).toBe(1000);
      expect(config.sourceUrl).toBeUndefined();
    });

    it('should name the variable of a non-numeric value', () => {
      const error = loadIndexConfig({ SNIPPET_CHUNK_SIZE: 'abc' })._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.field).toBe('SNIPPET_CHUNK_SIZE');
    });

    it('should reject an invalid source URL', () => {
      const error = loadIndexConfig({ SNIPPET_SOURCE_URL: 'not a url' })._unsafeUnwrapErr();
      expect(error instanceof ConfigError && error.field).toBe('SNIPPET_SOURCE_URL');
    });

    it('should reject a threshold outside [-1, 1]', () => {
      const error = loadIndexConfig({ SNIPPET_SIMILARITY_THRESHOLD: '1.5' })._unsafeUnwrapErr();
      expect(error instanceof ConfigError && error.field).toBe('SNIPPET_SIMILARITY_THRESHOLD');
    });

    it('should reject overlap not smaller than size', () => {
      const error = loadIndexConfig({
        SNIPPET_CHUNK_SIZE: '100',
        SNIPPET_CHUNK_OVERLAP: '100',
      })._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(InvalidChunkConfigError);
      expect(error.message).toBe(
        'Invalid chunk configuration (size: 100, overlap: 100): overlap must be smaller than size'
      );
    });

    it('should require an API key for the openai embedder', () => {
      const error = loadIndexConfig({ SNIPPET_EMBEDDER: 'openai' })._unsafeUnwrapErr();

      expect(error.message).toBe(
        "Invalid configuration for 'OPENAI_API_KEY': required when SNIPPET_EMBEDDER is \"openai\""
      );
    });

    it('should build the openai embedder configuration', () => {
      const config = loadIndexConfig({
        SNIPPET_EMBEDDER: 'openai',
        SNIPPET_EMBED_DIMENSIONS: '512',
        OPENAI_API_KEY: 'test-secret',
      })._unsafeUnwrap();

      expect(config.embedder).toEqual({
        type: 'openai',
        model: 'text-embedding-3-small',
        dimensions: 512,
        apiKey: 'test-secret',
      });
    });

    it('should reject an unknown embedder', () => {
      const error = loadIndexConfig({ SNIPPET_EMBEDDER: 'word2vec' })._unsafeUnwrapErr();
      expect(error instanceof ConfigError && error.field).toBe('SNIPPET_EMBEDDER');
    });
  });

  describe('createIndexConfig', () => {
    it('should accept typed input', () => {
      const config = createIndexConfig({ chunkSize: 40, chunkOverlap: 5, autoScrape: false })._unsafeUnwrap();
      expect(config.chunkSize).toBe(40);
      expect(config.autoScrape).toBe(false);
    });
  });

  describe('maskApiKey', () => {
    it('should show only the last four characters', () => {
      expect(maskApiKey('test-secret')).toBe('****cret');
      expect(maskApiKey('abc')).toBe('****');
    });
  });
});
