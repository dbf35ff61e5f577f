/**
 * Unit tests for TextChunker
 */

import { describe, it, expect } from 'vitest';
import {
  TextChunker,
  chunkText,
  normalizeText,
  validateChunkConfig,
} from '../../../../src/services/chunker/TextChunker.js';
import { InvalidChunkConfigError } from '../../../../src/lib/errors/IndexErrors.js';

function chunks(text: string, size: number, overlap: number): string[] {
  const result = chunkText(text, size, overlap);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

function squeeze(text: string): string {
  return text.replace(/\s+/g, '');
}

/**
 * Concatenate spans, dropping from every span after the first the characters
 * its window shares with the previous one; whitespace is ignored
 */
function rejoin(text: string, size: number, overlap: number, spans: string[]): string {
  const normalized = normalizeText(text);
  const stride = size - overlap;
  return spans
    .map((span, i) => {
      const shared = i === 0 ? 0 : squeeze(normalized.slice(i * stride, i * stride + overlap)).length;
      return squeeze(span).slice(shared);
    })
    .join('');
}

describe('TextChunker', () => {
  describe('chunkText', () => {
    it('should slide a window with stride size - overlap', () => {
      expect(chunks('ABCDEFGHIJ', 4, 1)).toEqual(['ABCD', 'DEFG', 'GHIJ']);
    });

    it('should emit a shorter final span for the remainder', () => {
      expect(chunks('ABCDEFGH', 4, 1)).toEqual(['ABCD', 'DEFG', 'GH']);
    });

    it('should return one span when the text fits', () => {
      expect(chunks('ABCD', 4, 1)).toEqual(['ABCD']);
      expect(chunks('AB', 4, 1)).toEqual(['AB']);
    });

    it('should produce disjoint spans without overlap', () => {
      expect(chunks('ABCDEF', 2, 0)).toEqual(['AB', 'CD', 'EF']);
    });

    it('should return no spans for empty or blank text', () => {
      expect(chunks('', 10, 2)).toEqual([]);
      expect(chunks('  \n\t ', 10, 2)).toEqual([]);
    });

    it('should normalize whitespace before chunking', () => {
      expect(chunks('  a\n\n b\tc  ', 10, 2)).toEqual(['a b c']);
    });

    it('should trim each span on its own', () => {
      expect(chunks('hello world again', 6, 0)).toEqual(['hello', 'world', 'again']);
      expect(chunks('ab cd ef', 3, 1)).toEqual(['ab', 'cd', 'd e', 'ef']);
    });

    it('should drop spans that are blank after trimming', () => {
      expect(chunks('a b', 1, 0)).toEqual(['a', 'b']);
    });

    it('should keep every span within size and share the overlap modulo whitespace', () => {
      const text = Array.from({ length: 40 }, (_, i) => `word${i}`).join(' ');
      const size = 25;
      const overlap = 7;
      const stride = size - overlap;
      const spans = chunks(text, size, overlap);

      expect(spans.length).toBeGreaterThan(5);
      for (const span of spans) {
        expect(span.length).toBeLessThanOrEqual(size);
        expect(span).toBe(span.trim());
      }
      for (let i = 1; i < spans.length; i++) {
        const previous = spans[i - 1] ?? '';
        const current = spans[i] ?? '';
        const shared = text.slice(i * stride, i * stride + overlap).trim();
        expect(previous.endsWith(shared)).toBe(true);
        expect(current.startsWith(shared)).toBe(true);
      }
      expect(spans[spans.length - 1]?.endsWith('word39')).toBe(true);
    });

    it.each([
      ['ABCDEFGHIJ', 4, 1],
      ['ABCDEFG', 5, 3],
      ['The quick brown fox jumps over the lazy dog', 7, 0],
      ['  lorem   ipsum\n dolor\tsit amet, consectetur  ', 9, 4],
      [Array.from({ length: 40 }, (_, i) => `word${i}`).join(' '), 25, 7],
    ])('should rebuild %j from its spans (size=%d, overlap=%d)', (text, size, overlap) => {
      const spans = chunks(text, size, overlap);

      expect(rejoin(text, size, overlap, spans)).toBe(squeeze(text));
    });

    it('should be deterministic', () => {
      const text = 'The quick brown fox jumps over the lazy dog';
      expect(chunks(text, 10, 3)).toEqual(chunks(text, 10, 3));
    });

    it('should reject overlap equal to size', () => {
      const result = chunkText('ABCDEFGH', 4, 4);
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(InvalidChunkConfigError);
        expect(result.error.code).toBe('INVALID_CHUNK_CONFIG');
      }
    });
  });

  describe('validateChunkConfig', () => {
    it('should accept size > overlap >= 0', () => {
      expect(validateChunkConfig(1000, 200).isOk()).toBe(true);
      expect(validateChunkConfig(1, 0).isOk()).toBe(true);
    });

    it.each([
      [0, 0, 'size must be greater than 0'],
      [-5, 0, 'size must be greater than 0'],
      [10, -1, 'overlap must not be negative'],
      [10, 10, 'overlap must be smaller than size'],
      [10, 12, 'overlap must be smaller than size'],
      [10.5, 2, 'size and overlap must be integers'],
    ])('should reject size=%d overlap=%d', (size, overlap, reason) => {
      const result = validateChunkConfig(size, overlap);
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe(
          `Invalid chunk configuration (size: ${size}, overlap: ${overlap}): ${reason}`
        );
      }
    });
  });

  describe('normalizeText', () => {
    it('should collapse whitespace runs and trim', () => {
      expect(normalizeText('\n hello \t\t world \r\n')).toBe('hello world');
    });
  });

  describe('TextChunker.create', () => {
    it('should expose the validated configuration', () => {
      const chunker = TextChunker.create({ size: 4, overlap: 1 });
      expect(chunker.isOk()).toBe(true);
      if (chunker.isOk()) {
        expect(chunker.value.size).toBe(4);
        expect(chunker.value.overlap).toBe(1);
        expect(chunker.value.chunk('ABCDEFGHIJ')).toEqual(['ABCD', 'DEFG', 'GHIJ']);
      }
    });

    it('should fail once for an invalid configuration', () => {
      const chunker = TextChunker.create({ size: 3, overlap: 5 });
      expect(chunker.isErr()).toBe(true);
    });
  });
});
