/**
 * TextChunker - splits document text into overlapping fixed-size spans
 *
 * Text is normalized first (whitespace runs collapsed, ends trimmed), then a
 * window of `size` characters advances with stride `size - overlap`. Each span
 * is trimmed on its own; window offsets stay on the normalized text.
 */

import { Result, ok, err } from '../../lib/result-types.js';
import { InvalidChunkConfigError } from '../../lib/errors/IndexErrors.js';

/**
 * TextChunker configuration
 */
export interface TextChunkerConfig {
  /** Maximum characters per span */
  size: number;

  /** Characters shared by adjacent spans */
  overlap: number;
}

/**
 * Check a size/overlap pair
 */
export function validateChunkConfig(
  size: number,
  overlap: number
): Result<TextChunkerConfig, InvalidChunkConfigError> {
  if (!Number.isInteger(size) || !Number.isInteger(overlap)) {
    return err(new InvalidChunkConfigError(size, overlap, 'size and overlap must be integers'));
  }
  if (size <= 0) {
    return err(new InvalidChunkConfigError(size, overlap, 'size must be greater than 0'));
  }
  if (overlap < 0) {
    return err(new InvalidChunkConfigError(size, overlap, 'overlap must not be negative'));
  }
  if (overlap >= size) {
    return err(new InvalidChunkConfigError(size, overlap, 'overlap must be smaller than size'));
  }
  return ok({ size, overlap });
}

/**
 * Collapse whitespace runs to a single space and trim
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Split normalized spans out of a config that is already known to be valid
 */
function windows(text: string, size: number, overlap: number): string[] {
  const normalized = normalizeText(text);
  const spans: string[] = [];
  const stride = size - overlap;

  for (let offset = 0; offset < normalized.length; offset += stride) {
    const end = Math.min(offset + size, normalized.length);
    const span = normalized.slice(offset, end).trim();
    if (span.length > 0) {
      spans.push(span);
    }

    // The window reached the end: anything further is inside the overlap
    if (end === normalized.length) {
      break;
    }
  }

  return spans;
}

/**
 * Chunk text into overlapping spans
 *
 * @example chunkText('ABCDEFGHIJ', 4, 1) // ok(['ABCD', 'DEFG', 'GHIJ'])
 */
export function chunkText(
  text: string,
  size: number,
  overlap: number
): Result<string[], InvalidChunkConfigError> {
  return validateChunkConfig(size, overlap).map(() => windows(text, size, overlap));
}

/**
 * Chunker bound to one validated configuration
 */
export class TextChunker {
  private readonly config: TextChunkerConfig;

  private constructor(config: TextChunkerConfig) {
    this.config = config;
  }

  /**
   * Validate the configuration once and build a chunker
   */
  static create(config: TextChunkerConfig): Result<TextChunker, InvalidChunkConfigError> {
    return validateChunkConfig(config.size, config.overlap).map((valid) => new TextChunker(valid));
  }

  get size(): number {
    return this.config.size;
  }

  get overlap(): number {
    return this.config.overlap;
  }

  /**
   * Split text into spans; empty or blank text yields no spans
   */
  chunk(text: string): string[] {
    return windows(text, this.config.size, this.config.overlap);
  }
}
