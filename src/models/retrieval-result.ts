import type { Chunk } from './Chunk.js';

/**
 * Best-matching chunk at or above the threshold
 */
export interface RetrievalMatch {
  found: true;
  chunk: Readonly<Chunk>;
  /** Cosine similarity of the chunk, unmodified */
  confidence: number;
  /** Chunk text truncated to the maximum context length */
  context: string;
}

/**
 * No chunk reached the threshold. Not an error.
 */
export interface RetrievalMiss {
  found: false;
  /** Best similarity seen, for diagnostics */
  bestScore: number;
}

export type RetrievalResult = RetrievalMatch | RetrievalMiss;
