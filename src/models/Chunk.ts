/**
 * Chunk model - a contiguous span of normalized document text
 */

export interface Chunk {
  /** Position in document order, assigned from 0 on every build */
  id: number;

  /** Normalized text, never longer than the configured chunk size */
  text: string;

  sourceUrl: string;

  sourceTitle: string;

  /** ISO-8601 build timestamp */
  createdAt: string;
}

/**
 * A chunk paired with its embedding vector
 */
export interface IndexEntry {
  readonly chunk: Readonly<Chunk>;
  readonly vector: readonly number[];
}
