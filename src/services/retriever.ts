/**
 * Retriever
 *
 * Linear cosine-similarity scan over the store. The highest score wins and
 * ties keep the earliest entry; a best score at or above the threshold is a
 * match.
 */

import { Result, ok, err } from '../lib/result-types.js';
import { DimensionMismatchError, EmptyIndexError } from '../lib/errors/IndexErrors.js';
import type { RetrievalResult } from '../models/retrieval-result.js';
import type { IndexStore } from './index-store.js';

/**
 * Cosine similarity of two equal-length vectors; 0 when either norm is zero
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let magA = 0;
  let magB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    magA += x * x;
    magB += y * y;
  }

  if (magA === 0 || magB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(magA) * Math.sqrt(magB));
}

/**
 * Cut text to at most maxLength characters, backing off to the last space
 */
export function truncateContext(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  const cut = text.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(' ');
  return lastSpace > 0 ? cut.slice(0, lastSpace) : cut;
}

/**
 * Find the best chunk for a query vector
 */
export function retrieve(
  queryVector: readonly number[],
  store: IndexStore,
  threshold: number,
  maxContextLength: number
): Result<RetrievalResult, EmptyIndexError | DimensionMismatchError> {
  const dimensions = store.dimensions;
  if (store.isEmpty || dimensions === null) {
    return err(new EmptyIndexError());
  }

  if (queryVector.length !== dimensions) {
    return err(new DimensionMismatchError(dimensions, queryVector.length));
  }

  let bestIndex = -1;
  let bestScore = -Infinity;

  store.entries.forEach((entry, index) => {
    const score = cosineSimilarity(queryVector, entry.vector);
    // Strict comparison keeps the earliest entry on ties
    if (score > bestScore) {
      bestScore = score;
      bestIndex = index;
    }
  });

  const best = store.entries[bestIndex];
  if (!best || bestScore < threshold) {
    return ok({ found: false, bestScore });
  }

  return ok({
    found: true,
    chunk: best.chunk,
    confidence: bestScore,
    context: truncateContext(best.chunk.text, maxContextLength),
  });
}
