/**
 * Text Embedder Interface
 *
 * Maps a chunk or a query to a fixed-length vector. Implementations are local
 * (hashed term frequencies) or hosted (API models); both report failures
 * through Result values.
 */

import type { Result } from '../../lib/result-types.js';
import type { EmbeddingUnavailableError } from '../../lib/errors/IndexErrors.js';

/**
 * Core embedder interface
 */
export interface TextEmbedder {
	/** Identifier recorded in index metadata (e.g. "hashing-fnv1a-1024") */
	readonly id: string;

	/** Length of every vector this embedder produces */
	readonly dimensions: number;

	/** Whether embedding needs network access */
	readonly requiresNetwork: boolean;

	/**
	 * Embed a single text
	 *
	 * Empty text yields a zero vector.
	 */
	embed(text: string): Promise<Result<number[], EmbeddingUnavailableError>>;
}

/**
 * Zero vector of the given length
 */
export function zeroVector(dimensions: number): number[] {
	return new Array<number>(dimensions).fill(0);
}
