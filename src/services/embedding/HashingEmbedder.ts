/**
 * Hashing Embedder
 *
 * Local, deterministic term-frequency vectors. Words are lowercased, stopwords
 * and short tokens dropped, and each remaining token counted in the bucket
 * chosen by its FNV-1a hash.
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ok, type Result } from '../../lib/result-types.js';
import type { EmbeddingUnavailableError } from '../../lib/errors/IndexErrors.js';
import { MIN_TOKEN_LENGTH } from '../../constants/index-constants.js';
import { zeroVector, type TextEmbedder } from './embedder-interface.js';

/**
 * FNV-1a hash constants (32-bit)
 */
const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu;

const STOPWORDS_PATH = fileURLToPath(new URL('../../../data/stopwords.json', import.meta.url));

const stopwordsSchema = z.record(z.string(), z.array(z.string()));

let defaultStopwords: ReadonlySet<string> | undefined;

/**
 * FNV-1a hash function
 */
export function fnv1aHash(str: string): number {
	let hash = FNV_OFFSET_BASIS;
	for (let i = 0; i < str.length; i++) {
		hash ^= str.charCodeAt(i);
		hash = Math.imul(hash, FNV_PRIME);
	}
	return hash >>> 0;
}

/**
 * Read the bundled stopword lists (all languages merged)
 */
export function loadStopwords(filePath: string = STOPWORDS_PATH): ReadonlySet<string> {
	const lists = stopwordsSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf8')));
	return new Set(Object.values(lists).flat());
}

function bundledStopwords(): ReadonlySet<string> {
	if (!defaultStopwords) {
		defaultStopwords = loadStopwords();
	}
	return defaultStopwords;
}

/**
 * Lowercased word tokens, without stopwords or tokens under the minimum length
 */
export function tokenize(text: string, stopwords: ReadonlySet<string>): string[] {
	const words = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
	return words.filter((word) => word.length >= MIN_TOKEN_LENGTH && !stopwords.has(word));
}

export interface HashingEmbedderOptions {
	dimensions: number;
	/** Defaults to data/stopwords.json */
	stopwords?: ReadonlySet<string>;
}

export class HashingEmbedder implements TextEmbedder {
	readonly id: string;
	readonly dimensions: number;
	readonly requiresNetwork = false;
	private readonly stopwords: ReadonlySet<string>;

	constructor(options: HashingEmbedderOptions) {
		if (!Number.isInteger(options.dimensions) || options.dimensions <= 0) {
			throw new RangeError(`dimensions must be a positive integer, got ${options.dimensions}`);
		}
		this.dimensions = options.dimensions;
		this.id = `hashing-fnv1a-${options.dimensions}`;
		this.stopwords = options.stopwords ?? bundledStopwords();
	}

	async embed(text: string): Promise<Result<number[], EmbeddingUnavailableError>> {
		return ok(this.embedSync(text));
	}

	/**
	 * Raw term counts per hashed bucket
	 */
	embedSync(text: string): number[] {
		const vector = zeroVector(this.dimensions);

		for (const token of tokenize(text, this.stopwords)) {
			const bucket = fnv1aHash(token) % this.dimensions;
			vector[bucket] = (vector[bucket] ?? 0) + 1;
		}

		return vector;
	}
}
