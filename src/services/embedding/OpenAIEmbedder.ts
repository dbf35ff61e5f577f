/**
 * OpenAI Embedder
 *
 * Hosted embeddings through the openai SDK. Any failure to obtain a vector of
 * the configured length surfaces as EmbeddingUnavailableError.
 */

import OpenAI from 'openai';
import { ok, err, toError, type Result } from '../../lib/result-types.js';
import { EmbeddingUnavailableError } from '../../lib/errors/IndexErrors.js';
import { DEFAULT_OPENAI_MODEL } from '../../constants/index-constants.js';
import { zeroVector, type TextEmbedder } from './embedder-interface.js';

/**
 * The slice of the OpenAI client this embedder calls
 */
export interface EmbeddingsClient {
	embeddings: {
		create(params: {
			model: string;
			input: string;
			dimensions?: number;
		}): Promise<{ data: Array<{ embedding: number[] }> }>;
	};
}

export interface OpenAIEmbedderOptions {
	apiKey: string;
	dimensions: number;
	model?: string;
	/** Injected client; built from apiKey when omitted */
	client?: EmbeddingsClient;
}

export class OpenAIEmbedder implements TextEmbedder {
	readonly id: string;
	readonly dimensions: number;
	readonly requiresNetwork = true;
	private readonly model: string;
	private readonly client: EmbeddingsClient;

	constructor(options: OpenAIEmbedderOptions) {
		this.model = options.model ?? DEFAULT_OPENAI_MODEL;
		this.dimensions = options.dimensions;
		this.id = `openai-${this.model}-${options.dimensions}`;
		this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
	}

	async embed(text: string): Promise<Result<number[], EmbeddingUnavailableError>> {
		if (text.trim() === '') {
			return ok(zeroVector(this.dimensions));
		}

		let response: { data: Array<{ embedding: number[] }> };
		try {
			response = await this.client.embeddings.create({
				model: this.model,
				input: text,
				dimensions: this.dimensions,
			});
		} catch (error) {
			const cause = toError(error);
			return err(new EmbeddingUnavailableError(this.id, cause.message, cause));
		}

		const embedding = response.data[0]?.embedding;
		if (!embedding) {
			return err(new EmbeddingUnavailableError(this.id, 'response contained no embedding'));
		}
		if (embedding.length !== this.dimensions) {
			return err(
				new EmbeddingUnavailableError(
					this.id,
					`expected ${this.dimensions} dimensions, got ${embedding.length}`
				)
			);
		}

		return ok(embedding);
	}
}
