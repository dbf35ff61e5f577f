/**
 * Build the embedder selected by configuration
 */

import type { EmbedderConfig } from '../../models/index-config.js';
import type { TextEmbedder } from './embedder-interface.js';
import { HashingEmbedder } from './HashingEmbedder.js';
import { OpenAIEmbedder, type EmbeddingsClient } from './OpenAIEmbedder.js';

export function createEmbedder(config: EmbedderConfig, client?: EmbeddingsClient): TextEmbedder {
	switch (config.type) {
		case 'hashing':
			return new HashingEmbedder({ dimensions: config.dimensions });
		case 'openai':
			return new OpenAIEmbedder({
				apiKey: config.apiKey,
				model: config.model,
				dimensions: config.dimensions,
				client,
			});
	}
}
