/**
 * Configuration Management
 *
 * Reads configuration from environment variables (optionally seeded from a
 * .env file), validates it once and returns a frozen IndexConfig.
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { Result, ok, err } from './result-types.js';
import { ConfigError, InvalidChunkConfigError } from './errors/IndexErrors.js';
import { validateChunkConfig } from '../services/chunker/TextChunker.js';
import type {
	EmbedderConfig,
	HashingEmbedderConfig,
	IndexConfig,
	OpenAIEmbedderConfig,
} from '../models/index-config.js';
import {
	DEFAULT_CHUNK_OVERLAP,
	DEFAULT_CHUNK_SIZE,
	DEFAULT_DATA_DIR,
	DEFAULT_EMBED_DIMENSIONS,
	DEFAULT_FETCH_TIMEOUT_MS,
	DEFAULT_INDEX_FILE,
	DEFAULT_MAX_CONTEXT_LENGTH,
	DEFAULT_OPENAI_MODEL,
	DEFAULT_SIMILARITY_THRESHOLD,
} from '../constants/index-constants.js';

// ============================================================================
// Schema
// ============================================================================

const booleanFlag = z
	.union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
	.transform((value) => value === true || value === 'true' || value === '1' || value === 'yes');

const configSchema = z.object({
	sourceUrl: z.string().url().optional(),
	chunkSize: z.coerce.number().int().default(DEFAULT_CHUNK_SIZE),
	chunkOverlap: z.coerce.number().int().default(DEFAULT_CHUNK_OVERLAP),
	similarityThreshold: z.coerce.number().min(-1).max(1).default(DEFAULT_SIMILARITY_THRESHOLD),
	maxContextLength: z.coerce.number().int().positive().default(DEFAULT_MAX_CONTEXT_LENGTH),
	fetchTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
	dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
	indexFile: z.string().min(1).default(DEFAULT_INDEX_FILE),
	autoScrape: booleanFlag.default(true),
	embedder: z.enum(['hashing', 'openai']).default('hashing'),
	embedDimensions: z.coerce.number().int().positive().default(DEFAULT_EMBED_DIMENSIONS),
	openaiModel: z.string().min(1).default(DEFAULT_OPENAI_MODEL),
	openaiApiKey: z.string().min(1).optional(),
});

/**
 * Raw configuration input, before validation and defaults
 */
export type IndexConfigInput = z.input<typeof configSchema>;

/**
 * Environment variable backing each configuration field
 */
export const ENV_VARS: Record<keyof IndexConfigInput, string> = {
	sourceUrl: 'SNIPPET_SOURCE_URL',
	chunkSize: 'SNIPPET_CHUNK_SIZE',
	chunkOverlap: 'SNIPPET_CHUNK_OVERLAP',
	similarityThreshold: 'SNIPPET_SIMILARITY_THRESHOLD',
	maxContextLength: 'SNIPPET_MAX_CONTEXT_LENGTH',
	fetchTimeoutMs: 'SNIPPET_FETCH_TIMEOUT_MS',
	dataDir: 'SNIPPET_DATA_DIR',
	indexFile: 'SNIPPET_INDEX_FILE',
	autoScrape: 'SNIPPET_AUTO_SCRAPE',
	embedder: 'SNIPPET_EMBEDDER',
	embedDimensions: 'SNIPPET_EMBED_DIMENSIONS',
	openaiModel: 'SNIPPET_OPENAI_MODEL',
	openaiApiKey: 'OPENAI_API_KEY',
};

// ============================================================================
// Loading
// ============================================================================

/**
 * Load environment variables from a .env file
 *
 * A missing file is not an error.
 */
export function loadEnvFile(envPath?: string): Result<void, ConfigError> {
	try {
		loadEnv({ path: envPath });
		return ok(undefined);
	} catch (error) {
		return err(
			new ConfigError(
				envPath ?? '.env',
				`failed to load .env file: ${error instanceof Error ? error.message : 'Unknown error'}`
			)
		);
	}
}

/**
 * Build configuration from environment variables
 *
 * Empty variables count as unset.
 */
export function loadIndexConfig(
	env: NodeJS.ProcessEnv = process.env
): Result<IndexConfig, ConfigError | InvalidChunkConfigError> {
	const input: Record<string, string> = {};

	for (const [field, variable] of Object.entries(ENV_VARS)) {
		const value = env[variable];
		if (value !== undefined && value.trim() !== '') {
			input[field] = value.trim();
		}
	}

	return createIndexConfig(input);
}

/**
 * Validate a configuration object and freeze it
 */
export function createIndexConfig(
	input: IndexConfigInput | Record<string, unknown> = {}
): Result<IndexConfig, ConfigError | InvalidChunkConfigError> {
	const parsed = configSchema.safeParse(input);

	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		return err(new ConfigError(fieldLabel(issue?.path[0]), issue?.message ?? 'invalid value'));
	}

	const values = parsed.data;

	const chunkCheck = validateChunkConfig(values.chunkSize, values.chunkOverlap);
	if (chunkCheck.isErr()) {
		return err(chunkCheck.error);
	}

	let embedder: EmbedderConfig;
	if (values.embedder === 'openai') {
		if (!values.openaiApiKey) {
			return err(
				new ConfigError(ENV_VARS.openaiApiKey, `required when ${ENV_VARS.embedder} is "openai"`)
			);
		}
		const openai: OpenAIEmbedderConfig = {
			type: 'openai',
			model: values.openaiModel,
			dimensions: values.embedDimensions,
			apiKey: values.openaiApiKey,
		};
		embedder = Object.freeze(openai);
	} else {
		const hashing: HashingEmbedderConfig = { type: 'hashing', dimensions: values.embedDimensions };
		embedder = Object.freeze(hashing);
	}

	const config: IndexConfig = {
		sourceUrl: values.sourceUrl,
		chunkSize: values.chunkSize,
		chunkOverlap: values.chunkOverlap,
		similarityThreshold: values.similarityThreshold,
		maxContextLength: values.maxContextLength,
		fetchTimeoutMs: values.fetchTimeoutMs,
		dataDir: values.dataDir,
		indexFile: values.indexFile,
		autoScrape: values.autoScrape,
		embedder,
	};

	return ok(Object.freeze(config));
}

function isConfigField(key: unknown): key is keyof IndexConfigInput {
	return typeof key === 'string' && key in ENV_VARS;
}

/**
 * Name a field by its environment variable when it has one
 */
function fieldLabel(key: string | number | undefined): string {
	return isConfigField(key) ? ENV_VARS[key] : String(key ?? 'config');
}

/**
 * Mask API key for safe display (show only last 4 characters)
 */
export function maskApiKey(apiKey: string): string {
	if (apiKey.length <= 4) {
		return '****';
	}
	return '****' + apiKey.slice(-4);
}
