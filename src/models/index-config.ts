/**
 * Validated, immutable runtime configuration
 */

export interface HashingEmbedderConfig {
  readonly type: 'hashing';
  /** Size of the hashed feature space */
  readonly dimensions: number;
}

export interface OpenAIEmbedderConfig {
  readonly type: 'openai';
  readonly model: string;
  readonly dimensions: number;
  readonly apiKey: string;
}

export type EmbedderConfig = HashingEmbedderConfig | OpenAIEmbedderConfig;

export interface IndexConfig {
  /** Page scraped by a rebuild when no URL is given explicitly */
  readonly sourceUrl?: string;
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  /** Inclusive lower bound on the best similarity */
  readonly similarityThreshold: number;
  readonly maxContextLength: number;
  readonly fetchTimeoutMs: number;
  readonly dataDir: string;
  readonly indexFile: string;
  /** Rebuild at startup when nothing was persisted */
  readonly autoScrape: boolean;
  readonly embedder: EmbedderConfig;
}
