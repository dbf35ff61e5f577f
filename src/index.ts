/**
 * snippet-index public API
 */

export { chunkText, normalizeText, validateChunkConfig, TextChunker } from './services/chunker/TextChunker.js';
export type { TextChunkerConfig } from './services/chunker/TextChunker.js';

export type { TextEmbedder } from './services/embedding/embedder-interface.js';
export { HashingEmbedder, tokenize, fnv1aHash, loadStopwords } from './services/embedding/HashingEmbedder.js';
export { OpenAIEmbedder } from './services/embedding/OpenAIEmbedder.js';
export type { EmbeddingsClient, OpenAIEmbedderOptions } from './services/embedding/OpenAIEmbedder.js';
export { createEmbedder } from './services/embedding/embedder-factory.js';

export { IndexStore, ActiveIndex } from './services/index-store.js';
export type { IndexMetadata } from './services/index-store.js';
export { IndexPersistenceService } from './services/index-persistence.js';
export type { IndexPersistence, IndexFile, PersistenceStats } from './services/index-persistence.js';

export { retrieve, cosineSimilarity, truncateContext } from './services/retriever.js';

export { HttpPageFetcher } from './services/scraper/HttpPageFetcher.js';
export type { PageFetcher, FetchedPage } from './services/scraper/HttpPageFetcher.js';
export { HtmlTextExtractor } from './services/scraper/HtmlTextExtractor.js';
export type { TextExtractor, ExtractedDocument } from './services/scraper/HtmlTextExtractor.js';

export { ScrapeOrchestrator } from './services/scrape-orchestrator.js';
export type { RebuildError, RebuildOutcome } from './services/scrape-orchestrator.js';
export { SnippetService } from './services/snippet-service.js';
export type { IndexStats, InitializeOutcome, SearchError } from './services/snippet-service.js';
export { createSnippetServices } from './services/service-factory.js';

export { createIndexConfig, loadIndexConfig, loadEnvFile, ENV_VARS } from './lib/env-config.js';
export { Logger } from './lib/logger.js';
export type { LoggerConfig, LogLevel } from './lib/logger.js';
export * from './lib/errors/IndexErrors.js';

export type { Chunk, IndexEntry } from './models/Chunk.js';
export type { RetrievalResult, RetrievalMatch, RetrievalMiss } from './models/retrieval-result.js';
export type { IndexConfig, EmbedderConfig } from './models/index-config.js';
