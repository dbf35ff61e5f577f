/**
 * Snippet Service
 *
 * Caller-facing facade over the index: startup loading, search, rebuild and
 * stats. Queries read whichever store is current when they start; rebuilds go
 * through the orchestrator.
 */

import { Result, ok, err } from '../lib/result-types.js';
import {
  ConfigError,
  DimensionMismatchError,
  EmbeddingUnavailableError,
  EmptyIndexError,
} from '../lib/errors/IndexErrors.js';
import type { Logger } from '../lib/logger.js';
import type { IndexConfig } from '../models/index-config.js';
import type { RetrievalResult } from '../models/retrieval-result.js';
import type { TextEmbedder } from './embedding/embedder-interface.js';
import type { ActiveIndex, IndexStore } from './index-store.js';
import type { IndexPersistence } from './index-persistence.js';
import { retrieve } from './retriever.js';
import type { RebuildError, RebuildOutcome, ScrapeOrchestrator } from './scrape-orchestrator.js';

export type SearchError = EmbeddingUnavailableError | EmptyIndexError | DimensionMismatchError;

/**
 * Which path startup took
 */
export type InitializeOutcome =
  | { source: 'loaded'; chunkCount: number }
  | { source: 'rebuilt'; rebuild: RebuildOutcome }
  | { source: 'skipped'; reason: string }
  | { source: 'empty'; reason: string };

/**
 * Index statistics
 */
export interface IndexStats {
  chunkCount: number;
  lastRebuildAt: string | null;
  sourceUrl: string | null;
  sourceTitle: string | null;
  embedderId: string | null;
  dimensions: number | null;
  /** Total chunk length divided by four, rounded up */
  approxTokens: number;
  rebuilding: boolean;
}

export interface SnippetServiceDeps {
  config: IndexConfig;
  embedder: TextEmbedder;
  activeIndex: ActiveIndex;
  persistence: IndexPersistence;
  orchestrator: ScrapeOrchestrator;
  logger: Logger;
}

export class SnippetService {
  private readonly deps: SnippetServiceDeps;

  constructor(deps: SnippetServiceDeps) {
    this.deps = deps;
  }

  /**
   * Load the persisted index, or rebuild when nothing was saved and auto-scrape is on
   *
   * A saved index that is unreadable, empty, or built by another embedder or
   * chunk configuration is logged and treated as absent.
   */
  async initialize(
    options: { allowRebuild?: boolean } = {}
  ): Promise<Result<InitializeOutcome, RebuildError>> {
    const { config, activeIndex, persistence, logger } = this.deps;

    const loaded = await persistence.load();
    const mismatch = loaded.isOk() && loaded.value ? this.incompatibility(loaded.value) : null;
    if (loaded.isErr()) {
      logger.warn('Ignoring unreadable index', { code: loaded.error.code, error: loaded.error.message });
    } else if (mismatch) {
      logger.warn('Ignoring saved index', { reason: mismatch });
    } else if (loaded.value) {
      if (activeIndex.installLoaded(loaded.value)) {
        logger.info('Index loaded', { chunkCount: loaded.value.size });
        return ok({ source: 'loaded', chunkCount: loaded.value.size });
      }
      return ok({ source: 'skipped', reason: 'a rebuild finished before the saved index was read' });
    }

    if (options.allowRebuild === false) {
      return ok({ source: 'empty', reason: 'no saved index' });
    }
    if (!config.autoScrape) {
      return ok({ source: 'empty', reason: 'no saved index and auto-scrape is disabled' });
    }
    if (!config.sourceUrl) {
      return ok({ source: 'empty', reason: 'no saved index and no source URL configured' });
    }

    const rebuilt = await this.deps.orchestrator.rebuild(config.sourceUrl);
    return rebuilt.map((rebuild): InitializeOutcome => ({ source: 'rebuilt', rebuild }));
  }

  /**
   * Why a saved store cannot serve this configuration, or null when it can
   */
  private incompatibility(store: IndexStore): string | null {
    const { config, embedder } = this.deps;
    const metadata = store.metadata;

    if (store.isEmpty || !metadata) {
      return 'saved index has no chunks';
    }
    if (metadata.embedderId !== embedder.id) {
      return `built by ${metadata.embedderId}, running ${embedder.id}`;
    }
    if (metadata.chunkSize !== config.chunkSize || metadata.chunkOverlap !== config.chunkOverlap) {
      return (
        `built with chunk size ${metadata.chunkSize}/${metadata.chunkOverlap}, ` +
        `configured ${config.chunkSize}/${config.chunkOverlap}`
      );
    }
    return null;
  }

  /**
   * Find the best-matching snippet for a query
   */
  async search(query: string): Promise<Result<RetrievalResult, SearchError>> {
    const { config, embedder, activeIndex } = this.deps;
    const store = activeIndex.current();

    if (store.isEmpty) {
      return err(new EmptyIndexError());
    }

    const vector = await embedder.embed(query);
    if (vector.isErr()) {
      return err(vector.error);
    }

    return retrieve(vector.value, store, config.similarityThreshold, config.maxContextLength);
  }

  /**
   * Rebuild from the given URL, or the configured one
   */
  async rebuild(sourceUrl?: string): Promise<Result<RebuildOutcome, RebuildError | ConfigError>> {
    const url = sourceUrl ?? this.deps.config.sourceUrl;
    if (!url) {
      return err(new ConfigError('SNIPPET_SOURCE_URL', 'no source URL given or configured'));
    }
    return this.deps.orchestrator.rebuild(url);
  }

  stats(): IndexStats {
    const store = this.deps.activeIndex.current();
    const metadata = store.metadata;

    return {
      chunkCount: store.size,
      lastRebuildAt: metadata?.builtAt ?? null,
      sourceUrl: metadata?.sourceUrl ?? null,
      sourceTitle: metadata?.sourceTitle ?? null,
      embedderId: metadata?.embedderId ?? null,
      dimensions: metadata?.dimensions ?? null,
      approxTokens: Math.ceil(store.totalTextLength() / 4),
      rebuilding: this.deps.orchestrator.isRebuilding,
    };
  }
}
