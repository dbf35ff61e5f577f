/**
 * Scrape Orchestrator
 *
 * Rebuilds the index from a source URL: fetch, extract, chunk, embed, swap,
 * persist. The new store only becomes visible after every chunk is embedded,
 * so a failed rebuild leaves the previous index in place. At most one rebuild
 * runs at a time.
 */

import { Result, ok, err } from '../lib/result-types.js';
import {
  DimensionMismatchError,
  EmbeddingUnavailableError,
  ExtractionError,
  FetchError,
  PersistenceError,
  RebuildInProgressError,
  SnippetIndexError,
} from '../lib/errors/IndexErrors.js';
import type { Logger } from '../lib/logger.js';
import type { Chunk } from '../models/Chunk.js';
import type { TextChunker } from './chunker/TextChunker.js';
import type { TextEmbedder } from './embedding/embedder-interface.js';
import type { PageFetcher } from './scraper/HttpPageFetcher.js';
import type { TextExtractor } from './scraper/HtmlTextExtractor.js';
import { IndexStore, type ActiveIndex } from './index-store.js';
import type { IndexPersistence } from './index-persistence.js';

export type RebuildError =
  | FetchError
  | ExtractionError
  | EmbeddingUnavailableError
  | DimensionMismatchError
  | RebuildInProgressError;

/**
 * Summary of a successful rebuild
 */
export interface RebuildOutcome {
  chunkCount: number;
  builtAt: string;
  sourceUrl: string;
  sourceTitle: string;
  durationMs: number;
  /** False when the swap happened but the save failed */
  persisted: boolean;
  persistenceError?: PersistenceError;
}

export interface ScrapeOrchestratorDeps {
  fetcher: PageFetcher;
  extractor: TextExtractor;
  chunker: TextChunker;
  embedder: TextEmbedder;
  activeIndex: ActiveIndex;
  persistence: IndexPersistence;
  logger: Logger;
  /** Defaults to the system clock */
  clock?: () => Date;
}

export class ScrapeOrchestrator {
  private readonly deps: ScrapeOrchestratorDeps;
  private readonly clock: () => Date;
  private inFlight: { startedAt: string } | null = null;

  constructor(deps: ScrapeOrchestratorDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Whether a rebuild is currently running
   */
  get isRebuilding(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Rebuild the index from a source URL
   */
  async rebuild(sourceUrl: string): Promise<Result<RebuildOutcome, RebuildError>> {
    if (this.inFlight) {
      return err(new RebuildInProgressError(this.inFlight.startedAt));
    }

    const started = this.clock();
    this.inFlight = { startedAt: started.toISOString() };

    try {
      const result = await this.run(sourceUrl, started);
      if (result.isErr()) {
        this.logFailure(sourceUrl, started, result.error);
      }
      return result;
    } finally {
      this.inFlight = null;
    }
  }

  private async run(
    sourceUrl: string,
    started: Date
  ): Promise<Result<RebuildOutcome, RebuildError>> {
    const { fetcher, extractor, chunker, embedder, activeIndex, persistence, logger } = this.deps;

    logger.info('Rebuild started', { sourceUrl });

    const page = await fetcher.fetch(sourceUrl);
    if (page.isErr()) {
      return err(page.error);
    }

    const document = extractor.extract(page.value.body, sourceUrl);
    if (document.isErr()) {
      return err(document.error);
    }

    const spans = chunker.chunk(document.value.text);
    if (spans.length === 0) {
      return err(new ExtractionError(sourceUrl, 'document text is empty after normalization'));
    }

    const builtAt = this.clock().toISOString();
    const sourceTitle = document.value.title;
    const entries: Array<{ chunk: Chunk; vector: number[] }> = [];

    for (const [id, text] of spans.entries()) {
      const vector = await embedder.embed(text);
      if (vector.isErr()) {
        return err(vector.error);
      }
      entries.push({
        chunk: { id, text, sourceUrl, sourceTitle, createdAt: builtAt },
        vector: vector.value,
      });
    }

    logger.debug('Chunks embedded', { sourceUrl, chunkCount: entries.length, embedderId: embedder.id });

    const store = IndexStore.create(entries, {
      builtAt,
      sourceUrl,
      sourceTitle,
      embedderId: embedder.id,
      dimensions: embedder.dimensions,
      chunkSize: chunker.size,
      chunkOverlap: chunker.overlap,
    });
    if (store.isErr()) {
      return err(store.error);
    }

    activeIndex.swap(store.value);

    // Never rolled back on a failed save
    const saved = await persistence.save(store.value);
    const durationMs = this.clock().getTime() - started.getTime();

    if (saved.isErr()) {
      logger.warn('Index swapped but not persisted', {
        sourceUrl,
        code: saved.error.code,
        error: saved.error.message,
      });
    }

    logger.logRebuild(sourceUrl, durationMs, {
      outcome: 'success',
      chunkCount: entries.length,
      persisted: saved.isOk(),
    });

    const outcome: RebuildOutcome = {
      chunkCount: entries.length,
      builtAt,
      sourceUrl,
      sourceTitle,
      durationMs,
      persisted: saved.isOk(),
    };
    if (saved.isErr()) {
      outcome.persistenceError = saved.error;
    }

    return ok(outcome);
  }

  private logFailure(sourceUrl: string, started: Date, error: SnippetIndexError): void {
    this.deps.logger.logRebuild(sourceUrl, this.clock().getTime() - started.getTime(), {
      outcome: 'failure',
      error: { code: error.code, message: error.message },
    });
  }
}
