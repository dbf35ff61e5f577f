/**
 * Wires the production implementations behind SnippetService
 */

import path from 'path';
import type { AxiosAdapter } from 'axios';
import { Result, ok, err } from '../lib/result-types.js';
import { InvalidChunkConfigError } from '../lib/errors/IndexErrors.js';
import { Logger, type LogLevel } from '../lib/logger.js';
import type { IndexConfig } from '../models/index-config.js';
import { TextChunker } from './chunker/TextChunker.js';
import { createEmbedder } from './embedding/embedder-factory.js';
import type { EmbeddingsClient } from './embedding/OpenAIEmbedder.js';
import { ActiveIndex } from './index-store.js';
import { IndexPersistenceService } from './index-persistence.js';
import { ScrapeOrchestrator } from './scrape-orchestrator.js';
import { HttpPageFetcher } from './scraper/HttpPageFetcher.js';
import { HtmlTextExtractor } from './scraper/HtmlTextExtractor.js';
import { SnippetService } from './snippet-service.js';

export interface ServiceFactoryOptions {
  /** Defaults to a logger writing under <dataDir>/logs */
  logger?: Logger;
  consoleLevel?: LogLevel;
  embeddingsClient?: EmbeddingsClient;
  fetchAdapter?: AxiosAdapter;
  clock?: () => Date;
}

export interface SnippetServices {
  service: SnippetService;
  persistence: IndexPersistenceService;
  logger: Logger;
}

export function createSnippetServices(
  config: IndexConfig,
  options: ServiceFactoryOptions = {}
): Result<SnippetServices, InvalidChunkConfigError> {
  const chunker = TextChunker.create({ size: config.chunkSize, overlap: config.chunkOverlap });
  if (chunker.isErr()) {
    return err(chunker.error);
  }

  const logger =
    options.logger ??
    new Logger({
      logDir: path.join(config.dataDir, 'logs'),
      consoleLevel: options.consoleLevel ?? 'warn',
    });

  const embedder = createEmbedder(config.embedder, options.embeddingsClient);
  const activeIndex = new ActiveIndex();
  const persistence = new IndexPersistenceService(config.dataDir, config.indexFile);

  const orchestrator = new ScrapeOrchestrator({
    fetcher: new HttpPageFetcher({ timeoutMs: config.fetchTimeoutMs, adapter: options.fetchAdapter }),
    extractor: new HtmlTextExtractor(),
    chunker: chunker.value,
    embedder,
    activeIndex,
    persistence,
    logger,
    clock: options.clock,
  });

  const service = new SnippetService({
    config,
    embedder,
    activeIndex,
    persistence,
    orchestrator,
    logger,
  });

  return ok({ service, persistence, logger });
}
