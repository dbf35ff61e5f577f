/**
 * In-process stand-ins for the network, the embedder and the disk
 */

import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { ok, err, type Result } from '../../src/lib/result-types.js';
import { EmbeddingUnavailableError, FetchError, PersistenceError } from '../../src/lib/errors/IndexErrors.js';
import { Logger } from '../../src/lib/logger.js';
import type { TextEmbedder } from '../../src/services/embedding/embedder-interface.js';
import type { FetchedPage, PageFetcher } from '../../src/services/scraper/HttpPageFetcher.js';
import type { IndexPersistence } from '../../src/services/index-persistence.js';
import { IndexStore, type IndexMetadata } from '../../src/services/index-store.js';

/**
 * Logger that writes nothing
 */
export function createSilentLogger(): Logger {
  return new Logger({ console: false });
}

/**
 * Clock returning the given instants in turn, then repeating the last one
 */
export function sequenceClock(...isoTimes: string[]): () => Date {
  let i = 0;
  return () => {
    const value = isoTimes[Math.min(i, isoTimes.length - 1)] ?? '2024-01-01T00:00:00.000Z';
    i++;
    return new Date(value);
  };
}

/**
 * Axios adapter answering every request with a fixed response
 */
export function staticAdapter(
  status: number,
  data: unknown,
  onRequest?: (config: InternalAxiosRequestConfig) => void
): AxiosAdapter {
  return async (config) => {
    onRequest?.(config);
    return {
      data,
      status,
      statusText: status === 200 ? 'OK' : 'Error',
      headers: {},
      config,
    };
  };
}

/**
 * Fetcher serving pages from a map; unknown URLs fail with 404
 */
export class FakePageFetcher implements PageFetcher {
  readonly requested: string[] = [];
  private gate: Promise<void> | null = null;
  private release: (() => void) | null = null;

  constructor(private readonly pages: Record<string, string>) {}

  setPage(url: string, html: string): void {
    this.pages[url] = html;
  }

  /**
   * Hold every fetch until the returned function is called
   */
  hold(): () => void {
    this.gate = new Promise<void>((resolve) => {
      this.release = resolve;
    });
    return () => {
      this.release?.();
      this.gate = null;
    };
  }

  async fetch(url: string): Promise<Result<FetchedPage, FetchError>> {
    this.requested.push(url);
    if (this.gate) {
      await this.gate;
    }
    const body = this.pages[url];
    if (body === undefined) {
      return err(new FetchError(url, 'HTTP 404: Not Found', 404));
    }
    return ok({ url, status: 200, body });
  }
}

/**
 * Embedder counting occurrences of a fixed vocabulary; one dimension per word
 */
export class VocabularyEmbedder implements TextEmbedder {
  readonly id = 'vocabulary-test';
  readonly requiresNetwork = false;
  readonly dimensions: number;
  calls = 0;
  /** Fail on this call number (1-based) */
  failOnCall: number | null = null;

  constructor(private readonly vocabulary: readonly string[]) {
    this.dimensions = vocabulary.length;
  }

  async embed(text: string): Promise<Result<number[], EmbeddingUnavailableError>> {
    this.calls++;
    if (this.failOnCall === this.calls) {
      return err(new EmbeddingUnavailableError(this.id, 'simulated outage'));
    }
    const words = text.toLowerCase().split(/[^a-z]+/);
    return ok(this.vocabulary.map((term) => words.filter((word) => word === term).length));
  }
}

/**
 * Persistence kept in memory, optionally failing every save
 */
export class MemoryPersistence implements IndexPersistence {
  saved: IndexStore | null = null;
  saves = 0;
  failSaves = false;

  constructor(private stored: IndexStore | null = null) {}

  async load(): Promise<Result<IndexStore | null, PersistenceError>> {
    return ok(this.stored);
  }

  async save(store: IndexStore): Promise<Result<void, PersistenceError>> {
    this.saves++;
    if (this.failSaves) {
      return err(new PersistenceError('memory://index.json', 'save', 'disk full'));
    }
    this.saved = store;
    this.stored = store;
    return ok(undefined);
  }
}

/**
 * Build a store from texts and vectors
 */
export function buildStore(
  items: Array<{ text: string; vector: number[] }>,
  dimensions: number,
  metadata: Partial<IndexMetadata> = {}
): IndexStore {
  const created = IndexStore.create(
    items.map((item, id) => ({
      chunk: {
        id,
        text: item.text,
        sourceUrl: 'https://example.test/page',
        sourceTitle: 'Example',
        createdAt: '2024-01-01T00:00:00.000Z',
      },
      vector: item.vector,
    })),
    {
      builtAt: '2024-01-01T00:00:00.000Z',
      sourceUrl: 'https://example.test/page',
      sourceTitle: 'Example',
      embedderId: 'test',
      dimensions,
      chunkSize: 100,
      chunkOverlap: 10,
      ...metadata,
    }
  );
  if (created.isErr()) {
    throw created.error;
  }
  return created.value;
}
