/**
 * Index Persistence Service
 *
 * Reads and writes the durable JSON form of an IndexStore. Saves go through a
 * temporary file and a rename so a crash never leaves a half-written index.
 * Key order is fixed, so loading and saving an index reproduces its bytes.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { Result, ok, err, toError } from '../lib/result-types.js';
import { PersistenceError } from '../lib/errors/IndexErrors.js';
import { INDEX_FORMAT_VERSION } from '../constants/index-constants.js';
import { IndexStore, type IndexMetadata } from './index-store.js';

const metadataSchema = z.object({
  builtAt: z.string(),
  sourceUrl: z.string(),
  sourceTitle: z.string(),
  embedderId: z.string(),
  dimensions: z.number().int().positive(),
  chunkSize: z.number().int().positive(),
  chunkOverlap: z.number().int().nonnegative(),
});

const recordSchema = z.object({
  id: z.number().int().nonnegative(),
  text: z.string(),
  sourceUrl: z.string(),
  sourceTitle: z.string(),
  createdAt: z.string(),
  vector: z.array(z.number()),
});

const indexFileSchema = z.object({
  version: z.number().int(),
  metadata: metadataSchema,
  records: z.array(recordSchema),
});

export type IndexFile = z.infer<typeof indexFileSchema>;

/**
 * Statistics about the persisted index file
 */
export interface PersistenceStats {
  path: string;
  exists: boolean;
  sizeBytes: number;
  modifiedAt: string | null;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Durable document for a store, keys in canonical order
 */
export function toIndexFile(metadata: IndexMetadata, store: IndexStore): IndexFile {
  return {
    version: INDEX_FORMAT_VERSION,
    metadata: {
      builtAt: metadata.builtAt,
      sourceUrl: metadata.sourceUrl,
      sourceTitle: metadata.sourceTitle,
      embedderId: metadata.embedderId,
      dimensions: metadata.dimensions,
      chunkSize: metadata.chunkSize,
      chunkOverlap: metadata.chunkOverlap,
    },
    records: store.entries.map(({ chunk, vector }) => ({
      id: chunk.id,
      text: chunk.text,
      sourceUrl: chunk.sourceUrl,
      sourceTitle: chunk.sourceTitle,
      createdAt: chunk.createdAt,
      vector: [...vector],
    })),
  };
}

/**
 * Durable storage for index stores
 */
export interface IndexPersistence {
  load(): Promise<Result<IndexStore | null, PersistenceError>>;
  save(store: IndexStore): Promise<Result<void, PersistenceError>>;
}

/**
 * Service for persisting the active index
 */
export class IndexPersistenceService implements IndexPersistence {
  private readonly dataDir: string;
  private readonly indexPath: string;

  constructor(dataDir: string, fileName: string) {
    this.dataDir = dataDir;
    this.indexPath = path.join(dataDir, fileName);
  }

  get filePath(): string {
    return this.indexPath;
  }

  /**
   * Create the data directory
   */
  async initialize(): Promise<Result<void, PersistenceError>> {
    try {
      await fs.mkdir(this.dataDir, { recursive: true });
      return ok(undefined);
    } catch (error) {
      const cause = toError(error);
      return err(new PersistenceError(this.indexPath, 'save', cause.message, cause));
    }
  }

  /**
   * Write a store; the empty initial store has nothing to write
   */
  async save(store: IndexStore): Promise<Result<void, PersistenceError>> {
    const metadata = store.metadata;
    if (!metadata) {
      return err(new PersistenceError(this.indexPath, 'save', 'store has no build metadata'));
    }

    const initialized = await this.initialize();
    if (initialized.isErr()) {
      return initialized;
    }

    const json = JSON.stringify(toIndexFile(metadata, store), null, 2) + '\n';
    const tempPath = `${this.indexPath}.${process.pid}.tmp`;

    try {
      await fs.writeFile(tempPath, json, 'utf-8');
      await fs.rename(tempPath, this.indexPath);
      return ok(undefined);
    } catch (error) {
      const cause = toError(error);
      // The write failure is what gets reported; a leftover temp file is overwritten next time
      await fs.rm(tempPath, { force: true }).catch(() => undefined);
      return err(new PersistenceError(this.indexPath, 'save', cause.message, cause));
    }
  }

  /**
   * Read the persisted store
   *
   * @returns null when no index has been saved
   */
  async load(): Promise<Result<IndexStore | null, PersistenceError>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.indexPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return ok(null);
      }
      const cause = toError(error);
      return err(new PersistenceError(this.indexPath, 'load', cause.message, cause));
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      const cause = toError(error);
      return err(new PersistenceError(this.indexPath, 'load', `invalid JSON: ${cause.message}`, cause));
    }

    const parsed = indexFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? issue.path.join('.') || 'document' : 'document';
      return err(
        new PersistenceError(this.indexPath, 'load', `malformed index at ${where}: ${issue?.message ?? 'invalid'}`)
      );
    }

    const file = parsed.data;
    if (file.version !== INDEX_FORMAT_VERSION) {
      return err(
        new PersistenceError(this.indexPath, 'load', `unsupported index version ${file.version}`)
      );
    }

    const entries = file.records.map((record) => ({
      chunk: {
        id: record.id,
        text: record.text,
        sourceUrl: record.sourceUrl,
        sourceTitle: record.sourceTitle,
        createdAt: record.createdAt,
      },
      vector: record.vector,
    }));

    const store = IndexStore.create(entries, file.metadata);
    if (store.isErr()) {
      return err(new PersistenceError(this.indexPath, 'load', store.error.message, store.error));
    }

    return ok(store.value);
  }

  /**
   * Check if an index file exists
   */
  async exists(): Promise<boolean> {
    try {
      await fs.access(this.indexPath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Delete the persisted index
   */
  async clear(): Promise<Result<void, PersistenceError>> {
    try {
      await fs.rm(this.indexPath, { force: true });
      return ok(undefined);
    } catch (error) {
      const cause = toError(error);
      return err(new PersistenceError(this.indexPath, 'clear', cause.message, cause));
    }
  }

  async getStats(): Promise<PersistenceStats> {
    try {
      const stat = await fs.stat(this.indexPath);
      return {
        path: this.indexPath,
        exists: true,
        sizeBytes: stat.size,
        modifiedAt: stat.mtime.toISOString(),
      };
    } catch {
      return { path: this.indexPath, exists: false, sizeBytes: 0, modifiedAt: null };
    }
  }
}
