/**
 * Index Store
 *
 * Immutable, ordered collection of (chunk, vector) entries with the metadata of
 * the build that produced them. A rebuild creates a new store and swaps it into
 * the ActiveIndex; readers keep whatever store they took.
 */

import { Result, ok, err } from '../lib/result-types.js';
import { DimensionMismatchError } from '../lib/errors/IndexErrors.js';
import type { Chunk, IndexEntry } from '../models/Chunk.js';

/**
 * Metadata for one index build
 */
export interface IndexMetadata {
  /** ISO-8601 build timestamp */
  builtAt: string;
  sourceUrl: string;
  sourceTitle: string;
  embedderId: string;
  /** Length of every stored vector */
  dimensions: number;
  chunkSize: number;
  chunkOverlap: number;
}

export class IndexStore {
  private static readonly EMPTY = new IndexStore([], null);

  private constructor(
    private readonly items: readonly IndexEntry[],
    private readonly meta: Readonly<IndexMetadata> | null
  ) {}

  /**
   * The store every process starts with
   */
  static empty(): IndexStore {
    return IndexStore.EMPTY;
  }

  /**
   * Build a store; every vector must have `metadata.dimensions` components
   */
  static create(
    entries: ReadonlyArray<{ chunk: Chunk; vector: readonly number[] }>,
    metadata: IndexMetadata
  ): Result<IndexStore, DimensionMismatchError> {
    const frozen: IndexEntry[] = [];

    for (const entry of entries) {
      if (entry.vector.length !== metadata.dimensions) {
        return err(new DimensionMismatchError(metadata.dimensions, entry.vector.length));
      }
      frozen.push(
        Object.freeze({
          chunk: Object.freeze({ ...entry.chunk }),
          vector: Object.freeze([...entry.vector]),
        })
      );
    }

    return ok(new IndexStore(Object.freeze(frozen), Object.freeze({ ...metadata })));
  }

  get entries(): readonly IndexEntry[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Null for the initial empty store */
  get metadata(): Readonly<IndexMetadata> | null {
    return this.meta;
  }

  /** Null for the initial empty store */
  get dimensions(): number | null {
    return this.meta?.dimensions ?? null;
  }

  /**
   * Sum of chunk text lengths
   */
  totalTextLength(): number {
    return this.items.reduce((total, entry) => total + entry.chunk.text.length, 0);
  }
}

/**
 * Process-wide reference to the current store
 */
export class ActiveIndex {
  private store: IndexStore = IndexStore.empty();
  private swaps = 0;

  current(): IndexStore {
    return this.store;
  }

  /**
   * Number of stores swapped in by rebuilds
   */
  get generation(): number {
    return this.swaps;
  }

  /**
   * Replace the current store with a freshly built one
   */
  swap(next: IndexStore): void {
    this.store = next;
    this.swaps++;
  }

  /**
   * Install a store read from disk, unless a rebuild already swapped one in
   *
   * @returns whether the store was installed
   */
  installLoaded(loaded: IndexStore): boolean {
    if (this.swaps > 0) {
      return false;
    }
    this.store = loaded;
    return true;
  }
}
