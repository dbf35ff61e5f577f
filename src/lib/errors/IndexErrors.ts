/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * Transient errors that may resolve on retry
   */
  TRANSIENT = 'transient',

  /**
   * Permanent errors that won't resolve on retry
   */
  PERMANENT = 'permanent',

  /**
   * Fatal errors that must stop startup
   */
  FATAL = 'fatal'
}

/**
 * Base error class for snippet index errors
 */
export abstract class SnippetIndexError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    retryable: boolean = false,
    originalError?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.retryable = retryable;
    this.originalError = originalError;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Chunk size / overlap combination that cannot produce a valid window
 */
export class InvalidChunkConfigError extends SnippetIndexError {
  public readonly size: number;
  public readonly overlap: number;

  constructor(size: number, overlap: number, reason: string) {
    super(
      `Invalid chunk configuration (size: ${size}, overlap: ${overlap}): ${reason}`,
      'INVALID_CHUNK_CONFIG',
      ErrorCategory.FATAL
    );
    this.size = size;
    this.overlap = overlap;
  }
}

/**
 * Configuration validation error
 */
export class ConfigError extends SnippetIndexError {
  public readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid configuration for '${field}': ${reason}`, 'CONFIG_ERROR', ErrorCategory.FATAL);
    this.field = field;
  }
}

/**
 * Network or HTTP failure while fetching the source document
 */
export class FetchError extends SnippetIndexError {
  public readonly url: string;
  public readonly status?: number;

  constructor(url: string, reason: string, status?: number, originalError?: Error) {
    super(
      `Failed to fetch ${url}: ${reason}`,
      'FETCH_ERROR',
      ErrorCategory.TRANSIENT,
      true,
      originalError
    );
    this.url = url;
    this.status = status;
  }
}

/**
 * The fetched document contained no extractable text
 */
export class ExtractionError extends SnippetIndexError {
  public readonly url: string;

  constructor(url: string, reason: string) {
    super(`No text could be extracted from ${url}: ${reason}`, 'EXTRACTION_ERROR', ErrorCategory.TRANSIENT, true);
    this.url = url;
  }
}

/**
 * The embedding mechanism could not produce a vector
 */
export class EmbeddingUnavailableError extends SnippetIndexError {
  public readonly embedderId: string;

  constructor(embedderId: string, reason: string, originalError?: Error) {
    super(
      `Embedder '${embedderId}' unavailable: ${reason}`,
      'EMBEDDING_UNAVAILABLE',
      ErrorCategory.TRANSIENT,
      true,
      originalError
    );
    this.embedderId = embedderId;
  }
}

/**
 * Query against an index with no entries
 */
export class EmptyIndexError extends SnippetIndexError {
  constructor() {
    super('The index is empty. Run a rebuild first.', 'EMPTY_INDEX', ErrorCategory.TRANSIENT, true);
  }
}

/**
 * Vectors of different dimensionality cannot be compared
 */
export class DimensionMismatchError extends SnippetIndexError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      `Vector dimension mismatch: expected ${expected}, got ${actual}`,
      'DIMENSION_MISMATCH',
      ErrorCategory.PERMANENT
    );
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Reading or writing the durable index failed
 */
export class PersistenceError extends SnippetIndexError {
  public readonly path: string;
  public readonly operation: 'load' | 'save' | 'clear';

  constructor(path: string, operation: 'load' | 'save' | 'clear', reason: string, originalError?: Error) {
    super(
      `Failed to ${operation} index at ${path}: ${reason}`,
      'PERSISTENCE_ERROR',
      ErrorCategory.TRANSIENT,
      true,
      originalError
    );
    this.path = path;
    this.operation = operation;
  }
}

/**
 * A rebuild was requested while another one is still running
 */
export class RebuildInProgressError extends SnippetIndexError {
  public readonly startedAt: string;

  constructor(startedAt: string) {
    super(`A rebuild is already in progress (started ${startedAt})`, 'REBUILD_IN_PROGRESS', ErrorCategory.TRANSIENT, true);
    this.startedAt = startedAt;
  }
}

/**
 * Determines if an error is retryable based on its type and properties
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof SnippetIndexError) {
    return error.retryable;
  }
  return false;
}
