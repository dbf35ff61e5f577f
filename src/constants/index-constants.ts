/**
 * Defaults for chunking, retrieval and scraping
 *
 * @module index-constants
 */

/** Maximum characters per chunk */
export const DEFAULT_CHUNK_SIZE = 1000;

/** Characters shared by adjacent chunks */
export const DEFAULT_CHUNK_OVERLAP = 200;

/** Minimum cosine similarity for a chunk to count as a match (inclusive) */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.12;

/** Maximum characters of chunk text returned as context */
export const DEFAULT_MAX_CONTEXT_LENGTH = 600;

/** Upper bound on a source document fetch */
export const DEFAULT_FETCH_TIMEOUT_MS = 10000;

/** Feature space of the local hashing embedder */
export const DEFAULT_EMBED_DIMENSIONS = 1024;

/** Minimum token length kept by the hashing embedder */
export const MIN_TOKEN_LENGTH = 3;

export const DEFAULT_OPENAI_MODEL = 'text-embedding-3-small';

export const DEFAULT_DATA_DIR = '.snippetindex';

export const DEFAULT_INDEX_FILE = 'index.json';

/** Durable index format version */
export const INDEX_FORMAT_VERSION = 1;

/**
 * Desktop browser agent sent with every source fetch
 */
export const SCRAPER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

/**
 * Elements dropped before text extraction
 */
export const STRIPPED_ELEMENTS = ['script', 'style', 'noscript', 'nav', 'footer', 'header'] as const;
