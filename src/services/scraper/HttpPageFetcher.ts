/**
 * HTTP Page Fetcher
 *
 * Downloads the source document with a mandatory timeout covering the whole
 * request, body included. Network failures, timeouts and non-2xx responses all
 * become FetchError; nothing is retried here.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { Result, ok, err, toError } from '../../lib/result-types.js';
import { FetchError } from '../../lib/errors/IndexErrors.js';
import { SCRAPER_USER_AGENT } from '../../constants/index-constants.js';

/**
 * A downloaded document
 */
export interface FetchedPage {
  url: string;
  status: number;
  body: string;
}

/**
 * Source of raw documents
 */
export interface PageFetcher {
  fetch(url: string): Promise<Result<FetchedPage, FetchError>>;
}

export interface HttpPageFetcherOptions {
  timeoutMs: number;
  userAgent?: string;
  /** Replaces the network transport (used by tests) */
  adapter?: AxiosAdapter;
}

function isTimeoutCode(code: string | undefined): boolean {
  return code === 'ECONNABORTED' || code === 'ETIMEDOUT' || code === 'ERR_CANCELED';
}

export class HttpPageFetcher implements PageFetcher {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(options: HttpPageFetcherOptions) {
    if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be positive, got ${options.timeoutMs}`);
    }
    this.timeoutMs = options.timeoutMs;
    this.http = axios.create({
      timeout: options.timeoutMs,
      headers: { 'User-Agent': options.userAgent ?? SCRAPER_USER_AGENT },
      responseType: 'text',
      // Status is checked below so every failure carries the same error type
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async fetch(url: string): Promise<Result<FetchedPage, FetchError>> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return err(new FetchError(url, 'invalid URL'));
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return err(new FetchError(url, `unsupported protocol ${parsed.protocol}`));
    }

    try {
      // axios's timeout only covers an idle socket; the signal also bounds a slow body
      const response = await this.http.get<unknown>(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (response.status < 200 || response.status >= 300) {
        return err(
          new FetchError(url, `HTTP ${response.status}: ${response.statusText}`, response.status)
        );
      }
      if (typeof response.data !== 'string') {
        return err(new FetchError(url, 'response body is not text', response.status));
      }

      return ok({ url, status: response.status, body: response.data });
    } catch (error) {
      if (axios.isCancel(error) || (axios.isAxiosError(error) && isTimeoutCode(error.code))) {
        return err(new FetchError(url, `timed out after ${this.timeoutMs}ms`, undefined, toError(error)));
      }
      const cause = toError(error);
      return err(new FetchError(url, cause.message, undefined, cause));
    }
  }
}
