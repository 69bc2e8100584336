/**
 * Source fetcher
 *
 * Retrieves one dataset as a list of JSON records. Server errors, 429 and
 * network failures are retried with backoff; other client errors fail at once.
 * Records are returned unvalidated; the loader validates each one on its own.
 *
 * @module source/fetcher
 */

import { fetchError, LoaderError } from '../../errors.js';
import { withRetry, type BackoffConfig } from '../../utils/backoff.js';

const DEFAULT_TIMEOUT_MS = 30_000;

export interface FetchOptions {
  timeoutMs?: number;
  retry?: Partial<BackoffConfig>;
}

/**
 * Non-2xx response
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number
  ) {
    super(`GET ${url} returned HTTP ${status}`);
    this.name = 'HttpStatusError';
  }

  get retryable(): boolean {
    return this.status >= 500 || this.status === 429;
  }
}

/**
 * Join an API base URL and a dataset source path
 *
 * @example
 * buildSourceUrl('https://api.example.test/v4/', 'launches') // 'https://api.example.test/v4/launches'
 */
export function buildSourceUrl(baseUrl: string, source: string): string {
  if (/^https?:\/\//i.test(source)) {
    return source;
  }
  return `${baseUrl.replace(/\/+$/, '')}/${source.replace(/^\/+/, '')}`;
}

function isRetryable(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.retryable;
  }
  // fetch() rejects with TypeError on network failures, DOMException on timeout
  return error instanceof TypeError || (error instanceof Error && error.name === 'TimeoutError');
}

/**
 * GET a JSON array of records. A single JSON object is returned as one record.
 *
 * @throws LoaderError FETCH_ERROR
 */
export async function fetchRecords(url: string, options: FetchOptions = {}): Promise<unknown[]> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  console.error(`[Fetch] Fetching data from ${url}`);

  let body: unknown;
  try {
    body = await withRetry(
      async () => {
        const response = await fetch(url, {
          headers: { Accept: 'application/json' },
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (!response.ok) {
          throw new HttpStatusError(url, response.status);
        }
        const json: unknown = await response.json();
        return json;
      },
      isRetryable,
      options.retry
    );
  } catch (error) {
    if (error instanceof LoaderError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[Fetch] Request failed: ${reason}`);
    throw fetchError(url, `Failed to fetch ${url}: ${reason}`, error);
  }

  if (Array.isArray(body)) {
    console.error(`[Fetch] Received ${body.length} records from ${url}`);
    return body;
  }
  if (body !== null && typeof body === 'object') {
    return [body];
  }
  throw fetchError(url, `Expected a JSON array or object from ${url}, got ${body === null ? 'null' : typeof body}`);
}
