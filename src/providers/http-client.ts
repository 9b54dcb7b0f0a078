/**
 * Thin wrapper over the global `fetch` that speaks the gate's producer
 * protocol and maps HTTP outcomes onto the provider error taxonomy.
 */

import type { ProducerResult } from '../cache/cache-gate.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { PermanentProviderError, TransientProviderError } from '../utils/errors.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  userAgent: string;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  logger?: Logger;
  now?: () => number;
}

export interface HttpRequest {
  /** Provider id, used in error messages */
  provider: string;
  url: string;
  headers?: Record<string, string>;
  /** Sent as If-None-Match */
  etag?: string | null;
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Header helpers
// ---------------------------------------------------------------------------

/**
 * Milliseconds to wait according to `Retry-After` (seconds or HTTP date) or
 * GitHub-style `x-ratelimit-reset` (epoch seconds).
 */
export function parseRetryAfter(headers: Headers, now: number): number | undefined {
  const retryAfter = headers.get('retry-after');
  if (retryAfter !== null && retryAfter.trim() !== '') {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) return Math.max(0, date - now);
  }

  const reset = headers.get('x-ratelimit-reset');
  if (reset !== null) {
    const epochSeconds = Number(reset);
    if (Number.isFinite(epochSeconds)) return Math.max(0, epochSeconds * 1000 - now);
  }

  return undefined;
}

/**
 * Turn a non-2xx, non-304 response into the matching provider error.
 */
export function errorForResponse(provider: string, response: Response, now: number): Error {
  const { status } = response;
  const retryAfterMs = parseRetryAfter(response.headers, now);
  const label = `HTTP ${status}${response.statusText ? ` ${response.statusText}` : ''} for ${response.url || 'request'}`;

  if (status === 429 || status === 408) {
    return new TransientProviderError(provider, label, { status, retryAfterMs });
  }
  if (status === 403 && (response.headers.get('x-ratelimit-remaining') === '0' || retryAfterMs !== undefined)) {
    return new TransientProviderError(provider, `rate limited (${label})`, { status, retryAfterMs });
  }
  if (status >= 500 && status !== 501) {
    return new TransientProviderError(provider, label, { status, retryAfterMs });
  }
  return new PermanentProviderError(provider, label, status);
}

// ---------------------------------------------------------------------------
// HttpClient
// ---------------------------------------------------------------------------

export class HttpClient {
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (options.logger ?? silentLogger).child({ component: 'http' });
    this.now = options.now ?? Date.now;
  }

  async getJson(request: HttpRequest): Promise<ProducerResult> {
    const response = await this.send(request, 'application/json');
    if (response === null) return { kind: 'not-modified' };

    const text = await this.readBody(request, response);
    try {
      const payload: unknown = JSON.parse(text);
      return { kind: 'fresh', payload, etag: response.headers.get('etag') };
    } catch (error) {
      throw new PermanentProviderError(request.provider, `invalid JSON from ${request.url}`, response.status, {
        cause: error,
      });
    }
  }

  async getText(request: HttpRequest): Promise<ProducerResult> {
    const response = await this.send(request, 'text/html, text/plain;q=0.9, */*;q=0.8');
    if (response === null) return { kind: 'not-modified' };
    const payload = await this.readBody(request, response);
    return { kind: 'fresh', payload, etag: response.headers.get('etag') };
  }

  /** Returns null for 304; throws provider errors for everything unsuccessful. */
  private async send(request: HttpRequest, accept: string): Promise<Response | null> {
    const headers: Record<string, string> = {
      Accept: accept,
      'User-Agent': this.options.userAgent,
      ...request.headers,
    };
    if (request.etag) headers['If-None-Match'] = request.etag;

    this.logger.debug('GET', { provider: request.provider, url: request.url });

    let response: Response;
    try {
      response = await this.fetchImpl(request.url, { headers, signal: request.signal });
    } catch (error) {
      if (request.signal?.aborted) throw request.signal.reason;
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientProviderError(request.provider, `network error for ${request.url}: ${message}`, {
        cause: error,
      });
    }

    if (response.status === 304) return null;
    if (response.ok) return response;
    throw errorForResponse(request.provider, response, this.now());
  }

  private async readBody(request: HttpRequest, response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      if (request.signal?.aborted) throw request.signal.reason;
      throw new TransientProviderError(request.provider, `connection dropped while reading ${request.url}`, {
        cause: error,
      });
    }
  }
}
