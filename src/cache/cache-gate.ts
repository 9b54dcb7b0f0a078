/**
 * Cache & Rate Gate: memoizes provider payloads and paces outbound calls.
 *
 * Flow for `fetch(key, schema, producer)`:
 * 1. Fresh entry (younger than the TTL) → return it, producer untouched
 * 2. Otherwise join the in-flight fetch for the key, or start one
 * 3. Each attempt waits for a permit from the provider's token bucket, then
 *    calls the producer with the cached etag for a conditional request
 * 4. Transient failures back off and retry up to `maxAttempts`; permanent
 *    ones propagate at once
 * 5. Only a completed, validated, non-aborted result replaces the entry
 */

import type { z } from 'zod';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { abortError, raceAbort } from '../utils/abort.js';
import {
  PermanentProviderError,
  RetryExhaustedError,
  TransientProviderError,
} from '../utils/errors.js';
import { retryDelay, type BackoffOptions } from './backoff.js';
import { systemClock, type Clock } from './clock.js';
import { TokenBucket, type RateLimitSpec } from './token-bucket.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface CacheKey {
  provider: string;
  project: string;
  /** Shape of the request, e.g. "releases?page=1" */
  query: string;
}

export interface CacheEntry {
  readonly key: CacheKey;
  /** Raw provider payload; validated on every read */
  readonly payload: unknown;
  readonly fetchedAt: number;
  /** Conditional-fetch token (ETag) */
  readonly etag: string | null;
}

export type ProducerResult =
  | { kind: 'fresh'; payload: unknown; etag?: string | null }
  | { kind: 'not-modified' };

export interface ProducerContext {
  /** ETag of the entry being refreshed, if any */
  etag: string | null;
  signal: AbortSignal;
  /** 1-based */
  attempt: number;
}

export type Producer = (context: ProducerContext) => Promise<ProducerResult>;

export interface FetchOptions {
  signal?: AbortSignal;
  /** Serve an expired entry when every attempt failed transiently */
  allowStale?: boolean;
}

export interface CacheGateOptions extends BackoffOptions {
  ttlMs: number;
  /** How long an expired entry is kept for conditional fetches and stale fallback */
  staleRetentionMs: number;
  /** Total attempts per fetch, including the first */
  maxAttempts: number;
  defaultRateLimit: RateLimitSpec;
  rateLimits?: Record<string, RateLimitSpec>;
  clock?: Clock;
  logger?: Logger;
}

export interface CacheGateStats {
  hits: number;
  misses: number;
  producerCalls: number;
  retries: number;
  staleServed: number;
  entries: number;
  inFlight: number;
}

interface InFlight {
  controller: AbortController;
  waiters: number;
  promise: Promise<unknown>;
}

export function cacheKeyId(key: CacheKey): string {
  return JSON.stringify([key.provider, key.project, key.query]);
}

// ---------------------------------------------------------------------------
// CacheGate
// ---------------------------------------------------------------------------

export class CacheGate {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, InFlight>();
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly rateLimits: Map<string, RateLimitSpec>;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private closed = false;
  private readonly counters = {
    hits: 0,
    misses: 0,
    producerCalls: 0,
    retries: 0,
    staleServed: 0,
  };

  constructor(private readonly options: CacheGateOptions) {
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger).child({ component: 'cache-gate' });
    this.rateLimits = new Map(Object.entries(options.rateLimits ?? {}));
  }

  /**
   * Return the payload for `key`, decoded with `schema`.
   *
   * A payload that fails `schema` is never stored and surfaces as a
   * PermanentProviderError.
   */
  async fetch<T>(
    key: CacheKey,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    producer: Producer,
    options: FetchOptions = {},
  ): Promise<T> {
    const raw = await this.fetchRaw(key, schema, producer, options);
    return decode(key, schema, raw);
  }

  peek(key: CacheKey): CacheEntry | undefined {
    return this.entries.get(cacheKeyId(key));
  }

  invalidate(key: CacheKey): boolean {
    return this.entries.delete(cacheKeyId(key));
  }

  /** Drop every entry of one provider; returns how many were removed. */
  invalidateProvider(provider: string): number {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.key.provider === provider) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  /** Abort in-flight fetches and refuse further use. */
  close(): void {
    this.closed = true;
    for (const flight of this.inFlight.values()) {
      flight.controller.abort(abortError('Cache gate closed'));
    }
    this.inFlight.clear();
    this.entries.clear();
  }

  stats(): CacheGateStats {
    return { ...this.counters, entries: this.entries.size, inFlight: this.inFlight.size };
  }

  /** Replace one provider's request budget; its bucket starts over full. */
  setRateLimit(provider: string, spec: RateLimitSpec): void {
    this.rateLimits.set(provider, spec);
    this.buckets.delete(provider);
  }

  bucketFor(provider: string): TokenBucket {
    let bucket = this.buckets.get(provider);
    if (!bucket) {
      const spec = this.rateLimits.get(provider) ?? this.options.defaultRateLimit;
      bucket = new TokenBucket(spec, this.clock);
      this.buckets.set(provider, bucket);
    }
    return bucket;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private isFresh(entry: CacheEntry): boolean {
    return this.clock.now() - entry.fetchedAt < this.options.ttlMs;
  }

  /** Past stale retention: no longer useful even for revalidation. */
  private isExpired(entry: CacheEntry): boolean {
    return this.clock.now() - entry.fetchedAt > this.options.ttlMs + this.options.staleRetentionMs;
  }

  private async fetchRaw<T>(
    key: CacheKey,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    producer: Producer,
    options: FetchOptions,
  ): Promise<unknown> {
    if (this.closed) throw new Error('Cache gate is closed');
    options.signal?.throwIfAborted();

    const id = cacheKeyId(key);
    const entry = this.entries.get(id);
    if (entry && this.isFresh(entry)) {
      this.counters.hits++;
      return entry.payload;
    }
    if (entry && this.isExpired(entry)) this.entries.delete(id);
    this.counters.misses++;

    const flight = this.inFlight.get(id) ?? this.startFlight(id, key, schema, producer);
    flight.waiters++;
    try {
      return await raceAbort(flight.promise, options.signal);
    } catch (error) {
      const stale = this.entries.get(id);
      if (options.allowStale && stale && error instanceof TransientProviderError) {
        this.counters.staleServed++;
        this.logger.warn('serving stale payload after provider failure', {
          provider: key.provider,
          project: key.project,
          query: key.query,
          ageMs: this.clock.now() - stale.fetchedAt,
          error: error.message,
        });
        return stale.payload;
      }
      throw error;
    } finally {
      flight.waiters--;
      if (flight.waiters === 0 && this.inFlight.get(id) === flight) {
        // Every caller walked away: cancel the shared fetch.
        this.inFlight.delete(id);
        flight.controller.abort(abortError('All callers abandoned the fetch'));
      }
    }
  }

  private startFlight<T>(
    id: string,
    key: CacheKey,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    producer: Producer,
  ): InFlight {
    const controller = new AbortController();
    const flight: InFlight = { controller, waiters: 0, promise: Promise.resolve() };
    flight.promise = this.runWithRetries(id, key, schema, producer, controller.signal).finally(() => {
      if (this.inFlight.get(id) === flight) this.inFlight.delete(id);
    });
    this.inFlight.set(id, flight);
    return flight;
  }

  private async runWithRetries<T>(
    id: string,
    key: CacheKey,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    producer: Producer,
    signal: AbortSignal,
  ): Promise<unknown> {
    const bucket = this.bucketFor(key.provider);

    for (let attempt = 1; ; attempt++) {
      await bucket.acquire(signal);
      const previous = this.entries.get(id);
      this.counters.producerCalls++;

      try {
        const result = await producer({ etag: previous?.etag ?? null, signal, attempt });
        signal.throwIfAborted();

        if (result.kind === 'not-modified') {
          if (!previous) {
            throw new PermanentProviderError(
              key.provider,
              `answered "not modified" for ${key.query} without a cached copy`,
            );
          }
          this.store(id, key, previous.payload, previous.etag);
          return previous.payload;
        }

        decode(key, schema, result.payload);
        this.store(id, key, result.payload, result.etag ?? null);
        return result.payload;
      } catch (error) {
        if (signal.aborted || !(error instanceof TransientProviderError)) throw error;
        if (attempt >= this.options.maxAttempts) {
          throw new RetryExhaustedError(attempt, error);
        }

        const delayMs = retryDelay(error, attempt, this.options);
        this.counters.retries++;
        this.logger.warn('transient provider failure, backing off', {
          provider: key.provider,
          project: key.project,
          attempt,
          delayMs,
          error: error.message,
        });
        await this.clock.sleep(delayMs, signal);
      }
    }
  }

  private store(id: string, key: CacheKey, payload: unknown, etag: string | null): void {
    for (const [other, entry] of this.entries) {
      if (this.isExpired(entry)) this.entries.delete(other);
    }
    this.entries.set(id, Object.freeze({ key: { ...key }, payload, fetchedAt: this.clock.now(), etag }));
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function decode<T>(key: CacheKey, schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
  const parsed = schema.safeParse(payload);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  throw new PermanentProviderError(
    key.provider,
    `unexpected payload for ${key.query}${where}: ${issue?.message ?? 'invalid'}`,
  );
}
