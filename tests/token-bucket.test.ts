import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { TokenBucket } from '../src/cache/token-bucket.js';
import { computeBackoff, retryDelay } from '../src/cache/backoff.js';
import { TransientProviderError } from '../src/utils/errors.js';
import { FakeClock } from './fakes.js';

// ---------------------------------------------------------------------------
// TokenBucket
// ---------------------------------------------------------------------------

describe('TokenBucket', () => {
  it('grants the burst immediately', async () => {
    const clock = new FakeClock();
    const bucket = new TokenBucket({ requestsPerMinute: 60, burst: 3, minIntervalMs: 0 }, clock);
    await bucket.acquire();
    await bucket.acquire();
    await bucket.acquire();
    expect(clock.sleeps).toEqual([]);
    expect(bucket.available()).toBe(0);
  });

  it('waits for a refill once the burst is spent', async () => {
    const clock = new FakeClock();
    const bucket = new TokenBucket({ requestsPerMinute: 30, burst: 1, minIntervalMs: 0 }, clock);
    await bucket.acquire();
    await bucket.acquire();
    expect(clock.sleeps).toEqual([2_000]);
  });

  it('keeps the minimum spacing between grants', async () => {
    const clock = new FakeClock();
    const bucket = new TokenBucket({ requestsPerMinute: 600, burst: 10, minIntervalMs: 250 }, clock);
    await bucket.acquire();
    await bucket.acquire();
    expect(clock.sleeps).toEqual([250]);
  });

  it('refills up to the burst only', () => {
    const clock = new FakeClock();
    const bucket = new TokenBucket({ requestsPerMinute: 60, burst: 2, minIntervalMs: 0 }, clock);
    clock.advance(3_600_000);
    expect(bucket.available()).toBe(2);
  });

  it('rejects a waiter whose signal is already aborted', async () => {
    const bucket = new TokenBucket({ requestsPerMinute: 60, burst: 1, minIntervalMs: 0 }, new FakeClock());
    const controller = new AbortController();
    controller.abort(new Error('stop'));
    await expect(bucket.acquire(controller.signal)).rejects.toThrow('stop');
    await expect(bucket.acquire()).resolves.toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Backoff
// ---------------------------------------------------------------------------

const BACKOFF = { baseDelayMs: 500, maxDelayMs: 15_000, jitter: false, maxRetryAfterMs: 60_000 };

describe('computeBackoff', () => {
  it('doubles per attempt up to the cap', () => {
    expect([1, 2, 3, 4, 5, 6, 7].map((n) => computeBackoff(n, BACKOFF))).toEqual([
      500, 1_000, 2_000, 4_000, 8_000, 15_000, 15_000,
    ]);
  });

  it('keeps jittered delays within ±25% and under the cap', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 10 }), fc.double({ min: 0, max: 0.999, noNaN: true }), (attempt, r) => {
        const plain = computeBackoff(attempt, BACKOFF);
        const jittered = computeBackoff(attempt, { ...BACKOFF, jitter: true, random: () => r });
        expect(jittered).toBeGreaterThanOrEqual(Math.floor(plain * 0.75));
        expect(jittered).toBeLessThanOrEqual(Math.min(15_000, plain * 1.25));
      }),
      { numRuns: 100 },
    );
  });
});

describe('retryDelay', () => {
  it('prefers the provider hint, clamped', () => {
    const hinted = new TransientProviderError('test', 'slow down', { retryAfterMs: 90_000 });
    expect(retryDelay(hinted, 1, BACKOFF)).toBe(60_000);

    const plain = new TransientProviderError('test', 'HTTP 502');
    expect(retryDelay(plain, 2, BACKOFF)).toBe(1_000);
  });
});
