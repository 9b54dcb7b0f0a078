/**
 * Token bucket with a minimum spacing between grants.
 *
 * Waiters are served strictly in arrival order; an aborted waiter leaves the
 * queue without holding up the ones behind it.
 */

import type { Clock } from './clock.js';

export interface RateLimitSpec {
  /** Sustained budget */
  requestsPerMinute: number;
  /** Bucket capacity */
  burst: number;
  /** Minimum time between two grants */
  minIntervalMs: number;
}

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private lastGrant = Number.NEGATIVE_INFINITY;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly spec: RateLimitSpec,
    private readonly clock: Clock,
  ) {
    this.tokens = spec.burst;
    this.lastRefill = clock.now();
  }

  /** Resolves once a permit is granted; rejects with the signal's reason. */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.queue.then(() => this.waitForPermit(signal));
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  /** Permits available right now (fractional). */
  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;
    this.tokens = Math.min(
      this.spec.burst,
      this.tokens + (elapsed * this.spec.requestsPerMinute) / 60_000,
    );
    this.lastRefill = now;
  }

  private async waitForPermit(signal?: AbortSignal): Promise<void> {
    for (;;) {
      signal?.throwIfAborted();
      this.refill();

      const now = this.clock.now();
      const spacingWait = this.lastGrant + this.spec.minIntervalMs - now;
      if (this.tokens >= 1 && spacingWait <= 0) {
        this.tokens -= 1;
        this.lastGrant = now;
        return;
      }

      const tokenWait =
        this.tokens >= 1
          ? 0
          : Math.ceil(((1 - this.tokens) * 60_000) / this.spec.requestsPerMinute);
      await this.clock.sleep(Math.max(spacingWait, tokenWait, 1), signal);
    }
  }
}
