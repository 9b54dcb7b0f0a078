/**
 * Retry delay computation: exponential backoff with optional jitter, unless
 * the provider told us how long to wait.
 */

import type { TransientProviderError } from '../utils/errors.js';

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Spread delays by ±25% */
  jitter: boolean;
  /** Upper bound for provider-supplied Retry-After hints */
  maxRetryAfterMs: number;
  random?: () => number;
}

/**
 * Delay before retry number `attempt` (1 = first retry):
 * `min(maxDelayMs, baseDelayMs * 2^(attempt - 1))`.
 */
export function computeBackoff(attempt: number, options: BackoffOptions): number {
  const exponential = options.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  let delay = Math.min(exponential, options.maxDelayMs);

  if (options.jitter) {
    const random = options.random ?? Math.random;
    delay = Math.min(options.maxDelayMs, Math.floor(delay * (0.75 + random() * 0.5)));
  }

  return delay;
}

/** Honor `retryAfterMs` when present (clamped), otherwise back off. */
export function retryDelay(
  error: TransientProviderError,
  attempt: number,
  options: BackoffOptions,
): number {
  const hint = error.retryAfterMs;
  if (hint !== undefined && hint >= 0) return Math.min(hint, options.maxRetryAfterMs);
  return computeBackoff(attempt, options);
}
