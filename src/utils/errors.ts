/**
 * Typed error taxonomy for release resolution.
 *
 * Every failure the engine surfaces is a `ResolutionError` with a stable
 * `code` and a `retryable` flag, so callers can tell "no such project" apart
 * from "no stable release yet" without parsing messages.
 */

import type { ZodIssue } from 'zod';

// ---------------------------------------------------------------------------
// Codes
// ---------------------------------------------------------------------------

export type ResolutionErrorCode =
  | 'NOT_FOUND'
  | 'AMBIGUOUS'
  | 'PROVIDER_TRANSIENT'
  | 'RETRY_EXHAUSTED'
  | 'PROVIDER_PERMANENT'
  | 'NO_MATCHING_RELEASE'
  | 'TIMEOUT'
  | 'INVALID_CONFIG';

/**
 * Why a release was left out by the selection pipeline.
 */
export interface ExclusionRecord {
  tag: string;
  reason: string;
}

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

export abstract class ResolutionError extends Error {
  abstract readonly code: ResolutionErrorCode;
  readonly retryable: boolean = false;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ---------------------------------------------------------------------------
// Identifier errors
// ---------------------------------------------------------------------------

export class NotFoundError extends ResolutionError {
  readonly code = 'NOT_FOUND' as const;

  constructor(
    readonly identifier: string,
    readonly provider: string | null = null,
  ) {
    super(
      provider
        ? `Project "${identifier}" was not found on ${provider}`
        : `No provider recognises project "${identifier}"`,
    );
  }
}

export class AmbiguousError extends ResolutionError {
  readonly code = 'AMBIGUOUS' as const;

  constructor(
    readonly identifier: string,
    readonly candidates: readonly string[],
  ) {
    super(
      `Project "${identifier}" exists on several providers (${candidates.join(', ')}); ` +
        'pass a provider hint to choose one',
    );
  }
}

// ---------------------------------------------------------------------------
// Provider errors
// ---------------------------------------------------------------------------

export class TransientProviderError extends ResolutionError {
  readonly code: ResolutionErrorCode = 'PROVIDER_TRANSIENT';
  override readonly retryable = true;

  constructor(
    readonly provider: string,
    message: string,
    readonly details: { status?: number; retryAfterMs?: number; cause?: unknown } = {},
  ) {
    super(`${provider}: ${message}`, { cause: details.cause });
  }

  get status(): number | undefined {
    return this.details.status;
  }

  /** Delay the provider asked for before the next request, if it sent one. */
  get retryAfterMs(): number | undefined {
    return this.details.retryAfterMs;
  }
}

/** Raised by the cache gate once every allowed attempt failed transiently. */
export class RetryExhaustedError extends TransientProviderError {
  override readonly code: ResolutionErrorCode = 'RETRY_EXHAUSTED';

  constructor(
    readonly attempts: number,
    readonly lastError: TransientProviderError,
  ) {
    super(
      lastError.provider,
      `gave up after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError.message}`,
      { status: lastError.status, retryAfterMs: lastError.retryAfterMs, cause: lastError },
    );
  }
}

export class PermanentProviderError extends ResolutionError {
  readonly code = 'PROVIDER_PERMANENT' as const;

  constructor(
    readonly provider: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`${provider}: ${message}`, options);
  }
}

// ---------------------------------------------------------------------------
// Selection / lifecycle errors
// ---------------------------------------------------------------------------

export class NoMatchingReleaseError extends ResolutionError {
  readonly code = 'NO_MATCHING_RELEASE' as const;

  constructor(
    readonly identifier: string,
    readonly total: number,
    readonly exclusions: readonly ExclusionRecord[],
  ) {
    super(
      total === 0
        ? `Project "${identifier}" has no releases`
        : `None of the ${total} releases of "${identifier}" satisfy the selection policy`,
    );
  }
}

export class TimeoutError extends ResolutionError {
  readonly code = 'TIMEOUT' as const;
  override readonly retryable = true;

  constructor(readonly timeoutMs: number) {
    super(`Resolution did not finish within ${timeoutMs}ms`);
  }
}

export class ConfigError extends ResolutionError {
  readonly code = 'INVALID_CONFIG' as const;

  constructor(
    message: string,
    readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** One line per zod issue: `path: message`. */
export function summarizeIssues(issues: readonly ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError;
}

export interface ErrorDescription {
  code: ResolutionErrorCode | 'ABORTED' | 'INTERNAL';
  message: string;
  retryable: boolean;
}

/**
 * Flatten any thrown value into a code/message pair for result objects.
 */
export function describeError(error: unknown): ErrorDescription {
  if (isResolutionError(error)) {
    return { code: error.code, message: error.message, retryable: error.retryable };
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return { code: 'ABORTED', message: error.message, retryable: false };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: 'INTERNAL', message, retryable: false };
}
