import { z } from 'zod';
import { ConfigError, summarizeIssues } from '../utils/errors.js';

/**
 * Resolver configuration. Every field has a default, so `loadConfig({})`
 * yields a working setup against the public services.
 */

export const RateLimitSchema = z.object({
  requestsPerMinute: z.number().positive(),
  burst: z.number().int().positive(),
  minIntervalMs: z.number().int().nonnegative().default(0),
});

export type RateLimit = z.infer<typeof RateLimitSchema>;

export const ProviderConfigSchema = z.object({
  /** API root, for self-hosted instances */
  baseUrl: z.string().url().optional(),
  /** Extra hostnames whose URLs this provider claims */
  hostnames: z.array(z.string().min(1)).default([]),
  rateLimit: RateLimitSchema.optional(),
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ResolverConfigSchema = z.object({
  /** Wall-clock budget per resolution */
  timeoutMs: z.number().int().positive().default(30_000),
  cache: z
    .object({
      ttlMs: z.number().int().nonnegative().default(10 * 60_000),
      staleRetentionMs: z.number().int().nonnegative().default(24 * 60 * 60_000),
    })
    .default({}),
  retry: z
    .object({
      /** Total attempts, including the first */
      maxAttempts: z.number().int().min(1).max(10).default(4),
      baseDelayMs: z.number().int().nonnegative().default(500),
      maxDelayMs: z.number().int().nonnegative().default(15_000),
      jitter: z.boolean().default(true),
      maxRetryAfterMs: z.number().int().nonnegative().default(60_000),
    })
    .default({}),
  /** Used by providers without a rate limit of their own */
  rateLimit: RateLimitSchema.default({ requestsPerMinute: 60, burst: 10 }),
  providers: z.record(z.string(), ProviderConfigSchema).default({}),
  /** Access tokens keyed by provider id, sent as-is */
  tokens: z.record(z.string(), z.string().min(1)).default({}),
  userAgent: z.string().min(1).default('latest-release-resolver/0.1.0'),
  logLevel: LogLevelSchema.default('warn'),
  /** Serve expired cache entries when a provider keeps failing */
  allowStale: z.boolean().default(false),
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;
export type ResolverConfigInput = z.input<typeof ResolverConfigSchema>;

// ---------------------------------------------------------------------------
// Provider defaults
// ---------------------------------------------------------------------------

export interface ProviderDefaults {
  baseUrl: string;
  rateLimit: RateLimit;
}

export const PROVIDER_DEFAULTS: Readonly<Record<string, ProviderDefaults>> = {
  github: {
    baseUrl: 'https://api.github.com',
    rateLimit: { requestsPerMinute: 30, burst: 10, minIntervalMs: 0 },
  },
  gitlab: {
    baseUrl: 'https://gitlab.com/api/v4',
    rateLimit: { requestsPerMinute: 60, burst: 10, minIntervalMs: 0 },
  },
  pypi: {
    baseUrl: 'https://pypi.org',
    rateLimit: { requestsPerMinute: 120, burst: 20, minIntervalMs: 0 },
  },
  npm: {
    baseUrl: 'https://registry.npmjs.org',
    rateLimit: { requestsPerMinute: 120, burst: 20, minIntervalMs: 0 },
  },
  git: {
    baseUrl: 'https://github.com',
    rateLimit: { requestsPerMinute: 60, burst: 5, minIntervalMs: 100 },
  },
  wikipedia: {
    baseUrl: 'https://en.wikipedia.org',
    rateLimit: { requestsPerMinute: 30, burst: 5, minIntervalMs: 200 },
  },
  web: {
    baseUrl: 'https://example.invalid',
    rateLimit: { requestsPerMinute: 30, burst: 5, minIntervalMs: 500 },
  },
};

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Validate raw configuration and fill in defaults.
 * @throws ConfigError listing the zod issues
 */
export function loadConfig(raw: unknown = {}): ResolverConfig {
  const parsed = ResolverConfigSchema.safeParse(raw ?? {});
  if (parsed.success) return parsed.data;

  throw new ConfigError(
    `Invalid resolver configuration: ${summarizeIssues(parsed.error.issues)}`,
    parsed.error.issues,
  );
}
