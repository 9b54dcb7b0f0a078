/**
 * Resolution context. Owns everything with state: logger, HTTP client,
 * cache gate, provider registry and the resolver built on them.
 *
 * Nothing is module-global. Two contexts never share a cache entry or a
 * rate bucket, so tests build one per case.
 */

import { CacheGate } from '../cache/cache-gate.js';
import type { Clock } from '../cache/clock.js';
import { HttpClient, type FetchLike } from '../providers/http-client.js';
import type { ProviderClient, ProviderDeps } from '../providers/provider-client.js';
import {
  ProviderRegistry,
  createDefaultProviders,
  providerSettings,
} from '../providers/registry.js';
import { loadConfig, type ResolverConfig } from '../schemas/config.schema.js';
import { createLogger, type LogHandler, type Logger } from '../utils/logger.js';
import { Resolver } from './resolver.js';

export interface ContextOverrides {
  /** Replaces the global fetch */
  fetch?: FetchLike;
  clock?: Clock;
  /** Random source for backoff jitter */
  random?: () => number;
  logger?: Logger;
  /** Used when no logger is given */
  logHandler?: LogHandler;
  /**
   * Builds the provider list; defaults to the built-in clients. `deps(id)`
   * returns what a client for `id` is constructed with.
   */
  providers?: (deps: (id: string) => ProviderDeps) => ProviderClient[];
}

export interface ResolutionContext {
  readonly config: ResolverConfig;
  readonly logger: Logger;
  readonly http: HttpClient;
  readonly gate: CacheGate;
  readonly registry: ProviderRegistry;
  readonly resolver: Resolver;
  /** Abort in-flight work and drop cached payloads. */
  close(): void;
}

/**
 * Build a context from raw configuration.
 * @throws ConfigError when the configuration is invalid
 */
export function createResolutionContext(
  rawConfig: unknown = {},
  overrides: ContextOverrides = {},
): ResolutionContext {
  const config = loadConfig(rawConfig);
  const logger =
    overrides.logger ?? createLogger({ level: config.logLevel, handler: overrides.logHandler });

  const { clock } = overrides;
  const http = new HttpClient({
    userAgent: config.userAgent,
    fetch: overrides.fetch,
    logger,
    now: clock ? () => clock.now() : undefined,
  });

  const gate = new CacheGate({
    ttlMs: config.cache.ttlMs,
    staleRetentionMs: config.cache.staleRetentionMs,
    maxAttempts: config.retry.maxAttempts,
    baseDelayMs: config.retry.baseDelayMs,
    maxDelayMs: config.retry.maxDelayMs,
    jitter: config.retry.jitter,
    maxRetryAfterMs: config.retry.maxRetryAfterMs,
    random: overrides.random,
    defaultRateLimit: config.rateLimit,
    clock,
    logger,
  });

  const deps = (id: string): ProviderDeps => ({
    http,
    gate,
    logger: logger.child({ provider: id }),
    settings: providerSettings(config, id),
  });

  const providers = (overrides.providers ?? createDefaultProviders)(deps);
  for (const provider of providers) gate.setRateLimit(provider.id, provider.rateLimit);

  const registry = new ProviderRegistry(providers);
  const resolver = new Resolver({
    registry,
    logger,
    timeoutMs: config.timeoutMs,
    allowStale: config.allowStale,
  });

  return {
    config,
    logger,
    http,
    gate,
    registry,
    resolver,
    close: () => gate.close(),
  };
}
