/**
 * Provider client interface: one implementation per hosting service.
 *
 * Injectable for testability: the resolver only sees this interface, and the
 * concrete clients only see the HTTP client and cache gate they are handed.
 */

import type { z } from 'zod';
import type { CacheGate, FetchOptions } from '../cache/cache-gate.js';
import type { RateLimitSpec } from '../cache/token-bucket.js';
import type { AssetDescriptor, ReleaseRecord } from '../release/release-record.js';
import type { Logger } from '../utils/logger.js';
import { NotFoundError, PermanentProviderError } from '../utils/errors.js';
import type { HttpClient } from './http-client.js';
import type { IdentifierInput, ProjectIdentifier } from './identifier.js';

// ---------------------------------------------------------------------------
// Data models
// ---------------------------------------------------------------------------

export interface ProviderCapabilities {
  /** Provider reports a prerelease flag per release */
  nativePrerelease: boolean;
  /** Provider reports unpublished (draft, yanked, deprecated) releases */
  nativeDraft: boolean;
  /** Provider reports publish times */
  timestamps: boolean;
  /** Whether asset lists come with the release list, need a call each, or never exist */
  assets: 'inline' | 'deferred' | 'none';
}

export type ListOptions = FetchOptions;

/** Per-provider settings from configuration. */
export interface ProviderSettings {
  baseUrl: string;
  token: string | null;
  /** Extra hostnames served by this provider (self-hosted instances) */
  hostnames: readonly string[];
  rateLimit: RateLimitSpec;
}

/** What every client is constructed with. */
export interface ProviderDeps {
  http: HttpClient;
  gate: CacheGate;
  logger: Logger;
  settings: ProviderSettings;
}

// ---------------------------------------------------------------------------
// Client interface
// ---------------------------------------------------------------------------

export interface ProviderClient<TRaw = unknown> {
  readonly id: string;
  readonly capabilities: ProviderCapabilities;
  readonly rateLimit: RateLimitSpec;
  /** Hosts whose URLs this provider claims; `.example.org` covers subdomains */
  readonly hostnames: readonly string[];

  /** Cheap, offline check: could this input name a project here? */
  accepts(input: IdentifierInput): boolean;

  /**
   * Look the project up.
   * @throws NotFoundError when the provider has no such project
   */
  resolveIdentifier(input: IdentifierInput, options?: ListOptions): Promise<ProjectIdentifier>;

  /** Raw release items, through the cache gate. */
  listReleases(project: ProjectIdentifier, options?: ListOptions): Promise<readonly TRaw[]>;

  /** Normalize one raw item; null when the item does not describe a release. */
  toReleaseRecord(raw: TRaw, project: ProjectIdentifier): ReleaseRecord | null;

  /** Assets of one release, for providers that do not list them inline. */
  listAssets?(
    project: ProjectIdentifier,
    record: ReleaseRecord,
    options?: ListOptions,
  ): Promise<readonly AssetDescriptor[]>;
}

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

export interface CachedRequest {
  provider: string;
  project: string;
  query: string;
  url: string;
  headers?: Record<string, string>;
}

/** GET a JSON document through the gate, decoded with `schema`. */
export function cachedJson<T>(
  deps: ProviderDeps,
  request: CachedRequest,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: ListOptions = {},
): Promise<T> {
  const { provider, project, query, url, headers } = request;
  return deps.gate.fetch(
    { provider, project, query },
    schema,
    ({ etag, signal }) => deps.http.getJson({ provider, url, headers, etag, signal }),
    options,
  );
}

/** GET a text document through the gate, decoded with `schema`. */
export function cachedText<T>(
  deps: ProviderDeps,
  request: CachedRequest,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: ListOptions = {},
): Promise<T> {
  const { provider, project, query, url, headers } = request;
  return deps.gate.fetch(
    { provider, project, query },
    schema,
    ({ etag, signal }) => deps.http.getText({ provider, url, headers, etag, signal }),
    options,
  );
}

/**
 * Map an HTTP 404/410 from the provider to NotFoundError; rethrow the rest.
 */
export async function notFoundOn404<T>(
  provider: string,
  identifier: string,
  lookup: () => Promise<T>,
): Promise<T> {
  try {
    return await lookup();
  } catch (error) {
    if (error instanceof PermanentProviderError && (error.status === 404 || error.status === 410)) {
      throw new NotFoundError(identifier, provider);
    }
    throw error;
  }
}

/** Join a base URL and a path without doubling slashes. */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
