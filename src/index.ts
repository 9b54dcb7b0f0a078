/**
 * Latest release resolution engine.
 *
 * Given a project identifier (URL, `owner/repo` slug or bare name) and a
 * selection policy, finds the newest release across git forges, package
 * indexes, Wikipedia infoboxes and plain download pages.
 *
 * `findLatest` wires the full pipeline:
 * validate request → build context → resolve → format → close context
 */

import { z } from 'zod';
import { formatRelease } from './release/format.js';
import type { ReleaseRecord } from './release/release-record.js';
import {
  createResolutionContext,
  type ContextOverrides,
  type ResolutionContext,
} from './resolver/context.js';
import { OutputFormat } from './schemas/release.schema.js';
import { ConfigError, describeError, summarizeIssues, type ErrorDescription } from './utils/errors.js';

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

export const VERSION = '0.1.0';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export const FindLatestRequest = z.object({
  /** URL, slug or name of the project */
  input: z.string().trim().min(1),
  /** Raw selection policy; validated by the resolver */
  policy: z.unknown().optional(),
  format: OutputFormat.default('version'),
  assetsFilter: z.string().optional(),
  /** Provider id to use instead of automatic selection */
  at: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  /** Raw resolver configuration */
  config: z.unknown().optional(),
});

export type FindLatestRequest = z.input<typeof FindLatestRequest>;

export interface FindLatestOverrides extends ContextOverrides {
  signal?: AbortSignal;
}

export type FindLatestResult =
  | {
      success: true;
      release: ReleaseRecord;
      /** The release rendered in the requested format */
      output: string;
    }
  | {
      success: false;
      code: ErrorDescription['code'];
      error: string;
      retryable: boolean;
    };

// ---------------------------------------------------------------------------
// Re-exports for consumer convenience
// ---------------------------------------------------------------------------

export type { Version, VersionKind, PreRelease, Ordering } from './version/version.js';
export {
  parseVersion,
  compareVersions,
  versionsEqual,
  isPrereleaseVersion,
  formatVersion,
  parseVersionArgument,
} from './version/version.js';
export type { ReleaseRecord, AssetDescriptor } from './release/release-record.js';
export { compareReleases, maxRelease } from './release/release-record.js';
export { formatRelease, toReleaseSummary, specTag } from './release/format.js';
export { ReleaseSummary, OutputFormat } from './schemas/release.schema.js';
export { SelectionPolicySchema, parsePolicy, DEFAULT_POLICY } from './schemas/policy.schema.js';
export type { SelectionPolicy, SelectionPolicyInput } from './schemas/policy.schema.js';
export { ResolverConfigSchema, loadConfig } from './schemas/config.schema.js';
export type { ResolverConfig, ResolverConfigInput } from './schemas/config.schema.js';
export { filterReleases } from './resolver/release-filter.js';
export { Resolver } from './resolver/resolver.js';
export type { ResolveOptions, Resolution } from './resolver/resolver.js';
export { checkForUpdate, classifyUpdateType, describeUpdate } from './resolver/update-check.js';
export type { AvailableUpdate, UpdateCheckOptions, UpdateType } from './resolver/update-check.js';
export { createResolutionContext } from './resolver/context.js';
export type { ContextOverrides, ResolutionContext } from './resolver/context.js';
export type { ProviderClient, ProviderDeps, ProviderCapabilities } from './providers/provider-client.js';
export type { ProjectIdentifier } from './providers/identifier.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LogEntry, LogHandler, LogLevel } from './utils/logger.js';
export * from './utils/errors.js';

// ---------------------------------------------------------------------------
// findLatest: main orchestrator
// ---------------------------------------------------------------------------

/**
 * Resolve and format the latest release for one request.
 *
 * Steps:
 * 1. Validate the request with the FindLatestRequest schema
 * 2. Build a resolution context from the request's configuration
 * 3. Resolve the release under the request's policy
 * 4. Render it in the requested format
 * 5. Close the context, whatever happened
 *
 * Never throws: every failure comes back as `{ success: false, code }`.
 */
export async function findLatest(
  options: unknown,
  overrides: FindLatestOverrides = {},
): Promise<FindLatestResult> {
  // Step 1: Validate request
  const parsed = FindLatestRequest.safeParse(options);
  if (!parsed.success) {
    return failure(
      new ConfigError(
        `Request validation failed: ${summarizeIssues(parsed.error.issues)}`,
        parsed.error.issues,
      ),
    );
  }
  const request = parsed.data;
  const { signal, ...contextOverrides } = overrides;

  // Step 2: Build context
  let context: ResolutionContext;
  try {
    context = createResolutionContext(request.config, contextOverrides);
  } catch (err) {
    return failure(err);
  }

  try {
    // Step 3: Resolve
    const { project, release } = await context.resolver.resolveDetailed(
      request.input,
      request.policy,
      { at: request.at, timeoutMs: request.timeoutMs, signal },
    );

    // Step 4: Format
    const output = formatRelease(release, project, request.format, {
      assetsFilter: request.assetsFilter,
    });
    return { success: true, release, output };
  } catch (err) {
    context.logger.debug('resolution failed', { input: request.input, error: String(err) });
    return failure(err);
  } finally {
    // Step 5: Close
    context.close();
  }
}

function failure(err: unknown): FindLatestResult {
  const { code, message, retryable } = describeError(err);
  return { success: false, code, error: message, retryable };
}
