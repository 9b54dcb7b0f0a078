/**
 * Resolver: identifier in, one Release Record out.
 *
 * Flow:
 * 1. Classify the identifier and plan which providers may claim it
 * 2. Resolve the project (fallback chain, or concurrent with ambiguity check)
 * 3. List raw releases through the cache gate and normalize them
 * 4. Filter by policy, fetching deferred asset lists only when needed
 * 5. Pick the greatest record; nothing left → NoMatchingReleaseError
 *
 * The whole call runs under a wall-clock budget. Expiry aborts in-flight
 * work and surfaces TimeoutError; a caller abort surfaces the caller's reason.
 */

import type { ListOptions, ProviderClient } from '../providers/provider-client.js';
import { parseIdentifierInput, type ProjectIdentifier } from '../providers/identifier.js';
import type { ProviderRegistry } from '../providers/registry.js';
import {
  compareReleases,
  maxRelease,
  withAssets,
  type ReleaseRecord,
} from '../release/release-record.js';
import { parsePolicy } from '../schemas/policy.schema.js';
import { linkSignal, raceAbort } from '../utils/abort.js';
import {
  NoMatchingReleaseError,
  TimeoutError,
  isResolutionError,
  type ExclusionRecord,
} from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { formatVersion } from '../version/version.js';
import { planProviders, selectProject } from './provider-selection.js';
import { filterBeforeAssets, filterByAsset, hasMatchingAsset } from './release-filter.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface ResolveOptions {
  /** Provider id to use instead of automatic selection */
  at?: string;
  signal?: AbortSignal;
  /** Overrides the configured wall-clock budget */
  timeoutMs?: number;
  /** Serve expired cache entries when the provider keeps failing */
  allowStale?: boolean;
}

export interface ResolverOptions {
  registry: ProviderRegistry;
  logger: Logger;
  timeoutMs: number;
  allowStale?: boolean;
}

/** A resolved release together with where it came from. */
export interface Resolution {
  project: ProjectIdentifier;
  release: ReleaseRecord;
  /** Records the provider reported */
  total: number;
  exclusions: ExclusionRecord[];
}

interface Collected {
  project: ProjectIdentifier;
  client: ProviderClient;
  records: ReleaseRecord[];
}

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

export class Resolver {
  private readonly logger: Logger;

  constructor(private readonly options: ResolverOptions) {
    this.logger = options.logger.child({ component: 'resolver' });
  }

  /**
   * Latest release of `input` under `policy`.
   * @throws ResolutionError (or the caller's abort reason)
   */
  async resolve(
    input: string,
    policy: unknown = {},
    options: ResolveOptions = {},
  ): Promise<ReleaseRecord> {
    const resolution = await this.resolveDetailed(input, policy, options);
    return resolution.release;
  }

  /** Like `resolve`, keeping the project and the exclusion log. */
  async resolveDetailed(
    input: string,
    policy: unknown = {},
    options: ResolveOptions = {},
  ): Promise<Resolution> {
    const selection = parsePolicy(policy);
    return this.withBudget(options, async (listOptions) => {
      const { project, client, records } = await this.collect(input, options.at, listOptions);
      const before = filterBeforeAssets(records, selection);

      let kept = before.kept;
      const exclusions = [...before.exclusions];
      if (selection.havingAsset !== undefined) {
        const newestFirst = [...kept].sort((a, b) => compareReleases(b, a));
        const enriched = await this.withDeferredAssets(
          client,
          project,
          newestFirst,
          selection.havingAsset,
          { listOptions, stopAtFirstMatch: true },
        );
        const byAsset = filterByAsset(enriched, selection.havingAsset);
        kept = byAsset.kept;
        exclusions.push(...byAsset.exclusions);
      }

      const release = maxRelease(kept);
      if (!release) {
        this.logger.info('no release satisfies the policy', {
          project: project.canonical,
          provider: project.provider,
          total: records.length,
          excluded: exclusions.length,
        });
        throw new NoMatchingReleaseError(project.displayName, records.length, exclusions);
      }

      this.logger.debug('resolved', {
        project: project.canonical,
        provider: project.provider,
        tag: release.tag,
        version: formatVersion(release.version),
      });
      return { project, release, total: records.length, exclusions };
    });
  }

  /**
   * Every release of `input` that satisfies `policy`, newest first.
   */
  async candidates(
    input: string,
    policy: unknown = {},
    options: ResolveOptions = {},
  ): Promise<ReleaseRecord[]> {
    const selection = parsePolicy(policy);
    return this.withBudget(options, async (listOptions) => {
      const { project, client, records } = await this.collect(input, options.at, listOptions);
      let kept = filterBeforeAssets(records, selection).kept;
      if (selection.havingAsset !== undefined) {
        const enriched = await this.withDeferredAssets(
          client,
          project,
          kept,
          selection.havingAsset,
          { listOptions, stopAtFirstMatch: false },
        );
        kept = filterByAsset(enriched, selection.havingAsset).kept;
      }
      return kept.sort((a, b) => compareReleases(b, a));
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async withBudget<T>(
    options: ResolveOptions,
    work: (listOptions: ListOptions) => Promise<T>,
  ): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    const linked = linkSignal(options.signal, timeoutMs, () => new TimeoutError(timeoutMs));
    const listOptions: ListOptions = {
      signal: linked.signal,
      allowStale: options.allowStale ?? this.options.allowStale ?? false,
    };

    try {
      return await raceAbort(work(listOptions), linked.signal);
    } catch (error) {
      // Whatever the in-flight work failed with, the abort reason explains it.
      if (linked.signal.aborted) throw linked.signal.reason;
      throw error;
    } finally {
      linked.dispose();
    }
  }

  private async collect(
    input: string,
    at: string | undefined,
    listOptions: ListOptions,
  ): Promise<Collected> {
    const { registry } = this.options;
    const identifier = parseIdentifierInput(input, { at, knownHints: registry.ids() });
    const plan = planProviders(identifier, registry);
    this.logger.debug('provider plan', {
      input,
      mode: plan.mode,
      providers: plan.providers.map((client) => client.id),
    });

    const project = await selectProject(identifier, plan, listOptions, this.logger);
    const client = registry.get(project.provider);
    if (!client) throw new Error(`Provider "${project.provider}" is not registered`);

    const raw = await client.listReleases(project, listOptions);
    const records: ReleaseRecord[] = [];
    for (const item of raw) {
      const record = client.toReleaseRecord(item, project);
      if (record) records.push(record);
    }
    return { project, client, records };
  }

  /**
   * Fill in asset lists the provider did not send with the release list.
   * A failed lookup leaves the record without assets and logs a warning.
   */
  private async withDeferredAssets(
    client: ProviderClient,
    project: ProjectIdentifier,
    records: readonly ReleaseRecord[],
    havingAsset: true | string,
    options: { listOptions: ListOptions; stopAtFirstMatch: boolean },
  ): Promise<ReleaseRecord[]> {
    const listAssets = client.listAssets?.bind(client);
    if (client.capabilities.assets !== 'deferred' || !listAssets) return [...records];

    const result: ReleaseRecord[] = [];
    let matched = false;
    for (const record of records) {
      if (matched || record.assets.length > 0) {
        result.push(record);
      } else {
        result.push(await this.fetchAssets(listAssets, project, record, options.listOptions));
      }
      const last = result[result.length - 1];
      if (options.stopAtFirstMatch && last && hasMatchingAsset(last.assets, havingAsset)) matched = true;
    }
    return result;
  }

  private async fetchAssets(
    listAssets: NonNullable<ProviderClient['listAssets']>,
    project: ProjectIdentifier,
    record: ReleaseRecord,
    listOptions: ListOptions,
  ): Promise<ReleaseRecord> {
    try {
      return withAssets(record, await listAssets(project, record, listOptions));
    } catch (error) {
      if (listOptions.signal?.aborted || !isResolutionError(error)) throw error;
      this.logger.warn('asset list unavailable, treating release as having none', {
        provider: project.provider,
        project: project.canonical,
        tag: record.tag,
        error: error.message,
      });
      return record;
    }
  }
}
