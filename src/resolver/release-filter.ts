/**
 * Release Filter: applies a SelectionPolicy to normalized release records.
 *
 * Stages run in a fixed order and the first stage that rejects a record
 * names the reason, so every dropped release has exactly one exclusion
 * record:
 *
 *   draft → prerelease → unparseable → major → even → formal → exclude →
 *   only → versionRange → havingAsset
 */

import semver from 'semver';
import type { AssetDescriptor, ReleaseRecord } from '../release/release-record.js';
import type { SelectionPolicy } from '../schemas/policy.schema.js';
import type { ExclusionRecord } from '../utils/errors.js';
import { formatVersion, toSemverString } from '../version/version.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

/**
 * Result of policy filtering.
 */
export interface FilterResult {
  kept: ReleaseRecord[];
  exclusions: ExclusionRecord[];
}

/** Returns the exclusion reason, or null to keep the record. */
type Stage = (record: ReleaseRecord) => string | null;

// ---------------------------------------------------------------------------
// Text constraints
// ---------------------------------------------------------------------------

/**
 * Test `text` against a constraint: substring by default, regular
 * expression after `~`, negated by a leading `!`.
 */
export function matchesTextConstraint(text: string, constraint: string): boolean {
  const negated = constraint.startsWith('!');
  const body = negated ? constraint.slice(1) : constraint;
  const matched = body.startsWith('~') ? new RegExp(body.slice(1)).test(text) : text.includes(body);
  return negated ? !matched : matched;
}

/** Whether a release's assets satisfy a `havingAsset` policy value. */
export function hasMatchingAsset(
  assets: readonly AssetDescriptor[],
  havingAsset: true | string,
): boolean {
  if (havingAsset === true) return assets.length > 0;
  return assets.some((asset) => matchesTextConstraint(asset.name, havingAsset));
}

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

function majorStage(prefix: string): Stage {
  const pinned = prefix.split('.').map(Number);
  return (record) => {
    const { release } = record.version;
    const inside = release.length > 0 && pinned.every((part, i) => (release[i] ?? 0) === part);
    return inside ? null : `outside pinned version ${prefix}`;
  };
}

function versionRangeStage(range: string): Stage {
  return (record) => {
    const rendered = toSemverString(record.version);
    if (rendered === null || !semver.satisfies(rendered, range, { includePrerelease: true })) {
      return `version ${formatVersion(record.version)} does not satisfy range ${range}`;
    }
    return null;
  };
}

function buildStages(policy: SelectionPolicy): Stage[] {
  const stages: Stage[] = [(record) => (record.isDraft ? 'draft release' : null)];

  if (!policy.includePrereleases) {
    stages.push((record) => (record.isPrerelease ? 'prerelease' : null));
  }
  if (!policy.includeUnparseable) {
    stages.push((record) => (record.version.kind === 'unparseable' ? 'unparseable version' : null));
  }
  if (policy.major !== undefined) stages.push(majorStage(policy.major));
  if (policy.even) {
    stages.push((record) =>
      (record.version.release[1] ?? 0) % 2 === 0 ? null : 'odd minor version',
    );
  }
  if (policy.formal) {
    stages.push((record) => (record.isFormal ? null : 'bare tag without a release object'));
  }

  const { exclude, only, versionRange } = policy;
  if (exclude !== undefined) {
    stages.push((record) =>
      matchesTextConstraint(record.tag, exclude) ? `tag matches exclude "${exclude}"` : null,
    );
  }
  if (only !== undefined) {
    stages.push((record) =>
      matchesTextConstraint(record.tag, only) ? null : `tag does not match only "${only}"`,
    );
  }
  if (versionRange !== undefined) stages.push(versionRangeStage(versionRange));

  return stages;
}

// ---------------------------------------------------------------------------
// filterReleases
// ---------------------------------------------------------------------------

function runStages(records: readonly ReleaseRecord[], stages: readonly Stage[]): FilterResult {
  const kept: ReleaseRecord[] = [];
  const exclusions: ExclusionRecord[] = [];

  for (const record of records) {
    let reason: string | null = null;
    for (const stage of stages) {
      reason = stage(record);
      if (reason !== null) break;
    }
    if (reason === null) {
      kept.push(record);
    } else {
      exclusions.push({ tag: record.tag, reason });
    }
  }

  return { kept, exclusions };
}

/**
 * Apply every stage of `policy`, asset requirement included, to the records
 * as they are.
 */
export function filterReleases(
  records: readonly ReleaseRecord[],
  policy: SelectionPolicy,
): FilterResult {
  const stages = buildStages(policy);
  const { havingAsset } = policy;
  if (havingAsset !== undefined) {
    stages.push((record) => (hasMatchingAsset(record.assets, havingAsset) ? null : assetReason(havingAsset)));
  }
  return runStages(records, stages);
}

/**
 * Every stage except the asset requirement; the resolver runs it first so
 * that deferred asset lists are only fetched for surviving records.
 */
export function filterBeforeAssets(
  records: readonly ReleaseRecord[],
  policy: SelectionPolicy,
): FilterResult {
  return runStages(records, buildStages(policy));
}

/** The asset requirement on its own. */
export function filterByAsset(
  records: readonly ReleaseRecord[],
  havingAsset: true | string,
): FilterResult {
  return runStages(records, [
    (record) => (hasMatchingAsset(record.assets, havingAsset) ? null : assetReason(havingAsset)),
  ]);
}

function assetReason(havingAsset: true | string): string {
  return havingAsset === true ? 'no release assets' : `no asset matching "${havingAsset}"`;
}
