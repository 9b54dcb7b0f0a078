/**
 * Update check: is there a release newer than the version we have?
 *
 * The `constraint` names the largest kind of update the caller accepts:
 * `patch` stays on the current major.minor line, `minor` on the current
 * major, `major` (or none) allows anything.
 */

import semver from 'semver';
import type { ReleaseRecord } from '../release/release-record.js';
import { parsePolicy } from '../schemas/policy.schema.js';
import { ConfigError } from '../utils/errors.js';
import {
  compareVersions,
  formatVersion,
  parseVersionArgument,
  toSemverString,
  type Version,
} from '../version/version.js';
import type { ResolveOptions, Resolver } from './resolver.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export type UpdateType = 'patch' | 'minor' | 'major';

export interface UpdateCheckOptions extends ResolveOptions {
  policy?: unknown;
  constraint?: UpdateType;
}

export interface AvailableUpdate {
  release: ReleaseRecord;
  current: Version;
  /** null when the versions differ only past the third component or in labels */
  updateType: UpdateType | null;
}

// ---------------------------------------------------------------------------
// classifyUpdateType
// ---------------------------------------------------------------------------

/**
 * Classify an update by comparing the semver renderings of two versions.
 */
export function classifyUpdateType(current: Version, target: Version): UpdateType | null {
  const from = toSemverString(current);
  const to = toSemverString(target);
  if (from === null || to === null) return null;

  const a = semver.parse(from);
  const b = semver.parse(to);
  if (!a || !b || semver.eq(a, b)) return null;

  if (a.major !== b.major) return 'major';
  if (a.minor !== b.minor) return 'minor';
  if (a.patch !== b.patch) return 'patch';
  return null;
}

// ---------------------------------------------------------------------------
// checkForUpdate
// ---------------------------------------------------------------------------

function pinFor(current: Version, constraint: UpdateType | undefined): string | undefined {
  const [major = 0, minor = 0] = current.release;
  if (constraint === 'patch') return `${major}.${minor}`;
  if (constraint === 'minor') return `${major}`;
  return undefined;
}

/**
 * Latest release of `input` when it is newer than `currentVersion`, else
 * null. The policy's own `major` pin is replaced by the constraint's.
 * @throws ConfigError when `currentVersion` is not a version
 */
export async function checkForUpdate(
  resolver: Resolver,
  input: string,
  currentVersion: string,
  options: UpdateCheckOptions = {},
): Promise<AvailableUpdate | null> {
  const current = parseVersionArgument(currentVersion);
  if (!current) throw new ConfigError(`"${currentVersion}" is not a version`);

  const { policy, constraint, ...resolveOptions } = options;
  const selection = parsePolicy(policy);
  const pin = pinFor(current, constraint);

  const release = await resolver.resolve(
    input,
    { ...selection, major: pin ?? selection.major },
    resolveOptions,
  );
  if (compareVersions(release.version, current) <= 0) return null;

  return {
    release,
    current,
    updateType: classifyUpdateType(current, release.version),
  };
}

/** One-line description, e.g. "1.2.3 → 1.3.0 (minor)". */
export function describeUpdate(update: AvailableUpdate): string {
  const kind = update.updateType ? ` (${update.updateType})` : '';
  return `${formatVersion(update.current)} → ${formatVersion(update.release.version)}${kind}`;
}
