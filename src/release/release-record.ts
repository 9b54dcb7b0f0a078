/**
 * Release Record: one provider-reported release, normalized.
 *
 * Records are built by provider clients through `buildReleaseRecord` and are
 * deeply frozen; anything that wants a different shape makes a new record.
 */

import {
  compareText,
  compareVersions,
  isPrereleaseVersion,
  parseVersion,
  type Ordering,
  type Version,
} from '../version/version.js';

// ---------------------------------------------------------------------------
// Data model
// ---------------------------------------------------------------------------

export interface AssetDescriptor {
  readonly name: string;
  /** Download reference */
  readonly url: string;
}

export interface ReleaseRecord {
  readonly tag: string;
  readonly version: Version;
  readonly publishedAt: Date | null;
  readonly isPrerelease: boolean;
  /** Whether `isPrerelease` came from the provider or from the tag text */
  readonly prereleaseSource: 'provider' | 'inferred';
  readonly isDraft: boolean;
  /** True when the provider reported a release object, not a bare tag */
  readonly isFormal: boolean;
  readonly assets: readonly AssetDescriptor[];
  /** Source archive for this release, when the provider exposes one */
  readonly sourceUrl: string | null;
  /** Human-facing page for this release */
  readonly pageUrl: string | null;
}

export interface ReleaseRecordInput {
  tag: string;
  /** Text to parse when it differs from the tag (e.g. a release name) */
  versionText?: string;
  publishedAt?: string | Date | null;
  /** Provider-declared flag; undefined means "not reported" */
  prerelease?: boolean;
  draft?: boolean;
  formal?: boolean;
  assets?: AssetDescriptor[];
  sourceUrl?: string | null;
  pageUrl?: string | null;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function toDate(value: string | Date | null | undefined): Date | null {
  if (value === null || value === undefined || value === '') return null;
  const date = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Build a frozen record. A prerelease flag reported by the provider wins;
 * without one the flag is inferred from the parsed tag.
 */
export function buildReleaseRecord(input: ReleaseRecordInput): ReleaseRecord {
  const version = parseVersion(input.versionText ?? input.tag);
  const declared = input.prerelease;

  const assets = (input.assets ?? []).map((asset) =>
    Object.freeze({ name: asset.name, url: asset.url }),
  );

  return Object.freeze({
    tag: input.tag,
    version,
    publishedAt: toDate(input.publishedAt),
    isPrerelease: declared ?? isPrereleaseVersion(version),
    prereleaseSource: declared === undefined ? ('inferred' as const) : ('provider' as const),
    isDraft: input.draft ?? false,
    isFormal: input.formal ?? true,
    assets: Object.freeze(assets),
    sourceUrl: input.sourceUrl ?? null,
    pageUrl: input.pageUrl ?? null,
  });
}

/** Copy of a record with its asset list replaced. */
export function withAssets(
  record: ReleaseRecord,
  assets: readonly AssetDescriptor[],
): ReleaseRecord {
  return Object.freeze({
    ...record,
    assets: Object.freeze(assets.map((asset) => Object.freeze({ ...asset }))),
  });
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

/**
 * Version order, then publish time (more recent wins, unknown loses), then
 * tag text, so that selection is deterministic.
 */
export function compareReleases(a: ReleaseRecord, b: ReleaseRecord): Ordering {
  const byVersion = compareVersions(a.version, b.version);
  if (byVersion !== 0) return byVersion;

  const aTime = a.publishedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
  const bTime = b.publishedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
  if (aTime !== bTime) return aTime < bTime ? -1 : 1;

  return compareText(a.tag, b.tag);
}

/** Greatest record by `compareReleases`, or null for an empty list. */
export function maxRelease(records: readonly ReleaseRecord[]): ReleaseRecord | null {
  let best: ReleaseRecord | null = null;
  for (const record of records) {
    if (best === null || compareReleases(record, best) > 0) best = record;
  }
  return best;
}
