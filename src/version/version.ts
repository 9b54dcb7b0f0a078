/**
 * Version Model: turns arbitrary tag strings into totally ordered values.
 *
 * Ordering key, most significant first:
 *   parseable > unparseable (two unparseable tags compare by raw text)
 *   epoch
 *   release components, zero-padded (1.2 == 1.2.0)
 *   pre-release: none > rc > milestone > beta > alpha > dev, then its number
 *   post-release: none < post0 < post1 ...
 * Build metadata (`+local`) never takes part.
 */

import {
  PRE_RELEASE_RANK,
  RELEASE_RULES,
  consumeEpoch,
  parseSuffix,
  stripAffixes,
  type ParseRuleName,
  type PreReleaseLabel,
} from './parse-rules.js';

export type { ParseRuleName, PreReleaseLabel } from './parse-rules.js';

// ---------------------------------------------------------------------------
// Data model
// ---------------------------------------------------------------------------

export type VersionKind = 'semantic' | 'date' | 'unparseable';

export interface PreRelease {
  readonly label: PreReleaseLabel;
  readonly number: number;
}

export interface Version {
  /** Tag text exactly as the provider reported it */
  readonly raw: string;
  readonly kind: VersionKind;
  readonly epoch: number;
  /** Numeric components; empty for unparseable tags */
  readonly release: readonly number[];
  /**
   * `release` as decimal text. Components past 2^53 lose precision as
   * numbers, so ordering and formatting use these.
   */
  readonly releaseDigits: readonly string[];
  readonly pre: PreRelease | null;
  readonly post: number | null;
  /** Build metadata, ignored in comparisons */
  readonly local: string | null;
  /** The parse rule that produced the release components */
  readonly rule: ParseRuleName;
  readonly epochPrefixed: boolean;
  /** 0 for unparseable tags, 1 for a clean tag, in between for heuristics */
  readonly confidence: number;
}

// ---------------------------------------------------------------------------
// parseVersion
// ---------------------------------------------------------------------------

function unparseable(raw: string, local: string | null = null): Version {
  return Object.freeze({
    raw,
    kind: 'unparseable' as const,
    epoch: 0,
    release: Object.freeze([]),
    releaseDigits: Object.freeze([]),
    pre: null,
    post: null,
    local,
    rule: 'fallback' as const,
    epochPrefixed: false,
    confidence: 0,
  });
}

/**
 * Parse a tag or label into a Version. Never throws: tags without a usable
 * numeric component come back with `kind: 'unparseable'`.
 */
export function parseVersion(raw: string): Version {
  const affixes = stripAffixes(raw);
  if (!affixes) return unparseable(raw);

  const { epoch, body, prefixed } = consumeEpoch(affixes.body);

  for (const rule of RELEASE_RULES) {
    const match = rule(body);
    if (!match) continue;

    const suffix = parseSuffix(match.rest);
    if (!suffix) return unparseable(raw, affixes.local);

    let confidence = 1 - affixes.penalty;
    if (suffix.ignored) confidence -= 0.2;
    if (match.release.length === 1 && match.kind === 'semantic') confidence -= 0.2;

    return Object.freeze({
      raw,
      kind: match.kind,
      epoch,
      release: Object.freeze([...match.release]),
      releaseDigits: Object.freeze([...match.digits]),
      pre: suffix.pre ? Object.freeze({ ...suffix.pre }) : null,
      post: suffix.post,
      local: affixes.local,
      rule: match.rule,
      epochPrefixed: prefixed,
      confidence: Math.max(0.1, Math.round(confidence * 100) / 100),
    });
  }

  return unparseable(raw, affixes.local);
}

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

export type Ordering = -1 | 0 | 1;

function sign(n: number): Ordering {
  if (n < 0) return -1;
  if (n > 0) return 1;
  return 0;
}

/** Code-unit ordering, independent of locale. */
export function compareText(a: string, b: string): Ordering {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Orders canonical decimal strings of any length. */
function compareDigits(a: string, b: string): Ordering {
  if (a.length !== b.length) return a.length < b.length ? -1 : 1;
  return compareText(a, b);
}

const FINAL_RANK = Number.MAX_SAFE_INTEGER;

/**
 * Total preorder over versions: -1 when `a` is older, 1 when newer, 0 when
 * they denote the same version.
 */
export function compareVersions(a: Version, b: Version): Ordering {
  const aParsed = a.kind !== 'unparseable';
  const bParsed = b.kind !== 'unparseable';
  if (!aParsed || !bParsed) {
    if (aParsed !== bParsed) return aParsed ? 1 : -1;
    return compareText(a.raw, b.raw);
  }

  if (a.epoch !== b.epoch) return sign(a.epoch - b.epoch);

  const length = Math.max(a.releaseDigits.length, b.releaseDigits.length);
  for (let i = 0; i < length; i++) {
    const order = compareDigits(a.releaseDigits[i] ?? '0', b.releaseDigits[i] ?? '0');
    if (order !== 0) return order;
  }

  const aRank = a.pre ? PRE_RELEASE_RANK[a.pre.label] : FINAL_RANK;
  const bRank = b.pre ? PRE_RELEASE_RANK[b.pre.label] : FINAL_RANK;
  if (aRank !== bRank) return sign(aRank - bRank);
  if (a.pre && b.pre && a.pre.number !== b.pre.number) {
    return sign(a.pre.number - b.pre.number);
  }

  return sign((a.post ?? -1) - (b.post ?? -1));
}

export function versionsEqual(a: Version, b: Version): boolean {
  return compareVersions(a, b) === 0;
}

export function isPrereleaseVersion(version: Version): boolean {
  return version.pre !== null;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/**
 * Canonical text for a version: `1.2.0`, `2.0.0-rc1`, `1:3.1`, `1.0.post2`.
 * Unparseable versions print their raw tag.
 */
export function formatVersion(version: Version): string {
  if (version.kind === 'unparseable') return version.raw;

  let text = version.releaseDigits.join('.');
  if (version.epoch > 0) text = `${version.epoch}:${text}`;
  if (version.pre) {
    text += `-${version.pre.label}${version.pre.number > 0 ? version.pre.number : ''}`;
  }
  if (version.post !== null) text += `.post${version.post}`;
  return text;
}

/**
 * Semver rendering used for range checks: the first three components, with
 * the pre-release label as a dotted identifier. Null for unparseable tags.
 */
export function toSemverString(version: Version): string | null {
  if (version.kind === 'unparseable') return null;
  const [major = '0', minor = '0', patch = '0'] = version.releaseDigits;
  const core = `${major}.${minor}.${patch}`;
  return version.pre ? `${core}-${version.pre.label}.${version.pre.number}` : core;
}

// ---------------------------------------------------------------------------
// Caller-supplied versions
// ---------------------------------------------------------------------------

/**
 * Parse a version typed by a caller (e.g. "current version" arguments).
 *
 * Returns null for text that is really a project reference (a URL or an
 * `owner/repo` slug) or that carries no version at all.
 */
export function parseVersionArgument(text: string): Version | null {
  const trimmed = text.trim();
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) return null;
  if (trimmed.includes('/') && !trimmed.includes(' ')) return null;
  const version = parseVersion(trimmed);
  return version.kind === 'unparseable' ? null : version;
}
