/**
 * Tag parsing rules.
 *
 * Each rule is a small pure function so the ordering heuristics can be tested
 * one at a time. `parseVersion` (version.ts) runs them in this order:
 *
 *   stripAffixes → consumeEpoch → dateRule | numericRule → parseSuffix
 *
 * and falls back to an unparseable version whenever a step rejects the tag.
 */

// ---------------------------------------------------------------------------
// Shared types
// ---------------------------------------------------------------------------

export type PreReleaseLabel = 'dev' | 'alpha' | 'beta' | 'milestone' | 'rc';

export type ParseRuleName = 'date' | 'numeric' | 'fallback';

/** Ascending stability; a version without a label outranks all of these. */
export const PRE_RELEASE_RANK: Record<PreReleaseLabel, number> = {
  dev: 0,
  alpha: 1,
  beta: 2,
  milestone: 3,
  rc: 4,
};

export interface AffixResult {
  /** Text starting at the first digit */
  body: string;
  /** Build metadata after `+`, if any */
  local: string | null;
  /** Confidence deduction for the prefix that was dropped */
  penalty: number;
}

export interface ReleaseMatch {
  kind: 'semantic' | 'date';
  rule: Exclude<ParseRuleName, 'fallback'>;
  release: number[];
  /** The same components as decimal text without leading zeros */
  digits: string[];
  /** Unconsumed text after the numeric part */
  rest: string;
}

export interface SuffixResult {
  pre: { label: PreReleaseLabel; number: number } | null;
  post: number | null;
  /** True when some trailing text carried no recognised meaning */
  ignored: boolean;
}

// ---------------------------------------------------------------------------
// Affixes
// ---------------------------------------------------------------------------

const KNOWN_PREFIX = /^(?:v|ver|version|r|rel|release)[-_. ]?$/i;
const SEPARATOR_TERMINATED = /[-_/. ]$/;
const DOTTED_NUMERIC = /^\d+\.\d+/;

/**
 * Drop `refs/tags/`, build metadata and a leading non-numeric prefix.
 *
 * Returns null when the tag has no digit, or when the prefix is glued to the
 * digits in a way that suggests a hash or word rather than a version
 * (`abc123`).
 */
export function stripAffixes(raw: string): AffixResult | null {
  let text = raw.trim();
  if (text.startsWith('refs/tags/')) text = text.slice('refs/tags/'.length);

  let local: string | null = null;
  const plus = text.indexOf('+');
  if (plus >= 0) {
    local = text.slice(plus + 1) || null;
    text = text.slice(0, plus);
  }

  const firstDigit = text.search(/\d/);
  if (firstDigit < 0) return null;

  const prefix = text.slice(0, firstDigit);
  const body = text.slice(firstDigit);

  if (prefix === '' || /^v$/i.test(prefix)) return { body, local, penalty: 0 };
  if (KNOWN_PREFIX.test(prefix)) return { body, local, penalty: 0.1 };
  if (SEPARATOR_TERMINATED.test(prefix) || DOTTED_NUMERIC.test(body)) {
    return { body, local, penalty: 0.2 };
  }
  return null;
}

// ---------------------------------------------------------------------------
// Epoch
// ---------------------------------------------------------------------------

const EPOCH = /^(\d+)[!:](?=\d)/;

/** Consume a `N!` (PEP 440) or `N:` (Debian) epoch prefix. */
export function consumeEpoch(body: string): { epoch: number; body: string; prefixed: boolean } {
  const match = EPOCH.exec(body);
  if (!match?.[1]) return { epoch: 0, body, prefixed: false };
  return {
    epoch: Number.parseInt(match[1], 10),
    body: body.slice(match[0].length),
    prefixed: true,
  };
}

// ---------------------------------------------------------------------------
// Release rules
// ---------------------------------------------------------------------------

const DATE_SEPARATED = /^((?:19[7-9]|20\d)\d)([._-])(\d{1,2})\2(\d{1,2})(?!\d)/;
const DATE_COMPACT = /^((?:19[7-9]|20\d)\d)(\d{2})(\d{2})(?!\d)/;
const MORE_COMPONENTS = /^[._-]\d/;

/**
 * Date-shaped tags: `2023.10.01`, `2023-1-5`, `20231001`.
 *
 * A date followed by further numeric components (`2024.01.15.2`) is left to
 * the numeric rule.
 */
export function dateRule(text: string): ReleaseMatch | null {
  const match = DATE_SEPARATED.exec(text) ?? DATE_COMPACT.exec(text);
  if (!match) return null;

  const year = Number.parseInt(match[1] ?? '', 10);
  const monthText = match.length === 5 ? match[3] : match[2];
  const dayText = match.length === 5 ? match[4] : match[3];
  const month = Number.parseInt(monthText ?? '', 10);
  const day = Number.parseInt(dayText ?? '', 10);
  if (!(month >= 1 && month <= 12 && day >= 1 && day <= 31)) return null;

  const rest = text.slice(match[0].length);
  if (MORE_COMPONENTS.test(rest)) return null;

  const release = [year, month, day];
  return { kind: 'date', rule: 'date', release, digits: release.map(String), rest };
}

const NUMERIC_GROUPS = /^\d+(?:[._-]\d+)*/;

/** Numeric groups split on `.`, `-` and `_`: `1.2.3`, `1_1_1`, `1.0.0-1`. */
export function numericRule(text: string): ReleaseMatch | null {
  const match = NUMERIC_GROUPS.exec(text);
  if (!match) return null;
  const digits = match[0].split(/[._-]/).map((group) => group.replace(/^0+(?=\d)/, ''));
  const release = digits.map((group) => Number.parseInt(group, 10));
  return { kind: 'semantic', rule: 'numeric', release, digits, rest: text.slice(match[0].length) };
}

export const RELEASE_RULES: ReadonlyArray<(text: string) => ReleaseMatch | null> = [
  dateRule,
  numericRule,
];

// ---------------------------------------------------------------------------
// Suffix markers
// ---------------------------------------------------------------------------

type MarkerMeaning = PreReleaseLabel | 'post' | 'stable';

interface Marker {
  pattern: RegExp;
  meaning: MarkerMeaning;
}

// Anchored at the start of the suffix; whole words must not run into letters.
const MARKERS: Marker[] = [
  { pattern: /^(?:dev|devel|snapshot|nightly|test)(?![a-z])[._-]?(\d*)/, meaning: 'dev' },
  { pattern: /^alpha(?![a-z])[._-]?(\d*)/, meaning: 'alpha' },
  { pattern: /^a(\d+)/, meaning: 'alpha' },
  { pattern: /^beta(?![a-z])[._-]?(\d*)/, meaning: 'beta' },
  { pattern: /^b(\d+)/, meaning: 'beta' },
  { pattern: /^milestone(?![a-z])[._-]?(\d*)/, meaning: 'milestone' },
  { pattern: /^m(\d+)/, meaning: 'milestone' },
  { pattern: /^(?:rc|cr|preview|prerelease|pre)(?![a-z])[._-]?(\d*)/, meaning: 'rc' },
  { pattern: /^c(\d+)/, meaning: 'rc' },
  { pattern: /^(?:post|patch|rev)(?![a-z])[._-]?(\d*)/, meaning: 'post' },
  { pattern: /^[pr](\d+)/, meaning: 'post' },
  { pattern: /^(?:final|release|ga|stable)(?![a-z])/, meaning: 'stable' },
];

const EMBEDDED_PRE =
  /(?:^|[^a-z])(alpha|beta|rc|dev|devel|snapshot|nightly|preview|pre|milestone)(?![a-z])[._-]?(\d*)/;

const LEADING_SEPARATORS = /^[._~ -]+/;

function markerToSuffix(meaning: MarkerMeaning, digits: string | undefined, ignored: boolean): SuffixResult {
  const number = digits ? Number.parseInt(digits, 10) : 0;
  if (meaning === 'stable') return { pre: null, post: null, ignored };
  if (meaning === 'post') return { pre: null, post: number, ignored };
  return { pre: { label: meaning, number }, post: null, ignored };
}

function embeddedLabel(word: string): PreReleaseLabel {
  switch (word) {
    case 'alpha':
      return 'alpha';
    case 'beta':
      return 'beta';
    case 'milestone':
      return 'milestone';
    case 'rc':
    case 'pre':
    case 'preview':
      return 'rc';
    default:
      return 'dev';
  }
}

/**
 * Interpret what follows the numeric part of a tag.
 *
 * Returns null when the suffix is glued to the digits without a separator
 * and is not a known marker (`3f4a2c`, `1.1.1w`), which marks the whole tag
 * unparseable.
 */
export function parseSuffix(rest: string): SuffixResult | null {
  if (rest === '') return { pre: null, post: null, ignored: false };

  const lower = rest.toLowerCase();
  const stripped = lower.replace(LEADING_SEPARATORS, '');
  const separated = stripped.length !== lower.length;

  for (const marker of MARKERS) {
    const match = marker.pattern.exec(stripped);
    if (match) {
      const trailing = stripped.slice(match[0].length);
      return markerToSuffix(marker.meaning, match[1], trailing !== '');
    }
  }

  if (!separated) return null;

  const embedded = EMBEDDED_PRE.exec(stripped);
  if (embedded?.[1]) {
    return markerToSuffix(embeddedLabel(embedded[1]), embedded[2], true);
  }

  return { pre: null, post: null, ignored: stripped !== '' };
}
