/**
 * Project identifiers: what the caller typed, and what a provider made of it.
 */

// ---------------------------------------------------------------------------
// Data models
// ---------------------------------------------------------------------------

export type IdentifierShape = 'url' | 'slug' | 'name';

/**
 * Caller input classified by shape, before any provider has looked at it.
 */
export interface IdentifierInput {
  /** Text exactly as given */
  raw: string;
  /** Text with any `provider:` hint removed */
  text: string;
  shape: IdentifierShape;
  /** Provider id from the `at` option or a `provider:` prefix */
  hint: string | null;
  /** Parsed URL for the `url` shape */
  url: URL | null;
  /** Path segments: slug parts, or URL path parts without a trailing `.git` */
  segments: readonly string[];
}

/**
 * A project as one provider knows it. Built once per resolution.
 */
export interface ProjectIdentifier {
  readonly provider: string;
  /** Provider-native id, e.g. "owner/repo" or a package name */
  readonly canonical: string;
  readonly displayName: string;
  /** Human-facing page of the project */
  readonly url: string;
  /** Provider API location of the project */
  readonly apiPath: string;
}

export function projectIdentifier(fields: ProjectIdentifier): ProjectIdentifier {
  return Object.freeze({ ...fields });
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const SCP_LIKE = /^[\w.-]+@([\w.-]+):(.+)$/;
const HINT_PREFIX = /^([a-z][a-z0-9-]*):(?!\/\/)(.+)$/;
const SLUG = /^[\w.-]+(?:\/[\w.-]+)+$/;
const HOST_LIKE = /^[a-z0-9-]+(?:\.[a-z0-9-]+)*\.[a-z]{2,}$/i;

function pathSegments(pathname: string): string[] {
  const segments = pathname.split('/').filter((part) => part !== '');
  const last = segments.length - 1;
  if (last >= 0) {
    const lastSegment = segments[last];
    if (lastSegment?.endsWith('.git')) segments[last] = lastSegment.slice(0, -4);
  }
  return segments.map((part) => safeDecode(part));
}

/** decodeURIComponent that leaves malformed escapes as they are. */
export function safeDecode(part: string): string {
  try {
    return decodeURIComponent(part);
  } catch {
    return part;
  }
}

function toUrl(text: string): URL | null {
  try {
    return new URL(text);
  } catch {
    return null;
  }
}

/**
 * Classify caller input. `knownHints` lists the provider ids a `provider:`
 * prefix may name; other prefixes are left in the text.
 */
export function parseIdentifierInput(
  raw: string,
  options: { at?: string | null; knownHints?: readonly string[] } = {},
): IdentifierInput {
  let text = raw.trim();
  let hint = options.at ?? null;

  const prefixed = HINT_PREFIX.exec(text);
  if (prefixed?.[1] && prefixed[2] && (options.knownHints ?? []).includes(prefixed[1])) {
    hint ??= prefixed[1];
    text = prefixed[2];
  }

  const scp = SCP_LIKE.exec(text);
  if (scp?.[1] && scp[2] && !SCHEME.test(text)) {
    const url = toUrl(`https://${scp[1]}/${scp[2]}`);
    if (url) return { raw, text, shape: 'url', hint, url, segments: pathSegments(url.pathname) };
  }

  if (SCHEME.test(text)) {
    const url = toUrl(text.replace(/^git\+/i, ''));
    if (url) return { raw, text, shape: 'url', hint, url, segments: pathSegments(url.pathname) };
  }

  if (SLUG.test(text)) {
    const [first = ''] = text.split('/');
    if (HOST_LIKE.test(first)) {
      const url = toUrl(`https://${text}`);
      if (url) return { raw, text, shape: 'url', hint, url, segments: pathSegments(url.pathname) };
    }
    return { raw, text, shape: 'slug', hint, url: null, segments: pathSegments(text) };
  }

  return { raw, text, shape: 'name', hint, url: null, segments: [text] };
}

/** True for input that explicitly points at a git repository. */
export function looksLikeGitUrl(input: IdentifierInput): boolean {
  if (input.shape !== 'url') return false;
  return /^git\+/i.test(input.text) || /\.git\/?$/i.test(input.text) || input.url?.protocol === 'git:';
}

/** Exact match, or any subdomain for entries written `.example.org`. */
export function hostMatches(hostnames: readonly string[], host: string): boolean {
  return hostnames.some((name) => name === host || (name.startsWith('.') && host.endsWith(name)));
}

/** Host of a URL input, lower-cased and without `www.`. */
export function inputHost(input: IdentifierInput): string | null {
  if (!input.url) return null;
  return input.url.hostname.toLowerCase().replace(/^www\./, '');
}
