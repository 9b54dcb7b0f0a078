/**
 * Generic web page: collects versions from archive download links
 * (`foo-1.2.3.tar.gz`) and release tag links (`.../tag/v1.2.3`).
 */

import { z } from 'zod';
import type { RateLimitSpec } from '../cache/token-bucket.js';
import {
  buildReleaseRecord,
  type AssetDescriptor,
  type ReleaseRecord,
} from '../release/release-record.js';
import { PermanentProviderError } from '../utils/errors.js';
import { extractLinks } from './html.js';
import { projectIdentifier, safeDecode, type IdentifierInput, type ProjectIdentifier } from './identifier.js';
import {
  cachedText,
  notFoundOn404,
  type ListOptions,
  type ProviderCapabilities,
  type ProviderClient,
  type ProviderDeps,
} from './provider-client.js';

export interface ScrapedRelease {
  tag: string;
  archives: AssetDescriptor[];
  pageUrl: string | null;
}

const ARCHIVE = /^(?:.*?[-_])?(v?\d[\w.+-]*?)\.(tar\.gz|tgz|tar\.xz|txz|tar\.bz2|tbz2|tar\.zst|zip)$/i;
const TAG_SEGMENTS = new Set(['tag', 'tags']);

/** Release candidates found in a page, grouped by version text. */
export function scrapeReleases(html: string, pageUrl: string): ScrapedRelease[] {
  const byTag = new Map<string, ScrapedRelease>();
  const entry = (tag: string): ScrapedRelease => {
    let found = byTag.get(tag);
    if (!found) {
      found = { tag, archives: [], pageUrl: null };
      byTag.set(tag, found);
    }
    return found;
  };

  for (const link of extractLinks(html, pageUrl)) {
    const url = new URL(link.href);
    const segments = url.pathname.split('/').filter((part) => part !== '');
    const fileName = segments[segments.length - 1];
    if (!fileName) continue;

    const archive = ARCHIVE.exec(safeDecode(fileName));
    if (archive?.[1]) {
      const release = entry(archive[1]);
      if (!release.archives.some((asset) => asset.url === link.href)) {
        release.archives.push({ name: safeDecode(fileName), url: link.href });
      }
      continue;
    }

    const tagIndex = segments.findIndex((part) => TAG_SEGMENTS.has(part));
    const tag = tagIndex === -1 ? undefined : segments[tagIndex + 1];
    if (tag && /\d/.test(tag)) entry(safeDecode(tag)).pageUrl ??= link.href;
  }

  return [...byTag.values()];
}

function pageUrl(input: IdentifierInput): string | null {
  if (!input.url || (input.url.protocol !== 'https:' && input.url.protocol !== 'http:')) return null;
  const url = new URL(input.url.href);
  url.hash = '';
  return url.href;
}

export class WebProvider implements ProviderClient<ScrapedRelease> {
  readonly id = 'web';
  readonly capabilities: ProviderCapabilities = {
    nativePrerelease: false,
    nativeDraft: false,
    timestamps: false,
    assets: 'inline',
  };
  readonly hostnames: readonly string[];

  constructor(private readonly deps: ProviderDeps) {
    this.hostnames = [...deps.settings.hostnames];
  }

  get rateLimit(): RateLimitSpec {
    return this.deps.settings.rateLimit;
  }

  accepts(input: IdentifierInput): boolean {
    return pageUrl(input) !== null;
  }

  async resolveIdentifier(input: IdentifierInput, options: ListOptions = {}): Promise<ProjectIdentifier> {
    const url = pageUrl(input);
    if (!url) throw new PermanentProviderError(this.id, `"${input.text}" is not an http(s) URL`);

    const project = projectIdentifier({
      provider: this.id,
      canonical: url,
      displayName: url.replace(/^https?:\/\//, ''),
      url,
      apiPath: url,
    });
    await this.listReleases(project, options);
    return project;
  }

  listReleases(project: ProjectIdentifier, options: ListOptions = {}): Promise<readonly ScrapedRelease[]> {
    return notFoundOn404(this.id, project.canonical, () =>
      cachedText(
        this.deps,
        { provider: this.id, project: project.canonical, query: 'page', url: project.apiPath },
        z.string().transform((html) => scrapeReleases(html, project.url)),
        options,
      ),
    );
  }

  toReleaseRecord(release: ScrapedRelease): ReleaseRecord {
    const preferred =
      release.archives.find((asset) => /\.(tar\.gz|tgz)$/i.test(asset.name)) ?? release.archives[0];
    return buildReleaseRecord({
      tag: release.tag,
      formal: false,
      assets: release.archives,
      sourceUrl: preferred?.url ?? null,
      pageUrl: release.pageUrl,
    });
  }
}
