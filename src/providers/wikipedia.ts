/**
 * Wikipedia: reads the "Latest release" / "Stable release" rows of an
 * article infobox. Used for operating systems and other products that do
 * not publish releases anywhere machine-readable.
 */

import { z } from 'zod';
import type { RateLimitSpec } from '../cache/token-bucket.js';
import { buildReleaseRecord, type ReleaseRecord } from '../release/release-record.js';
import { PermanentProviderError } from '../utils/errors.js';
import { infoboxRows, removeElements, textContent } from './html.js';
import { hostMatches, inputHost, projectIdentifier, type IdentifierInput, type ProjectIdentifier } from './identifier.js';
import {
  cachedText,
  joinUrl,
  notFoundOn404,
  type ListOptions,
  type ProviderCapabilities,
  type ProviderClient,
  type ProviderDeps,
} from './provider-client.js';

/** Short names that resolve to an article instead of a package index. */
export const KNOWN_ARTICLES: ReadonlyMap<string, string> = new Map([
  ['rocky', 'Rocky_Linux'],
  ['fedora', 'Fedora_(operating_system)'],
  ['rhel', 'Red_Hat_Enterprise_Linux'],
  ['redhat', 'Red_Hat_Enterprise_Linux'],
  ['almalinux', 'AlmaLinux'],
  ['ios', 'IOS'],
  ['ubuntu', 'Ubuntu'],
  ['debian', 'Debian'],
  ['android', 'Android_(operating_system)'],
  ['windows', 'Microsoft_Windows'],
]);

const STABLE_LABELS = ['latest release', 'stable release'];
const PREVIEW_LABELS = ['preview release', 'latest preview', 'beta release'];

export interface InfoboxRelease {
  channel: 'stable' | 'preview';
  /** Cleaned cell text, e.g. "23.04" */
  text: string;
  published: string | null;
}

/**
 * Make a scraped cell parseable: bare words are dropped, `devel`/`test`/`dev`
 * become `dev0` and `p12` becomes `post12`.
 */
export function cleanReleaseText(text: string): string {
  return text
    .split(' ')
    .map((part) => (['devel', 'test', 'dev'].includes(part) ? 'dev0' : part.replace(/^p(\d+)$/, 'post$1')))
    .filter((part) => part !== '' && !/^[A-Za-z]+$/.test(part))
    .join(' ');
}

/** Release rows of an article's infobox. */
export function parseInfobox(html: string): InfoboxRelease[] {
  const releases: InfoboxRelease[] = [];
  for (const row of infoboxRows(html)) {
    const label = row.label.toLowerCase();
    const channel = STABLE_LABELS.includes(label)
      ? 'stable'
      : PREVIEW_LABELS.includes(label)
        ? 'preview'
        : null;
    if (!channel) continue;

    const published = /<span\b[^>]*class\s*=\s*["'][^"']*\b(?:published|bday)\b[^"']*["'][^>]*>([^<]*)<\/span>/i.exec(
      row.dataHtml,
    );
    const visible = textContent(removeElements(row.dataHtml, ['sup', 'span']));
    const text = (cleanReleaseText(visible).split('/')[0] ?? '').trim();
    if (text === '') continue;

    releases.push({ channel, text, published: published?.[1]?.trim() || null });
  }
  return releases;
}

const ArticleSchema = z.string();
const InfoboxSchema = z.string().transform(parseInfobox);

export class WikipediaProvider implements ProviderClient<InfoboxRelease> {
  readonly id = 'wikipedia';
  readonly capabilities: ProviderCapabilities = {
    nativePrerelease: true,
    nativeDraft: false,
    timestamps: true,
    assets: 'none',
  };
  readonly hostnames: readonly string[];

  constructor(private readonly deps: ProviderDeps) {
    this.hostnames = [new URL(deps.settings.baseUrl).hostname, '.wikipedia.org', ...deps.settings.hostnames];
  }

  get rateLimit(): RateLimitSpec {
    return this.deps.settings.rateLimit;
  }

  accepts(input: IdentifierInput): boolean {
    if (input.shape === 'name') return KNOWN_ARTICLES.has(input.text.toLowerCase());
    if (input.shape === 'url') {
      const host = inputHost(input);
      return host !== null && hostMatches(this.hostnames, host) && articleFromUrl(input) !== null;
    }
    return false;
  }

  async resolveIdentifier(input: IdentifierInput, options: ListOptions = {}): Promise<ProjectIdentifier> {
    const title =
      input.shape === 'url'
        ? articleFromUrl(input)
        : (KNOWN_ARTICLES.get(input.text.toLowerCase()) ?? input.text.replace(/ /g, '_'));
    if (!title) {
      throw new PermanentProviderError(this.id, `"${input.text}" does not name an article`);
    }

    const base = input.shape === 'url' && input.url ? input.url.origin : this.deps.settings.baseUrl;
    const project = projectIdentifier({
      provider: this.id,
      canonical: title,
      displayName: title.replace(/_/g, ' '),
      url: joinUrl(base, `wiki/${encodeURIComponent(title)}`),
      apiPath: joinUrl(base, `wiki/${encodeURIComponent(title)}`),
    });
    await this.article(project, ArticleSchema, options);
    return project;
  }

  listReleases(project: ProjectIdentifier, options: ListOptions = {}): Promise<readonly InfoboxRelease[]> {
    return this.article(project, InfoboxSchema, options);
  }

  toReleaseRecord(release: InfoboxRelease, project: ProjectIdentifier): ReleaseRecord {
    return buildReleaseRecord({
      tag: release.text,
      publishedAt: release.published,
      prerelease: release.channel === 'preview',
      formal: true,
      pageUrl: project.url,
    });
  }

  private article<T>(
    project: ProjectIdentifier,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: ListOptions,
  ): Promise<T> {
    return notFoundOn404(this.id, project.canonical, () =>
      cachedText(
        this.deps,
        // Language editions share titles, so the article URL is the key.
        { provider: this.id, project: project.apiPath, query: 'article', url: project.apiPath },
        schema,
        options,
      ),
    );
  }
}

function articleFromUrl(input: IdentifierInput): string | null {
  const [section, title] = input.segments;
  return section === 'wiki' && title ? title : null;
}
