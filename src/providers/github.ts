/**
 * GitHub: REST v3 releases plus the tag list.
 *
 * Release objects carry native draft and prerelease flags and inline assets.
 * Tags without a release object become non-formal records so that projects
 * which only tag still resolve. A failing tag list degrades to releases only.
 */

import { z } from 'zod';
import type { RateLimitSpec } from '../cache/token-bucket.js';
import { buildReleaseRecord, type ReleaseRecord } from '../release/release-record.js';
import { parseVersion } from '../version/version.js';
import { PermanentProviderError, isResolutionError } from '../utils/errors.js';
import { inputHost, projectIdentifier, type IdentifierInput, type ProjectIdentifier } from './identifier.js';
import {
  cachedJson,
  joinUrl,
  notFoundOn404,
  type ListOptions,
  type ProviderCapabilities,
  type ProviderClient,
  type ProviderDeps,
} from './provider-client.js';

// ---------------------------------------------------------------------------
// Payload schemas
// ---------------------------------------------------------------------------

const RepoSchema = z.object({
  full_name: z.string(),
  html_url: z.string(),
});

const ReleaseSchema = z.object({
  tag_name: z.string(),
  name: z.string().nullable().optional(),
  draft: z.boolean(),
  prerelease: z.boolean(),
  published_at: z.string().nullable().optional(),
  created_at: z.string().nullable().optional(),
  html_url: z.string().optional(),
  tarball_url: z.string().nullable().optional(),
  assets: z
    .array(z.object({ name: z.string(), browser_download_url: z.string() }))
    .default([]),
});

const TagSchema = z.object({
  name: z.string(),
  tarball_url: z.string().nullable().optional(),
});

export type GitHubRelease = z.infer<typeof ReleaseSchema>;
export type GitHubTag = z.infer<typeof TagSchema>;

export type GitHubItem =
  | { source: 'release'; release: GitHubRelease }
  | { source: 'tag'; tag: GitHubTag };

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class GitHubProvider implements ProviderClient<GitHubItem> {
  readonly id = 'github';
  readonly capabilities: ProviderCapabilities = {
    nativePrerelease: true,
    nativeDraft: true,
    timestamps: true,
    assets: 'inline',
  };
  readonly hostnames: readonly string[];

  constructor(private readonly deps: ProviderDeps) {
    this.hostnames = ['github.com', ...deps.settings.hostnames];
  }

  get rateLimit(): RateLimitSpec {
    return this.deps.settings.rateLimit;
  }

  accepts(input: IdentifierInput): boolean {
    if (input.shape === 'slug') return input.segments.length === 2;
    if (input.shape === 'url') {
      const host = inputHost(input);
      return host !== null && this.hostnames.includes(host) && input.segments.length >= 2;
    }
    return false;
  }

  async resolveIdentifier(input: IdentifierInput, options: ListOptions = {}): Promise<ProjectIdentifier> {
    const [owner, repo] = input.segments;
    if (!owner || !repo) {
      throw new PermanentProviderError(this.id, `"${input.text}" is not an owner/repo reference`);
    }
    const slug = `${owner}/${repo}`;
    const payload = await notFoundOn404(this.id, slug, () =>
      cachedJson(
        this.deps,
        { ...this.request(slug, 'repo'), url: this.api(`repos/${slug}`) },
        RepoSchema,
        options,
      ),
    );

    return projectIdentifier({
      provider: this.id,
      canonical: payload.full_name,
      displayName: payload.full_name,
      url: payload.html_url,
      apiPath: `repos/${payload.full_name}`,
    });
  }

  async listReleases(project: ProjectIdentifier, options: ListOptions = {}): Promise<readonly GitHubItem[]> {
    const releases = await cachedJson(
      this.deps,
      { ...this.request(project.canonical, 'releases'), url: this.api(`${project.apiPath}/releases?per_page=100`) },
      z.array(ReleaseSchema),
      options,
    );

    const tags = await this.listTags(project, options);
    const released = new Set(releases.map((release) => release.tag_name));

    return [
      ...releases.map((release): GitHubItem => ({ source: 'release', release })),
      ...tags
        .filter((tag) => !released.has(tag.name))
        .map((tag): GitHubItem => ({ source: 'tag', tag })),
    ];
  }

  toReleaseRecord(item: GitHubItem, project: ProjectIdentifier): ReleaseRecord {
    if (item.source === 'tag') {
      return buildReleaseRecord({
        tag: item.tag.name,
        formal: false,
        sourceUrl: item.tag.tarball_url ?? null,
        pageUrl: `${project.url}/releases/tag/${encodeURIComponent(item.tag.name)}`,
      });
    }

    const { release } = item;
    // Some projects tag oddly but name the release properly.
    const useName =
      parseVersion(release.tag_name).kind === 'unparseable' &&
      !!release.name &&
      parseVersion(release.name).kind !== 'unparseable';

    return buildReleaseRecord({
      tag: release.tag_name,
      versionText: useName && release.name ? release.name : undefined,
      publishedAt: release.published_at ?? release.created_at ?? null,
      prerelease: release.prerelease,
      draft: release.draft,
      formal: true,
      assets: release.assets.map((asset) => ({ name: asset.name, url: asset.browser_download_url })),
      sourceUrl: release.tarball_url ?? null,
      pageUrl: release.html_url ?? null,
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async listTags(project: ProjectIdentifier, options: ListOptions): Promise<readonly GitHubTag[]> {
    try {
      return await cachedJson(
        this.deps,
        { ...this.request(project.canonical, 'tags'), url: this.api(`${project.apiPath}/tags?per_page=100`) },
        z.array(TagSchema),
        options,
      );
    } catch (error) {
      if (options.signal?.aborted || !isResolutionError(error)) throw error;
      this.deps.logger.warn('tag list unavailable, using releases only', {
        provider: this.id,
        project: project.canonical,
        error: error.message,
      });
      return [];
    }
  }

  private request(project: string, query: string) {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    const { token } = this.deps.settings;
    if (token) headers.Authorization = `Bearer ${token}`;
    return { provider: this.id, project, query, headers };
  }

  private api(path: string): string {
    return joinUrl(this.deps.settings.baseUrl, path);
  }
}
