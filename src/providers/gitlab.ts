/**
 * GitLab: REST v4 releases.
 *
 * GitLab has no prerelease flag, so it is inferred from the tag. Releases
 * scheduled for the future (`upcoming_release`) are treated as drafts.
 * Asset links usually come inline; when a release lists none the resolver
 * can ask for them through `listAssets`.
 */

import { z } from 'zod';
import type { RateLimitSpec } from '../cache/token-bucket.js';
import {
  buildReleaseRecord,
  type AssetDescriptor,
  type ReleaseRecord,
} from '../release/release-record.js';
import { PermanentProviderError } from '../utils/errors.js';
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

const ProjectSchema = z.object({
  id: z.number(),
  path_with_namespace: z.string(),
  name_with_namespace: z.string().optional(),
  web_url: z.string(),
});

const LinkSchema = z.object({
  name: z.string(),
  url: z.string(),
  direct_asset_url: z.string().optional(),
});

const ReleaseSchema = z.object({
  tag_name: z.string(),
  name: z.string().nullable().optional(),
  released_at: z.string().nullable().optional(),
  created_at: z.string().nullable().optional(),
  upcoming_release: z.boolean().optional(),
  assets: z
    .object({
      links: z.array(LinkSchema).optional(),
      sources: z.array(z.object({ format: z.string(), url: z.string() })).optional(),
    })
    .optional(),
  _links: z.object({ self: z.string().optional() }).optional(),
});

export type GitLabRelease = z.infer<typeof ReleaseSchema>;

// GitLab group paths may nest; everything after `/-/` is a page inside the project.
function projectPath(input: IdentifierInput): string | null {
  const stop = input.segments.indexOf('-');
  const segments = stop === -1 ? input.segments : input.segments.slice(0, stop);
  return segments.length >= 2 ? segments.join('/') : null;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class GitLabProvider implements ProviderClient<GitLabRelease> {
  readonly id = 'gitlab';
  readonly capabilities: ProviderCapabilities = {
    nativePrerelease: false,
    nativeDraft: true,
    timestamps: true,
    assets: 'deferred',
  };
  readonly hostnames: readonly string[];

  constructor(private readonly deps: ProviderDeps) {
    this.hostnames = ['gitlab.com', ...deps.settings.hostnames];
  }

  get rateLimit(): RateLimitSpec {
    return this.deps.settings.rateLimit;
  }

  accepts(input: IdentifierInput): boolean {
    if (input.shape === 'slug') return input.segments.length >= 2;
    if (input.shape === 'url') {
      const host = inputHost(input);
      return host !== null && this.hostnames.includes(host) && projectPath(input) !== null;
    }
    return false;
  }

  async resolveIdentifier(input: IdentifierInput, options: ListOptions = {}): Promise<ProjectIdentifier> {
    const path = projectPath(input);
    if (!path) {
      throw new PermanentProviderError(this.id, `"${input.text}" is not a group/project reference`);
    }

    const payload = await notFoundOn404(this.id, path, () =>
      cachedJson(
        this.deps,
        { ...this.request(path, 'project'), url: this.api(`projects/${encodeURIComponent(path)}`) },
        ProjectSchema,
        options,
      ),
    );

    return projectIdentifier({
      provider: this.id,
      canonical: payload.path_with_namespace,
      displayName: payload.name_with_namespace ?? payload.path_with_namespace,
      url: payload.web_url,
      apiPath: `projects/${payload.id}`,
    });
  }

  listReleases(project: ProjectIdentifier, options: ListOptions = {}): Promise<readonly GitLabRelease[]> {
    return cachedJson(
      this.deps,
      { ...this.request(project.canonical, 'releases'), url: this.api(`${project.apiPath}/releases?per_page=100`) },
      z.array(ReleaseSchema),
      options,
    );
  }

  toReleaseRecord(release: GitLabRelease, project: ProjectIdentifier): ReleaseRecord {
    const sources = release.assets?.sources ?? [];
    const tarball = sources.find((source) => source.format === 'tar.gz') ?? sources[0];

    return buildReleaseRecord({
      tag: release.tag_name,
      publishedAt: release.released_at ?? release.created_at ?? null,
      draft: release.upcoming_release ?? false,
      formal: true,
      assets: (release.assets?.links ?? []).map(toAsset),
      sourceUrl: tarball?.url ?? null,
      pageUrl:
        release._links?.self ?? `${project.url}/-/releases/${encodeURIComponent(release.tag_name)}`,
    });
  }

  listAssets(
    project: ProjectIdentifier,
    record: ReleaseRecord,
    options: ListOptions = {},
  ): Promise<readonly AssetDescriptor[]> {
    const tag = encodeURIComponent(record.tag);
    return cachedJson(
      this.deps,
      {
        ...this.request(project.canonical, `releases/${record.tag}/assets/links`),
        url: this.api(`${project.apiPath}/releases/${tag}/assets/links`),
      },
      z.array(LinkSchema).transform((links) => links.map(toAsset)),
      options,
    );
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private request(project: string, query: string) {
    const headers: Record<string, string> = {};
    const { token } = this.deps.settings;
    if (token) headers['PRIVATE-TOKEN'] = token;
    return { provider: this.id, project, query, headers };
  }

  private api(path: string): string {
    return joinUrl(this.deps.settings.baseUrl, path);
  }
}

function toAsset(link: z.infer<typeof LinkSchema>): AssetDescriptor {
  return { name: link.name, url: link.direct_asset_url ?? link.url };
}
