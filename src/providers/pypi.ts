/**
 * PyPI: the JSON API (`/pypi/<name>/json`).
 *
 * One document answers both "does the project exist" and "what was
 * released", so both calls share a cache entry. A version whose every file
 * was yanked counts as a draft.
 */

import { z } from 'zod';
import type { RateLimitSpec } from '../cache/token-bucket.js';
import { buildReleaseRecord, type ReleaseRecord } from '../release/release-record.js';
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

const FileSchema = z.object({
  filename: z.string(),
  url: z.string(),
  packagetype: z.string().optional(),
  upload_time_iso_8601: z.string().nullable().optional(),
  upload_time: z.string().nullable().optional(),
  yanked: z.boolean().optional(),
});

const ProjectDocumentSchema = z.object({
  info: z.object({
    name: z.string(),
    summary: z.string().nullable().optional(),
    package_url: z.string().optional(),
  }),
  releases: z.record(z.array(FileSchema)).default({}),
});

export type PyPIFile = z.infer<typeof FileSchema>;

export interface PyPIRelease {
  version: string;
  files: readonly PyPIFile[];
}

/** PEP 503 normalized project name. */
export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

const PACKAGE_NAME = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?$/;

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class PyPIProvider implements ProviderClient<PyPIRelease> {
  readonly id = 'pypi';
  readonly capabilities: ProviderCapabilities = {
    nativePrerelease: false,
    nativeDraft: true,
    timestamps: true,
    assets: 'inline',
  };
  readonly hostnames: readonly string[];

  constructor(private readonly deps: ProviderDeps) {
    this.hostnames = ['pypi.org', 'pypi.python.org', ...deps.settings.hostnames];
  }

  get rateLimit(): RateLimitSpec {
    return this.deps.settings.rateLimit;
  }

  accepts(input: IdentifierInput): boolean {
    if (input.shape === 'name') return PACKAGE_NAME.test(input.text);
    if (input.shape === 'url') {
      const host = inputHost(input);
      return host !== null && this.hostnames.includes(host) && this.nameFromUrl(input) !== null;
    }
    return false;
  }

  async resolveIdentifier(input: IdentifierInput, options: ListOptions = {}): Promise<ProjectIdentifier> {
    const name = input.shape === 'url' ? this.nameFromUrl(input) : input.text;
    if (!name || !PACKAGE_NAME.test(name)) {
      throw new PermanentProviderError(this.id, `"${input.text}" is not a package name`);
    }

    const document = await this.document(normalizePackageName(name), options);
    return projectIdentifier({
      provider: this.id,
      canonical: normalizePackageName(document.info.name),
      displayName: document.info.name,
      url: document.info.package_url ?? `https://pypi.org/project/${document.info.name}/`,
      apiPath: `pypi/${normalizePackageName(document.info.name)}/json`,
    });
  }

  async listReleases(project: ProjectIdentifier, options: ListOptions = {}): Promise<readonly PyPIRelease[]> {
    const document = await this.document(project.canonical, options);
    return Object.entries(document.releases).map(([version, files]) => ({ version, files }));
  }

  toReleaseRecord(release: PyPIRelease, project: ProjectIdentifier): ReleaseRecord | null {
    const uploaded = release.files
      .map((file) => file.upload_time_iso_8601 ?? file.upload_time ?? null)
      .filter((time): time is string => time !== null)
      .sort();
    const sdist = release.files.find((file) => file.packagetype === 'sdist');

    return buildReleaseRecord({
      tag: release.version,
      publishedAt: uploaded[0] ?? null,
      draft: release.files.length > 0 && release.files.every((file) => file.yanked === true),
      formal: true,
      assets: release.files.map((file) => ({ name: file.filename, url: file.url })),
      sourceUrl: sdist?.url ?? null,
      pageUrl: `${project.url.replace(/\/+$/, '')}/${release.version}/`,
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private document(name: string, options: ListOptions) {
    return notFoundOn404(this.id, name, () =>
      cachedJson(
        this.deps,
        {
          provider: this.id,
          project: name,
          query: 'json',
          url: joinUrl(this.deps.settings.baseUrl, `pypi/${encodeURIComponent(name)}/json`),
        },
        ProjectDocumentSchema,
        options,
      ),
    );
  }

  private nameFromUrl(input: IdentifierInput): string | null {
    const [section, name] = input.segments;
    if ((section === 'project' || section === 'pypi') && name) return name;
    return null;
  }
}
