/**
 * npm: the registry's full package document.
 *
 * Deprecated versions count as drafts; each version's tarball is both its
 * single asset and its source archive.
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

const VersionSchema = z.object({
  version: z.string(),
  deprecated: z.union([z.string(), z.boolean()]).optional(),
  dist: z.object({ tarball: z.string() }).optional(),
});

const PackageDocumentSchema = z.object({
  name: z.string(),
  versions: z.record(VersionSchema).default({}),
  time: z.record(z.string()).default({}),
});

export interface NpmRelease {
  version: z.infer<typeof VersionSchema>;
  publishedAt: string | null;
}

/** Scoped (`@scope/name`) or unscoped package name. */
export const NPM_PACKAGE_NAME = /^(?:@[a-z0-9][a-z0-9._~-]*\/)?[a-z0-9][a-z0-9._~-]*$/;

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class NpmProvider implements ProviderClient<NpmRelease> {
  readonly id = 'npm';
  readonly capabilities: ProviderCapabilities = {
    nativePrerelease: false,
    nativeDraft: true,
    timestamps: true,
    assets: 'inline',
  };
  readonly hostnames: readonly string[];

  constructor(private readonly deps: ProviderDeps) {
    this.hostnames = ['npmjs.com', 'registry.npmjs.org', ...deps.settings.hostnames];
  }

  get rateLimit(): RateLimitSpec {
    return this.deps.settings.rateLimit;
  }

  accepts(input: IdentifierInput): boolean {
    if (input.shape === 'name') return NPM_PACKAGE_NAME.test(input.text);
    if (input.shape === 'url') {
      const host = inputHost(input);
      return host !== null && this.hostnames.includes(host) && this.nameFromUrl(input) !== null;
    }
    return false;
  }

  async resolveIdentifier(input: IdentifierInput, options: ListOptions = {}): Promise<ProjectIdentifier> {
    const name = input.shape === 'url' ? this.nameFromUrl(input) : input.text;
    if (!name || !NPM_PACKAGE_NAME.test(name)) {
      throw new PermanentProviderError(this.id, `"${input.text}" is not a package name`);
    }

    const document = await this.document(name, options);
    return projectIdentifier({
      provider: this.id,
      canonical: document.name,
      displayName: document.name,
      url: `https://www.npmjs.com/package/${document.name}`,
      apiPath: encodePackageName(document.name),
    });
  }

  async listReleases(project: ProjectIdentifier, options: ListOptions = {}): Promise<readonly NpmRelease[]> {
    const document = await this.document(project.canonical, options);
    return Object.values(document.versions).map((version) => ({
      version,
      publishedAt: document.time[version.version] ?? null,
    }));
  }

  toReleaseRecord(release: NpmRelease, project: ProjectIdentifier): ReleaseRecord {
    const { version } = release;
    const tarball = version.dist?.tarball ?? null;
    const fileName = tarball?.split('/').pop();

    return buildReleaseRecord({
      tag: version.version,
      publishedAt: release.publishedAt,
      draft: isDeprecated(version.deprecated),
      formal: true,
      assets: tarball ? [{ name: fileName ?? `${version.version}.tgz`, url: tarball }] : [],
      sourceUrl: tarball,
      pageUrl: `${project.url}/v/${version.version}`,
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
          query: 'document',
          url: joinUrl(this.deps.settings.baseUrl, encodePackageName(name)),
        },
        PackageDocumentSchema,
        options,
      ),
    );
  }

  private nameFromUrl(input: IdentifierInput): string | null {
    const [section, first, second] = input.segments;
    if (inputHost(input) === 'registry.npmjs.org') {
      if (!section) return null;
      return section.startsWith('@') && first ? `${section}/${first}` : section;
    }
    if (section !== 'package' || !first) return null;
    return first.startsWith('@') && second ? `${first}/${second}` : first;
  }
}

/** The registry marks deprecation with a message; an empty one clears it. */
function isDeprecated(flag: string | boolean | undefined): boolean {
  return flag === true || (typeof flag === 'string' && flag !== '');
}

/** `@scope/name` → `@scope%2Fname`, as the registry expects. */
export function encodePackageName(name: string): string {
  return name.startsWith('@') ? `@${encodeURIComponent(name.slice(1))}` : encodeURIComponent(name);
}
