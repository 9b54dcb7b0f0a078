/**
 * Plain git repositories over HTTP(S): tag enumeration from the refs
 * advertisement. No release objects, no timestamps, no assets.
 */

import { z } from 'zod';
import type { RateLimitSpec } from '../cache/token-bucket.js';
import { buildReleaseRecord, type ReleaseRecord } from '../release/release-record.js';
import { PermanentProviderError } from '../utils/errors.js';
import { parseRefsAdvertisement, tagRefs, type TagRef } from './git-refs.js';
import { projectIdentifier, type IdentifierInput, type ProjectIdentifier } from './identifier.js';
import {
  cachedText,
  notFoundOn404,
  type ListOptions,
  type ProviderCapabilities,
  type ProviderClient,
  type ProviderDeps,
} from './provider-client.js';

const RefsSchema = z.string().transform((text, ctx) => {
  try {
    return tagRefs(parseRefsAdvertisement(text));
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : 'unreadable refs advertisement',
    });
    return z.NEVER;
  }
});

function repositoryUrl(input: IdentifierInput): string | null {
  if (!input.url || (input.url.protocol !== 'https:' && input.url.protocol !== 'http:')) return null;
  const url = new URL(input.url.href);
  url.hash = '';
  url.search = '';
  url.pathname = url.pathname.replace(/\/+$/, '');
  return url.href;
}

export class GitProvider implements ProviderClient<TagRef> {
  readonly id = 'git';
  readonly capabilities: ProviderCapabilities = {
    nativePrerelease: false,
    nativeDraft: false,
    timestamps: false,
    assets: 'none',
  };
  readonly hostnames: readonly string[];

  constructor(private readonly deps: ProviderDeps) {
    this.hostnames = [...deps.settings.hostnames];
  }

  get rateLimit(): RateLimitSpec {
    return this.deps.settings.rateLimit;
  }

  accepts(input: IdentifierInput): boolean {
    return repositoryUrl(input) !== null;
  }

  async resolveIdentifier(input: IdentifierInput, options: ListOptions = {}): Promise<ProjectIdentifier> {
    const url = repositoryUrl(input);
    if (!url) {
      throw new PermanentProviderError(this.id, `"${input.text}" is not an http(s) repository URL`);
    }

    const project = projectIdentifier({
      provider: this.id,
      canonical: url,
      displayName: url.replace(/^https?:\/\//, '').replace(/\.git$/, ''),
      url,
      apiPath: `${url}/info/refs?service=git-upload-pack`,
    });
    // Existence check; the advertisement is cached for listReleases.
    await this.listReleases(project, options);
    return project;
  }

  listReleases(project: ProjectIdentifier, options: ListOptions = {}): Promise<readonly TagRef[]> {
    return notFoundOn404(this.id, project.canonical, () =>
      cachedText(
        this.deps,
        { provider: this.id, project: project.canonical, query: 'info/refs', url: project.apiPath },
        RefsSchema,
        options,
      ),
    );
  }

  toReleaseRecord(ref: TagRef): ReleaseRecord {
    return buildReleaseRecord({ tag: ref.tag, formal: false });
  }
}
