/**
 * Output formats for a resolved release.
 */

import type { ProjectIdentifier } from '../providers/identifier.js';
import type { OutputFormat, ReleaseSummary } from '../schemas/release.schema.js';
import { ConfigError } from '../utils/errors.js';
import { formatVersion } from '../version/version.js';
import type { ReleaseRecord } from './release-record.js';

export interface FormatOptions {
  /** Regex applied to asset names by the `assets` format */
  assetsFilter?: string;
}

const VERSION_PLACEHOLDER = '%{version}';
const VERSION_IN_TAG = /\d[0-9A-Za-z.+_-]*/;

/**
 * Tag with its version text replaced by `%{version}`, e.g. `v%{version}`.
 * The canonical version is tried first, then the first digit run.
 */
export function specTag(record: ReleaseRecord): string {
  const canonical = formatVersion(record.version);
  if (canonical !== '' && record.tag.includes(canonical)) {
    return record.tag.replace(canonical, VERSION_PLACEHOLDER);
  }
  if (VERSION_IN_TAG.test(record.tag)) return record.tag.replace(VERSION_IN_TAG, VERSION_PLACEHOLDER);
  return VERSION_PLACEHOLDER;
}

/** `specTag` without its leading `v`, for tags of the `v1.2.3` kind only. */
function stripVersionPrefix(spec: string): string {
  if (spec.startsWith(`v${VERSION_PLACEHOLDER}`) || /^v\d/.test(spec)) return spec.replace(/^v+/, '');
  return spec;
}

export function toReleaseSummary(record: ReleaseRecord, project: ProjectIdentifier): ReleaseSummary {
  const spec = specTag(record);
  return {
    version: formatVersion(record.version),
    tag: record.tag,
    publishedAt: record.publishedAt ? record.publishedAt.toISOString() : null,
    prerelease: record.isPrerelease,
    assets: record.assets.map((asset) => ({ name: asset.name, url: asset.url })),
    provider: project.provider,
    from: project.url,
    vPrefix: record.tag.startsWith('v'),
    specTag: spec,
    specTagNoPrefix: stripVersionPrefix(spec),
    sourceUrl: record.sourceUrl,
  };
}

function assetPattern(filter: string | undefined): RegExp | null {
  if (filter === undefined) return null;
  try {
    return new RegExp(filter);
  } catch (err) {
    throw new ConfigError(`Invalid assets filter "${filter}": ${String(err)}`);
  }
}

/**
 * Render a release in one of the output formats.
 *
 * - `version`: canonical version text
 * - `tag`: tag as the provider reported it
 * - `json`: pretty-printed ReleaseSummary
 * - `assets`: one asset URL per line, optionally filtered by name
 * - `source`: source archive URL, empty when there is none
 *
 * @throws ConfigError for an invalid assets filter
 */
export function formatRelease(
  record: ReleaseRecord,
  project: ProjectIdentifier,
  format: OutputFormat,
  options: FormatOptions = {},
): string {
  switch (format) {
    case 'version':
      return formatVersion(record.version);
    case 'tag':
      return record.tag;
    case 'json':
      return JSON.stringify(toReleaseSummary(record, project), null, 2);
    case 'assets': {
      const pattern = assetPattern(options.assetsFilter);
      return record.assets
        .filter((asset) => !pattern || pattern.test(asset.name))
        .map((asset) => asset.url)
        .join('\n');
    }
    case 'source':
      return record.sourceUrl ?? '';
  }
}
