import { z } from 'zod';

/**
 * Serialized view of a resolved release, as emitted by the `json` format.
 */

export const AssetSummary = z.object({
  name: z.string(),
  url: z.string(),
});

export type AssetSummary = z.infer<typeof AssetSummary>;

export const ReleaseSummary = z.object({
  /** Canonical version text */
  version: z.string(),
  tag: z.string(),
  /** ISO-8601, null when the provider gave no date */
  publishedAt: z.string().datetime().nullable(),
  prerelease: z.boolean(),
  assets: z.array(AssetSummary),
  provider: z.string(),
  /** Project URL the release was resolved from */
  from: z.string(),
  /** Tag starts with "v" */
  vPrefix: z.boolean(),
  /** Tag with the version text replaced by `%{version}` */
  specTag: z.string(),
  specTagNoPrefix: z.string(),
  sourceUrl: z.string().nullable(),
});

export type ReleaseSummary = z.infer<typeof ReleaseSummary>;

export const OutputFormat = z.enum(['version', 'tag', 'json', 'assets', 'source']);

export type OutputFormat = z.infer<typeof OutputFormat>;
