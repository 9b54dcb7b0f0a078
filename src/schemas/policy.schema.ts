import semver from 'semver';
import { z } from 'zod';
import { ConfigError, summarizeIssues } from '../utils/errors.js';

/**
 * Text constraint: plain text matches as a substring, a leading `~` makes
 * the rest a regular expression, and a leading `!` negates (`!~\d{4}`).
 */
export const TextConstraint = z
  .string()
  .min(1)
  .refine(
    (value) => {
      const body = value.startsWith('!') ? value.slice(1) : value;
      if (!body.startsWith('~')) return true;
      try {
        new RegExp(body.slice(1));
        return true;
      } catch {
        return false;
      }
    },
    { message: 'Invalid regular expression after "~"' },
  );

export const SelectionPolicySchema = z.object({
  includePrereleases: z.boolean().default(false),
  /** "1" pins the major version, "1.2" pins major and minor */
  major: z
    .string()
    .regex(/^\d+(?:\.\d+)*$/, 'Expected a version prefix such as "2" or "2.4"')
    .optional(),
  only: TextConstraint.optional(),
  exclude: TextConstraint.optional(),
  /** semver range, checked against each release's semver rendering */
  versionRange: z
    .string()
    .refine((range) => semver.validRange(range) !== null, { message: 'Invalid semver range' })
    .optional(),
  /** true: any asset; text: an asset whose name satisfies the constraint */
  havingAsset: z.union([z.literal(true), TextConstraint]).optional(),
  /** Only releases whose minor component is even */
  even: z.boolean().default(false),
  /** Only releases the provider published as release objects */
  formal: z.boolean().default(false),
  includeUnparseable: z.boolean().default(false),
});

export type SelectionPolicy = z.infer<typeof SelectionPolicySchema>;
export type SelectionPolicyInput = z.input<typeof SelectionPolicySchema>;

export const DEFAULT_POLICY: SelectionPolicy = SelectionPolicySchema.parse({});

/**
 * Validate a caller-supplied policy and fill in defaults.
 * @throws ConfigError listing the zod issues
 */
export function parsePolicy(raw: unknown = {}): SelectionPolicy {
  const parsed = SelectionPolicySchema.safeParse(raw ?? {});
  if (parsed.success) return parsed.data;
  throw new ConfigError(
    `Invalid selection policy: ${summarizeIssues(parsed.error.issues)}`,
    parsed.error.issues,
  );
}
