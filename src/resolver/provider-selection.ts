/**
 * Provider selection: which clients get to claim an identifier, and how.
 *
 *   hint given       → that provider alone
 *   URL              → provider owning the host, then git (for .git / git+
 *                      URLs), then the generic web scraper; first to find
 *                      the project wins
 *   owner/repo slug  → github, then gitlab; first to find the project wins
 *   bare name        → wikipedia for well-known products, otherwise every
 *                      package index at once; more than one claimant is
 *                      ambiguous
 */

import type { ProviderRegistry } from '../providers/registry.js';
import type { ListOptions, ProviderClient } from '../providers/provider-client.js';
import {
  hostMatches,
  inputHost,
  looksLikeGitUrl,
  type IdentifierInput,
  type ProjectIdentifier,
} from '../providers/identifier.js';
import { AmbiguousError, ConfigError, NotFoundError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

export interface SelectionPlan {
  /** `fallback`: try in order until one finds the project; `concurrent`: ask all */
  mode: 'fallback' | 'concurrent';
  providers: ProviderClient[];
}

const FORGES = ['github', 'gitlab'];
const PACKAGE_INDEXES = ['pypi', 'npm'];

function pick(registry: ProviderRegistry, ids: readonly string[], input: IdentifierInput): ProviderClient[] {
  return ids
    .map((id) => registry.get(id))
    .filter((client): client is ProviderClient => client !== undefined && client.accepts(input));
}

/**
 * Decide which providers to ask for `input`.
 * @throws ConfigError for an unknown provider hint
 * @throws NotFoundError when no provider accepts the input at all
 */
export function planProviders(input: IdentifierInput, registry: ProviderRegistry): SelectionPlan {
  if (input.hint !== null) {
    const hinted = registry.get(input.hint);
    if (!hinted) {
      throw new ConfigError(
        `Unknown provider "${input.hint}"; expected one of ${registry.ids().join(', ')}`,
      );
    }
    return { mode: 'fallback', providers: [hinted] };
  }

  let providers: ProviderClient[] = [];
  let mode: SelectionPlan['mode'] = 'fallback';

  switch (input.shape) {
    case 'url': {
      const host = inputHost(input);
      const owner = registry
        .list()
        .find((client) => host !== null && hostMatches(client.hostnames, host) && client.accepts(input));
      providers = [
        ...(owner ? [owner] : []),
        ...(looksLikeGitUrl(input) ? pick(registry, ['git'], input) : []),
        ...pick(registry, ['web'], input),
      ].filter((client, index, all) => all.indexOf(client) === index);
      break;
    }
    case 'slug':
      providers = pick(registry, FORGES, input);
      break;
    case 'name': {
      const article = pick(registry, ['wikipedia'], input);
      if (article.length > 0) {
        providers = article;
      } else {
        providers = pick(registry, PACKAGE_INDEXES, input);
        mode = 'concurrent';
      }
      break;
    }
  }

  if (providers.length === 0) throw new NotFoundError(input.text);
  return { mode, providers };
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/**
 * Run a plan and return the single project it identifies.
 * @throws NotFoundError when no provider has the project
 * @throws AmbiguousError when several package indexes have it
 */
export async function selectProject(
  input: IdentifierInput,
  plan: SelectionPlan,
  options: ListOptions,
  logger: Logger,
): Promise<ProjectIdentifier> {
  if (plan.mode === 'fallback') {
    for (const client of plan.providers) {
      try {
        return await client.resolveIdentifier(input, options);
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error;
        logger.debug('project not found, trying next provider', { provider: client.id, input: input.text });
      }
    }
    throw new NotFoundError(input.text, plan.providers.length === 1 ? (plan.providers[0]?.id ?? null) : null);
  }

  const settled = await Promise.allSettled(
    plan.providers.map((client) => client.resolveIdentifier(input, options)),
  );

  const found: ProjectIdentifier[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'fulfilled') {
      found.push(outcome.value);
    } else if (!(outcome.reason instanceof NotFoundError)) {
      // Without every answer the claim count is unknown.
      throw outcome.reason;
    }
  }

  const [only, ...others] = found;
  if (!only) throw new NotFoundError(input.text);
  if (others.length > 0) {
    throw new AmbiguousError(input.text, found.map((project) => project.provider));
  }
  return only;
}
