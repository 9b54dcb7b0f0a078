/**
 * Provider registry: the set of clients one resolution context works with.
 */

import {
  PROVIDER_DEFAULTS,
  type ResolverConfig,
} from '../schemas/config.schema.js';
import { GitProvider } from './git.js';
import { GitHubProvider } from './github.js';
import { GitLabProvider } from './gitlab.js';
import { NpmProvider } from './npm.js';
import type { ProviderClient, ProviderDeps, ProviderSettings } from './provider-client.js';
import { PyPIProvider } from './pypi.js';
import { WebProvider } from './web.js';
import { WikipediaProvider } from './wikipedia.js';

export class ProviderRegistry {
  private readonly byId = new Map<string, ProviderClient>();

  constructor(providers: readonly ProviderClient[]) {
    for (const provider of providers) {
      if (this.byId.has(provider.id)) {
        throw new Error(`Provider "${provider.id}" registered twice`);
      }
      this.byId.set(provider.id, provider);
    }
  }

  get(id: string): ProviderClient | undefined {
    return this.byId.get(id);
  }

  ids(): string[] {
    return [...this.byId.keys()];
  }

  list(): ProviderClient[] {
    return [...this.byId.values()];
  }
}

/**
 * Settings for one provider: configured values over built-in defaults, the
 * global rate limit for providers without one.
 */
export function providerSettings(config: ResolverConfig, id: string): ProviderSettings {
  const configured = config.providers[id];
  const defaults = PROVIDER_DEFAULTS[id];
  return {
    baseUrl: configured?.baseUrl ?? defaults?.baseUrl ?? 'https://example.invalid',
    token: config.tokens[id] ?? null,
    hostnames: configured?.hostnames ?? [],
    rateLimit: configured?.rateLimit ?? defaults?.rateLimit ?? config.rateLimit,
  };
}

/** The built-in clients, in selection-priority order. */
export function createDefaultProviders(deps: (id: string) => ProviderDeps): ProviderClient[] {
  return [
    new GitHubProvider(deps('github')),
    new GitLabProvider(deps('gitlab')),
    new PyPIProvider(deps('pypi')),
    new NpmProvider(deps('npm')),
    new GitProvider(deps('git')),
    new WikipediaProvider(deps('wikipedia')),
    new WebProvider(deps('web')),
  ];
}
