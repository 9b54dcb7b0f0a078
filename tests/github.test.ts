import { describe, it, expect } from 'vitest';
import { GitHubProvider } from '../src/providers/github.js';
import { parseIdentifierInput } from '../src/providers/identifier.js';
import { NotFoundError } from '../src/utils/errors.js';
import { createLogger, type LogEntry } from '../src/utils/logger.js';
import { jsonResponse, makeDeps, routedFetch, type Route } from './fakes.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const API = 'https://api.github.com/repos/acme/tool';

function makeRelease(tag: string, overrides: Record<string, unknown> = {}) {
  return {
    tag_name: tag,
    name: tag,
    draft: false,
    prerelease: false,
    published_at: '2025-01-10T00:00:00Z',
    html_url: `https://github.com/acme/tool/releases/tag/${tag}`,
    tarball_url: `${API}/tarball/${tag}`,
    assets: [],
    ...overrides,
  };
}

function makeRoutes(overrides: Record<string, Route> = {}): Record<string, Route> {
  return {
    [API]: () => jsonResponse({ full_name: 'acme/tool', html_url: 'https://github.com/acme/tool' }),
    [`${API}/releases?per_page=100`]: () =>
      jsonResponse([
        makeRelease('v2.0.0', {
          assets: [
            {
              name: 'tool-linux.tar.gz',
              browser_download_url: 'https://github.com/acme/tool/releases/download/v2.0.0/tool-linux.tar.gz',
            },
          ],
        }),
        makeRelease('v2.1.0-rc1', { prerelease: true }),
        makeRelease('v2.1.0', { draft: true, published_at: null }),
      ]),
    [`${API}/tags?per_page=100`]: () =>
      jsonResponse([
        { name: 'v2.1.0', tarball_url: `${API}/tarball/v2.1.0` },
        { name: 'v2.0.0', tarball_url: `${API}/tarball/v2.0.0` },
        { name: 'v1.9.0', tarball_url: `${API}/tarball/v1.9.0` },
      ]),
    ...overrides,
  };
}

async function resolveAndList(provider: GitHubProvider) {
  const project = await provider.resolveIdentifier(parseIdentifierInput('acme/tool'));
  const items = await provider.listReleases(project);
  return { project, records: items.map((item) => provider.toReleaseRecord(item, project)) };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('GitHubProvider.accepts', () => {
  const provider = new GitHubProvider(makeDeps('github', routedFetch({}).fetch));

  it('accepts owner/repo slugs and github.com URLs', () => {
    expect(provider.accepts(parseIdentifierInput('acme/tool'))).toBe(true);
    expect(provider.accepts(parseIdentifierInput('https://github.com/acme/tool/releases'))).toBe(true);
  });

  it('rejects names, deeper slugs and other hosts', () => {
    expect(provider.accepts(parseIdentifierInput('tool'))).toBe(false);
    expect(provider.accepts(parseIdentifierInput('a/b/c'))).toBe(false);
    expect(provider.accepts(parseIdentifierInput('https://gitlab.com/acme/tool'))).toBe(false);
  });

  it('accepts configured enterprise hosts', () => {
    const enterprise = new GitHubProvider(
      makeDeps('github', routedFetch({}).fetch, {
        config: { providers: { github: { hostnames: ['git.corp.example'] } } },
      }),
    );
    expect(enterprise.accepts(parseIdentifierInput('https://git.corp.example/acme/tool'))).toBe(true);
  });
});

describe('GitHubProvider releases', () => {
  it('resolves the repository to its canonical name', async () => {
    const provider = new GitHubProvider(makeDeps('github', routedFetch(makeRoutes()).fetch));
    const project = await provider.resolveIdentifier(parseIdentifierInput('https://github.com/acme/tool'));
    expect(project).toEqual({
      provider: 'github',
      canonical: 'acme/tool',
      displayName: 'acme/tool',
      url: 'https://github.com/acme/tool',
      apiPath: 'repos/acme/tool',
    });
  });

  it('lists release objects with their flags, then bare tags', async () => {
    const routes = routedFetch(makeRoutes());
    const { records } = await resolveAndList(new GitHubProvider(makeDeps('github', routes.fetch)));

    expect(records.map((r) => [r.tag, r.isFormal, r.isDraft, r.isPrerelease])).toEqual([
      ['v2.0.0', true, false, false],
      ['v2.1.0-rc1', true, false, true],
      ['v2.1.0', true, true, false],
      ['v1.9.0', false, false, false],
    ]);
    expect(records[0]?.assets).toEqual([
      {
        name: 'tool-linux.tar.gz',
        url: 'https://github.com/acme/tool/releases/download/v2.0.0/tool-linux.tar.gz',
      },
    ]);
    expect(records[0]?.publishedAt?.toISOString()).toBe('2025-01-10T00:00:00.000Z');
    expect(records[3]?.sourceUrl).toBe(`${API}/tarball/v1.9.0`);
    expect(records[3]?.pageUrl).toBe('https://github.com/acme/tool/releases/tag/v1.9.0');
    expect(routes.calls).toEqual([API, `${API}/releases?per_page=100`, `${API}/tags?per_page=100`]);
  });

  it('keeps the provider prerelease flag over the tag text', async () => {
    const routes = routedFetch(
      makeRoutes({
        [`${API}/releases?per_page=100`]: () => jsonResponse([makeRelease('v3.0.0-beta', { prerelease: false })]),
        [`${API}/tags?per_page=100`]: () => jsonResponse([]),
      }),
    );
    const { records } = await resolveAndList(new GitHubProvider(makeDeps('github', routes.fetch)));
    expect(records[0]?.isPrerelease).toBe(false);
    expect(records[0]?.prereleaseSource).toBe('provider');
  });

  it('parses the release name when the tag is not a version', async () => {
    const routes = routedFetch(
      makeRoutes({
        [`${API}/releases?per_page=100`]: () => jsonResponse([makeRelease('stable', { name: 'Release 3.2' })]),
        [`${API}/tags?per_page=100`]: () => jsonResponse([]),
      }),
    );
    const { records } = await resolveAndList(new GitHubProvider(makeDeps('github', routes.fetch)));
    expect(records[0]?.tag).toBe('stable');
    expect(records[0]?.version.release).toEqual([3, 2]);
  });

  it('falls back to releases only when the tag list fails', async () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ level: 'warn', handler: (entry) => entries.push(entry) });
    const routes = routedFetch(
      makeRoutes({ [`${API}/tags?per_page=100`]: () => new Response('oops', { status: 500 }) }),
    );

    const { records } = await resolveAndList(new GitHubProvider(makeDeps('github', routes.fetch, { logger })));
    expect(records.map((r) => r.tag)).toEqual(['v2.0.0', 'v2.1.0-rc1', 'v2.1.0']);
    expect(entries.map((entry) => entry.message)).toEqual(['tag list unavailable, using releases only']);
    expect(entries[0]?.context).toMatchObject({ provider: 'github', project: 'acme/tool' });
  });

  it('raises NotFoundError for a missing repository', async () => {
    const provider = new GitHubProvider(makeDeps('github', routedFetch({}).fetch));
    const error = await provider.resolveIdentifier(parseIdentifierInput('acme/missing')).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toHaveProperty('message', 'Project "acme/missing" was not found on github');
  });

  it('sends the configured token', async () => {
    const routes = routedFetch(makeRoutes());
    const provider = new GitHubProvider(
      makeDeps('github', routes.fetch, { config: { tokens: { github: 'test-secret' } } }),
    );
    await provider.resolveIdentifier(parseIdentifierInput('acme/tool'));
    expect(routes.headers[0]).toMatchObject({
      authorization: 'Bearer test-secret',
      accept: 'application/vnd.github+json',
    });
  });
});
