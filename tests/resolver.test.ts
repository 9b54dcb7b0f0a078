import { describe, it, expect } from 'vitest';
import { GitHubProvider } from '../src/providers/github.js';
import { ProviderRegistry } from '../src/providers/registry.js';
import type { ProviderClient } from '../src/providers/provider-client.js';
import { Resolver } from '../src/resolver/resolver.js';
import {
  AmbiguousError,
  ConfigError,
  NoMatchingReleaseError,
  NotFoundError,
  TimeoutError,
  TransientProviderError,
} from '../src/utils/errors.js';
import { createLogger, silentLogger, type LogEntry } from '../src/utils/logger.js';
import { StubProvider, jsonResponse, makeDeps, routedFetch } from './fakes.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeResolver(providers: ProviderClient[], options: { entries?: LogEntry[] } = {}): Resolver {
  const { entries } = options;
  return new Resolver({
    registry: new ProviderRegistry(providers),
    logger: entries ? createLogger({ level: 'warn', handler: (entry) => entries.push(entry) }) : silentLogger,
    timeoutMs: 5_000,
  });
}

const TOOL_RELEASES = [
  { tag: '1.0.0', publishedAt: '2025-01-01T00:00:00Z' },
  { tag: '1.2.0' },
  { tag: '2.0.0-rc.1' },
  { tag: '1.10.0', draft: true },
];

function assetStub(): StubProvider {
  return new StubProvider('pypi', { assets: 'deferred' }).withProject('tool', [
    { tag: '1.0.0' },
    { tag: '1.1.0' },
    { tag: '1.2.0' },
  ]);
}

const LINUX = { name: 'tool-linux.tar.gz', url: 'https://files.example/tool-linux.tar.gz' };
const SOURCE = { name: 'tool-src.zip', url: 'https://files.example/tool-src.zip' };

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

describe('Resolver.resolveDetailed', () => {
  it('returns the greatest stable release and the exclusion log', async () => {
    const resolver = makeResolver([new StubProvider('pypi').withProject('tool', TOOL_RELEASES), new StubProvider('npm')]);
    const resolution = await resolver.resolveDetailed('tool');

    expect(resolution.release.tag).toBe('1.2.0');
    expect(resolution.project.provider).toBe('pypi');
    expect(resolution.total).toBe(4);
    expect(resolution.exclusions).toEqual([
      { tag: '2.0.0-rc.1', reason: 'prerelease' },
      { tag: '1.10.0', reason: 'draft release' },
    ]);
  });

  it('applies the policy', async () => {
    const resolver = makeResolver([new StubProvider('pypi').withProject('tool', TOOL_RELEASES)]);
    expect((await resolver.resolve('tool', { includePrereleases: true })).tag).toBe('2.0.0-rc.1');
    expect((await resolver.resolve('tool', { major: '1', only: '1.0' })).tag).toBe('1.0.0');
  });

  it('keeps the final release above its own pre-release either way', async () => {
    const resolver = makeResolver([
      new StubProvider('pypi')
        .withProject('tool', [{ tag: '1.0.0' }, { tag: '1.1.0-beta' }, { tag: '1.1.0' }])
        .withProject('next', [{ tag: '1.0.0' }, { tag: '1.2.0-beta' }]),
    ]);

    expect((await resolver.resolve('tool')).tag).toBe('1.1.0');
    expect((await resolver.resolve('tool', { includePrereleases: true })).tag).toBe('1.1.0');
    expect((await resolver.resolve('next')).tag).toBe('1.0.0');
    expect((await resolver.resolve('next', { includePrereleases: true })).tag).toBe('1.2.0-beta');
  });

  it('stays inside a pinned major', async () => {
    const resolver = makeResolver([
      new StubProvider('pypi').withProject('tool', [{ tag: '1.5.0' }, { tag: '2.0.0' }, { tag: '2.1.0' }]),
    ]);
    expect((await resolver.resolve('tool', { major: '1' })).tag).toBe('1.5.0');
    expect((await resolver.resolve('tool')).tag).toBe('2.1.0');
  });

  it('rejects an invalid policy before any lookup', async () => {
    const pypi = new StubProvider('pypi').withProject('tool', TOOL_RELEASES);
    const resolver = makeResolver([pypi]);
    await expect(resolver.resolve('tool', { major: 'one' })).rejects.toBeInstanceOf(ConfigError);
    expect(pypi.resolveCalls).toEqual([]);
  });

  it('explains an empty result', async () => {
    const resolver = makeResolver([
      new StubProvider('pypi')
        .withProject('tool', [{ tag: '1.0.0-beta.1' }, { tag: '1.0.0-beta.2' }])
        .withProject('empty', []),
    ]);

    const failure = resolver.resolve('tool');
    await expect(failure).rejects.toBeInstanceOf(NoMatchingReleaseError);
    await expect(failure).rejects.toThrow('None of the 2 releases of "tool" satisfy the selection policy');
    await expect(resolver.resolve('empty')).rejects.toThrow('Project "empty" has no releases');
  });
});

// ---------------------------------------------------------------------------
// Provider selection
// ---------------------------------------------------------------------------

describe('Resolver provider selection', () => {
  it('reports a name found on several package indexes as ambiguous', async () => {
    const resolver = makeResolver([
      new StubProvider('pypi').withProject('tool', TOOL_RELEASES),
      new StubProvider('npm').withProject('tool', TOOL_RELEASES),
    ]);

    const failure = resolver.resolve('tool');
    await expect(failure).rejects.toBeInstanceOf(AmbiguousError);
    await expect(failure).rejects.toThrow(
      'Project "tool" exists on several providers (pypi, npm); pass a provider hint to choose one',
    );
  });

  it('asks only the hinted provider', async () => {
    const pypi = new StubProvider('pypi').withProject('tool', TOOL_RELEASES);
    const npm = new StubProvider('npm').withProject('tool', [{ tag: '3.0.0' }]);
    const resolver = makeResolver([pypi, npm]);

    expect((await resolver.resolve('npm:tool')).tag).toBe('3.0.0');
    expect((await resolver.resolve('tool', {}, { at: 'npm' })).tag).toBe('3.0.0');
    expect(pypi.resolveCalls).toEqual([]);
  });

  it('rejects an unknown provider hint', async () => {
    const resolver = makeResolver([new StubProvider('pypi'), new StubProvider('npm')]);
    await expect(resolver.resolve('tool', {}, { at: 'nuget' })).rejects.toThrow(
      'Unknown provider "nuget"; expected one of pypi, npm',
    );
  });

  it('reports a name nobody has as not found', async () => {
    const resolver = makeResolver([new StubProvider('pypi'), new StubProvider('npm')]);
    const failure = resolver.resolve('missing');
    await expect(failure).rejects.toBeInstanceOf(NotFoundError);
    await expect(failure).rejects.toThrow('No provider recognises project "missing"');
  });

  it('falls through forges in order for slugs', async () => {
    const github = new StubProvider('github', { shapes: ['slug'] });
    const gitlab = new StubProvider('gitlab', { shapes: ['slug'] }).withProject('acme/tool', [{ tag: 'v1.0.0' }]);
    const resolution = await makeResolver([github, gitlab]).resolveDetailed('acme/tool');

    expect(resolution.project.provider).toBe('gitlab');
    expect(github.resolveCalls).toEqual(['acme/tool']);
  });
});

describe('Resolver concurrency', () => {
  it('fetches each URL once for concurrent resolutions of one project', async () => {
    const api = 'https://api.github.com/repos/acme/tool';
    const routes = routedFetch({
      [api]: () => jsonResponse({ full_name: 'acme/tool', html_url: 'https://github.com/acme/tool' }),
      [`${api}/releases?per_page=100`]: () =>
        jsonResponse([
          {
            tag_name: 'v2.0.0',
            name: 'v2.0.0',
            draft: false,
            prerelease: false,
            published_at: '2025-01-10T00:00:00Z',
            html_url: 'https://github.com/acme/tool/releases/tag/v2.0.0',
            tarball_url: `${api}/tarball/v2.0.0`,
            assets: [],
          },
        ]),
      [`${api}/tags?per_page=100`]: () => jsonResponse([{ name: 'v1.9.0', tarball_url: `${api}/tarball/v1.9.0` }]),
    });
    const resolver = makeResolver([new GitHubProvider(makeDeps('github', routes.fetch))]);

    const [first, second] = await Promise.all([resolver.resolve('acme/tool'), resolver.resolve('acme/tool')]);

    expect(first.tag).toBe('v2.0.0');
    expect(second.tag).toBe('v2.0.0');
    expect([...routes.calls].sort()).toEqual([api, `${api}/releases?per_page=100`, `${api}/tags?per_page=100`]);
  });
});

// ---------------------------------------------------------------------------
// Budget and cancellation
// ---------------------------------------------------------------------------

describe('Resolver budget', () => {
  it('surfaces TimeoutError when the budget runs out', async () => {
    const pypi = new StubProvider('pypi');
    pypi.hang = true;
    const resolver = makeResolver([pypi]);

    const failure = resolver.resolve('tool', {}, { timeoutMs: 20 });
    await expect(failure).rejects.toBeInstanceOf(TimeoutError);
    await expect(failure).rejects.toThrow('Resolution did not finish within 20ms');
  });

  it("surfaces the caller's abort reason", async () => {
    const pypi = new StubProvider('pypi');
    pypi.hang = true;
    const controller = new AbortController();

    const failure = makeResolver([pypi]).resolve('tool', {}, { signal: controller.signal });
    controller.abort(new Error('caller gave up'));
    await expect(failure).rejects.toThrow('caller gave up');
  });
});

// ---------------------------------------------------------------------------
// Deferred assets
// ---------------------------------------------------------------------------

describe('Resolver with havingAsset', () => {
  it('fetches asset lists newest first and stops at the first match', async () => {
    const pypi = assetStub();
    pypi.assetLists.set('1.2.0', [SOURCE]);
    pypi.assetLists.set('1.1.0', [LINUX]);

    const resolution = await makeResolver([pypi]).resolveDetailed('tool', { havingAsset: 'linux' });
    expect(resolution.release.tag).toBe('1.1.0');
    expect(resolution.release.assets).toEqual([LINUX]);
    expect(pypi.assetCalls).toEqual(['1.2.0', '1.1.0']);
    expect(resolution.exclusions).toEqual([
      { tag: '1.2.0', reason: 'no asset matching "linux"' },
      { tag: '1.0.0', reason: 'no asset matching "linux"' },
    ]);
  });

  it('treats a failed asset lookup as no assets and logs it', async () => {
    const entries: LogEntry[] = [];
    const pypi = assetStub();
    pypi.assetLists.set('1.2.0', new TransientProviderError('pypi', 'HTTP 503'));
    pypi.assetLists.set('1.1.0', [LINUX]);

    const release = await makeResolver([pypi], { entries }).resolve('tool', { havingAsset: true });
    expect(release.tag).toBe('1.1.0');
    expect(entries.map((entry) => [entry.level, entry.message, entry.context])).toEqual([
      [
        'warn',
        'asset list unavailable, treating release as having none',
        { component: 'resolver', provider: 'pypi', project: 'tool', tag: '1.2.0', error: 'pypi: HTTP 503' },
      ],
    ]);
  });

  it('propagates unexpected asset lookup failures', async () => {
    const pypi = assetStub();
    pypi.assetLists.set('1.2.0', new Error('boom'));
    await expect(makeResolver([pypi]).resolve('tool', { havingAsset: true })).rejects.toThrow('boom');
  });
});

// ---------------------------------------------------------------------------
// candidates
// ---------------------------------------------------------------------------

describe('Resolver.candidates', () => {
  it('lists every acceptable release newest first', async () => {
    const resolver = makeResolver([
      new StubProvider('pypi').withProject('tool', [
        { tag: '1.0.0' },
        { tag: '1.2.0' },
        { tag: '1.1.0' },
        { tag: '2.0.0-rc.1' },
      ]),
    ]);
    const candidates = await resolver.candidates('tool');
    expect(candidates.map((record) => record.tag)).toEqual(['1.2.0', '1.1.0', '1.0.0']);
  });
});
