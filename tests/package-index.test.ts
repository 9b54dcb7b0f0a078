import { describe, it, expect } from 'vitest';
import { parseIdentifierInput } from '../src/providers/identifier.js';
import { NpmProvider, encodePackageName } from '../src/providers/npm.js';
import { PyPIProvider, normalizePackageName } from '../src/providers/pypi.js';
import { NotFoundError } from '../src/utils/errors.js';
import { jsonResponse, makeDeps, routedFetch } from './fakes.js';

// ---------------------------------------------------------------------------
// PyPI
// ---------------------------------------------------------------------------

const PYPI_URL = 'https://pypi.org/pypi/requests-oauthlib/json';

function pypiFile(filename: string, overrides: Record<string, unknown> = {}) {
  return {
    filename,
    url: `https://files.example.org/${filename}`,
    packagetype: 'bdist_wheel',
    upload_time_iso_8601: '2024-01-01T00:00:00Z',
    yanked: false,
    ...overrides,
  };
}

function pypiRoutes() {
  return routedFetch({
    [PYPI_URL]: () =>
      jsonResponse({
        info: {
          name: 'requests-oauthlib',
          summary: 'OAuth for requests',
          package_url: 'https://pypi.org/project/requests-oauthlib/',
        },
        releases: {
          '1.0.0': [
            pypiFile('requests-oauthlib-1.0.0.tar.gz', {
              packagetype: 'sdist',
              upload_time_iso_8601: '2024-01-02T00:00:00Z',
            }),
            pypiFile('requests_oauthlib-1.0.0-py3-none-any.whl'),
          ],
          '1.1.0': [pypiFile('requests_oauthlib-1.1.0-py3-none-any.whl', { yanked: true })],
          '2.0.0b1': [pypiFile('requests_oauthlib-2.0.0b1-py3-none-any.whl')],
          '0.9': [],
        },
      }),
  });
}

describe('normalizePackageName', () => {
  it('folds case and separator runs', () => {
    expect(normalizePackageName('Foo__Bar.baz')).toBe('foo-bar-baz');
  });
});

describe('PyPIProvider', () => {
  it('accepts names and project URLs', () => {
    const provider = new PyPIProvider(makeDeps('pypi', routedFetch({}).fetch));
    expect(provider.accepts(parseIdentifierInput('Requests_OAuthlib'))).toBe(true);
    expect(provider.accepts(parseIdentifierInput('https://pypi.org/project/requests/'))).toBe(true);
    expect(provider.accepts(parseIdentifierInput('acme/tool'))).toBe(false);
  });

  it('resolves through the normalized name and reuses the document', async () => {
    const routes = pypiRoutes();
    const provider = new PyPIProvider(makeDeps('pypi', routes.fetch));
    const project = await provider.resolveIdentifier(parseIdentifierInput('Requests_OAuthlib'));
    const releases = await provider.listReleases(project);

    expect(project.canonical).toBe('requests-oauthlib');
    expect(project.url).toBe('https://pypi.org/project/requests-oauthlib/');
    expect(releases.map((r) => r.version)).toEqual(['1.0.0', '1.1.0', '2.0.0b1', '0.9']);
    expect(routes.calls).toEqual([PYPI_URL]);
  });

  it('normalizes files into records', async () => {
    const provider = new PyPIProvider(makeDeps('pypi', pypiRoutes().fetch));
    const project = await provider.resolveIdentifier(parseIdentifierInput('requests-oauthlib'));
    const records = (await provider.listReleases(project)).map((r) => provider.toReleaseRecord(r, project));

    const [stable, yanked, beta, empty] = records;
    expect(stable?.publishedAt?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(stable?.sourceUrl).toBe('https://files.example.org/requests-oauthlib-1.0.0.tar.gz');
    expect(stable?.assets).toHaveLength(2);
    expect(stable?.pageUrl).toBe('https://pypi.org/project/requests-oauthlib/1.0.0/');
    expect(yanked?.isDraft).toBe(true);
    expect(beta?.isPrerelease).toBe(true);
    expect(empty?.isDraft).toBe(false);
    expect(empty?.publishedAt).toBeNull();
  });

  it('raises NotFoundError for unknown packages', async () => {
    const provider = new PyPIProvider(makeDeps('pypi', routedFetch({}).fetch));
    await expect(provider.resolveIdentifier(parseIdentifierInput('no-such-pkg'))).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});

// ---------------------------------------------------------------------------
// npm
// ---------------------------------------------------------------------------

const NPM_URL = 'https://registry.npmjs.org/@acme%2Fwidget';
const TARBALL = (version: string) => `https://registry.npmjs.org/@acme/widget/-/widget-${version}.tgz`;

function npmRoutes() {
  return routedFetch({
    [NPM_URL]: () =>
      jsonResponse({
        name: '@acme/widget',
        versions: {
          '1.0.0': { version: '1.0.0', dist: { tarball: TARBALL('1.0.0') } },
          '1.1.0': { version: '1.1.0', deprecated: 'broken build', dist: { tarball: TARBALL('1.1.0') } },
          '2.0.0-beta.1': { version: '2.0.0-beta.1', dist: { tarball: TARBALL('2.0.0-beta.1') } },
          '1.2.0': { version: '1.2.0', deprecated: '', dist: { tarball: TARBALL('1.2.0') } },
        },
        time: {
          created: '2024-04-01T00:00:00.000Z',
          '1.0.0': '2024-05-01T00:00:00.000Z',
        },
      }),
  });
}

describe('encodePackageName', () => {
  it('escapes the scope separator only', () => {
    expect(encodePackageName('@acme/widget')).toBe('@acme%2Fwidget');
    expect(encodePackageName('left-pad')).toBe('left-pad');
  });
});

describe('NpmProvider', () => {
  it('accepts scoped names and package pages', () => {
    const provider = new NpmProvider(makeDeps('npm', routedFetch({}).fetch));
    expect(provider.accepts(parseIdentifierInput('@acme/widget'))).toBe(true);
    expect(provider.accepts(parseIdentifierInput('https://www.npmjs.com/package/@acme/widget'))).toBe(true);
    expect(provider.accepts(parseIdentifierInput('Not_A_Package'))).toBe(false);
  });

  it('resolves a package page URL', async () => {
    const routes = npmRoutes();
    const provider = new NpmProvider(makeDeps('npm', routes.fetch));
    const project = await provider.resolveIdentifier(
      parseIdentifierInput('https://www.npmjs.com/package/@acme/widget'),
    );
    expect(project.canonical).toBe('@acme/widget');
    expect(project.url).toBe('https://www.npmjs.com/package/@acme/widget');
    expect(routes.calls).toEqual([NPM_URL]);
  });

  it('normalizes versions into records', async () => {
    const provider = new NpmProvider(makeDeps('npm', npmRoutes().fetch));
    const project = await provider.resolveIdentifier(parseIdentifierInput('@acme/widget'));
    const records = (await provider.listReleases(project)).map((r) => provider.toReleaseRecord(r, project));

    expect(records.map((r) => [r.tag, r.isDraft, r.isPrerelease])).toEqual([
      ['1.0.0', false, false],
      ['1.1.0', true, false],
      ['2.0.0-beta.1', false, true],
      ['1.2.0', false, false],
    ]);
    expect(records[0]?.assets).toEqual([{ name: 'widget-1.0.0.tgz', url: TARBALL('1.0.0') }]);
    expect(records[0]?.sourceUrl).toBe(TARBALL('1.0.0'));
    expect(records[0]?.publishedAt?.toISOString()).toBe('2024-05-01T00:00:00.000Z');
    expect(records[0]?.pageUrl).toBe('https://www.npmjs.com/package/@acme/widget/v/1.0.0');
    expect(records[1]?.publishedAt).toBeNull();
  });
});
