import { describe, it, expect } from 'vitest';
import { ProviderRegistry } from '../src/providers/registry.js';
import { Resolver } from '../src/resolver/resolver.js';
import { checkForUpdate, classifyUpdateType, describeUpdate } from '../src/resolver/update-check.js';
import { ConfigError } from '../src/utils/errors.js';
import { silentLogger } from '../src/utils/logger.js';
import { parseVersion } from '../src/version/version.js';
import { StubProvider } from './fakes.js';

function makeResolver(): Resolver {
  const pypi = new StubProvider('pypi').withProject('tool', [
    { tag: '1.2.0' },
    { tag: '1.2.5' },
    { tag: '1.3.0' },
    { tag: '2.0.0' },
    { tag: '2.1.0-rc.1' },
  ]);
  return new Resolver({ registry: new ProviderRegistry([pypi]), logger: silentLogger, timeoutMs: 5_000 });
}

describe('classifyUpdateType', () => {
  it('names the largest changed component', () => {
    expect(classifyUpdateType(parseVersion('1.2.3'), parseVersion('2.0.0'))).toBe('major');
    expect(classifyUpdateType(parseVersion('1.2.3'), parseVersion('1.4.0'))).toBe('minor');
    expect(classifyUpdateType(parseVersion('1.2.3'), parseVersion('v1.2.9'))).toBe('patch');
    expect(classifyUpdateType(parseVersion('1.2.3'), parseVersion('1.2.3'))).toBeNull();
  });
});

describe('checkForUpdate', () => {
  it('finds the latest stable release', async () => {
    const update = await checkForUpdate(makeResolver(), 'tool', '1.2.0');
    expect(update?.release.tag).toBe('2.0.0');
    expect(update?.updateType).toBe('major');
    expect(update && describeUpdate(update)).toBe('1.2.0 → 2.0.0 (major)');
  });

  it('stays within the constraint', async () => {
    const resolver = makeResolver();
    expect((await checkForUpdate(resolver, 'tool', '1.2.0', { constraint: 'minor' }))?.release.tag).toBe('1.3.0');
    expect((await checkForUpdate(resolver, 'tool', '1.2.0', { constraint: 'patch' }))?.release.tag).toBe('1.2.5');
  });

  it('returns null when already current', async () => {
    expect(await checkForUpdate(makeResolver(), 'tool', '2.0.0')).toBeNull();
  });

  it('rejects a current version that is not a version', async () => {
    const failure = checkForUpdate(makeResolver(), 'tool', 'acme/tool');
    await expect(failure).rejects.toBeInstanceOf(ConfigError);
    await expect(failure).rejects.toThrow('"acme/tool" is not a version');
  });
});
