import { describe, it, expect } from 'vitest';
import {
  buildReleaseRecord,
  compareReleases,
  maxRelease,
  withAssets,
  type ReleaseRecordInput,
} from '../src/release/release-record.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeRecord(overrides?: Partial<ReleaseRecordInput>) {
  return buildReleaseRecord({ tag: 'v1.0.0', ...overrides });
}

// ---------------------------------------------------------------------------
// buildReleaseRecord
// ---------------------------------------------------------------------------

describe('buildReleaseRecord', () => {
  it('fills defaults', () => {
    const record = makeRecord();
    expect(record.tag).toBe('v1.0.0');
    expect(record.version.release).toEqual([1, 0, 0]);
    expect(record.publishedAt).toBeNull();
    expect(record.isPrerelease).toBe(false);
    expect(record.prereleaseSource).toBe('inferred');
    expect(record.isDraft).toBe(false);
    expect(record.isFormal).toBe(true);
    expect(record.assets).toEqual([]);
    expect(record.sourceUrl).toBeNull();
    expect(record.pageUrl).toBeNull();
  });

  it('infers the prerelease flag from the tag', () => {
    const record = makeRecord({ tag: 'v2.0.0-rc1' });
    expect(record.isPrerelease).toBe(true);
    expect(record.prereleaseSource).toBe('inferred');
  });

  it('lets a provider-declared flag win over the tag', () => {
    const stable = makeRecord({ tag: 'v2.0.0-rc1', prerelease: false });
    expect(stable.isPrerelease).toBe(false);
    expect(stable.prereleaseSource).toBe('provider');

    const flagged = makeRecord({ tag: 'v2.0.0', prerelease: true });
    expect(flagged.isPrerelease).toBe(true);
  });

  it('parses versionText instead of the tag when given', () => {
    const record = makeRecord({ tag: 'stable', versionText: '3.1' });
    expect(record.tag).toBe('stable');
    expect(record.version.release).toEqual([3, 1]);
  });

  it('parses dates and drops invalid ones', () => {
    expect(makeRecord({ publishedAt: '2024-03-01T10:00:00Z' }).publishedAt?.toISOString()).toBe(
      '2024-03-01T10:00:00.000Z',
    );
    expect(makeRecord({ publishedAt: 'not a date' }).publishedAt).toBeNull();
    expect(makeRecord({ publishedAt: '' }).publishedAt).toBeNull();
  });

  it('freezes the record and its assets', () => {
    const record = makeRecord({ assets: [{ name: 'a.tar.gz', url: 'https://example.com/a.tar.gz' }] });
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.assets)).toBe(true);
    expect(Object.isFrozen(record.assets[0])).toBe(true);
  });
});

describe('withAssets', () => {
  it('returns a new record with the asset list replaced', () => {
    const record = makeRecord();
    const updated = withAssets(record, [{ name: 'x.zip', url: 'https://example.com/x.zip' }]);
    expect(record.assets).toEqual([]);
    expect(updated.assets).toEqual([{ name: 'x.zip', url: 'https://example.com/x.zip' }]);
    expect(updated.tag).toBe('v1.0.0');
  });
});

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

describe('compareReleases', () => {
  it('orders by version first', () => {
    expect(compareReleases(makeRecord({ tag: '1.0' }), makeRecord({ tag: '1.1' }))).toBe(-1);
  });

  it('breaks version ties by publish time, unknown dates losing', () => {
    const older = makeRecord({ tag: 'v1.0', publishedAt: '2024-01-01T00:00:00Z' });
    const newer = makeRecord({ tag: '1.0.0', publishedAt: '2024-02-01T00:00:00Z' });
    const undated = makeRecord({ tag: '1.0' });
    expect(compareReleases(older, newer)).toBe(-1);
    expect(compareReleases(undated, older)).toBe(-1);
  });

  it('breaks remaining ties by tag text', () => {
    expect(compareReleases(makeRecord({ tag: '1.0' }), makeRecord({ tag: 'v1.0' }))).toBe(-1);
  });
});

describe('maxRelease', () => {
  it('returns null for no records', () => {
    expect(maxRelease([])).toBeNull();
  });

  it('picks the greatest record', () => {
    const records = ['1.2.0', '1.10.0', '1.9.9', 'latest'].map((tag) => makeRecord({ tag }));
    expect(maxRelease(records)?.tag).toBe('1.10.0');
  });
});
