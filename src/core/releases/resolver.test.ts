import { describe, it, expect } from 'vitest';
import { resolveRelease, selectRelease } from './resolver';
import { ReleaseApiError, ResolutionError } from '../errors';
import { release, StaticReleaseSource } from '../../test-utils/fixtures';

describe('selectRelease', () => {
  const pre = release('v2.0.0-rc1', { prerelease: true });
  const stable = release('v1.9.0');

  it('stable channel picks the newest stable release', () => {
    expect(selectRelease([pre, stable], 'stable')).toBe(stable);
  });

  it('pre channel picks the newest pre-release', () => {
    expect(selectRelease([pre, stable], 'pre')).toBe(pre);
  });

  it('stable channel falls back to a pre-release', () => {
    expect(selectRelease([pre], 'stable')).toBe(pre);
  });

  it('pre channel falls back to a stable release', () => {
    expect(selectRelease([stable], 'pre')).toBe(stable);
  });

  it('takes the first match in list order', () => {
    const older = release('v1.8.0');
    expect(selectRelease([stable, older], 'stable')).toBe(stable);
  });

  it('ignores drafts', () => {
    const draft = release('v3.0.0', { draft: true });
    expect(selectRelease([draft, stable], 'stable')).toBe(stable);
    expect(selectRelease([draft], 'pre')).toBeNull();
  });

  it('returns null for an empty list', () => {
    expect(selectRelease([], 'stable')).toBeNull();
  });
});

describe('resolveRelease', () => {
  it('stops at the first candidate with a release', async () => {
    const source = new StaticReleaseSource({
      'acme/first': [],
      'acme/second': [release('v1.0.0')],
      'acme/third': [release('v9.0.0')],
    });

    const resolved = await resolveRelease(source, ['acme/first', 'acme/second', 'acme/third'], {
      channel: 'stable',
      perPage: 50,
    });

    expect(resolved.repository).toBe('acme/second');
    expect(resolved.release.tagName).toBe('v1.0.0');
    expect(source.listCalls).toEqual(['acme/first', 'acme/second']);
  });

  it('moves on when a candidate fails', async () => {
    const source = new StaticReleaseSource({
      'acme/missing': new ReleaseApiError('Release API request failed (HTTP 404) for /repos/acme/missing/releases', 404),
      'acme/present': [release('v0.3.0')],
    });

    const resolved = await resolveRelease(source, ['acme/missing', 'acme/present'], {
      channel: 'stable',
      perPage: 50,
    });

    expect(resolved.repository).toBe('acme/present');
  });

  it('uses the exact tag and skips channel selection', async () => {
    const source = new StaticReleaseSource({
      'acme/app': [release('v2.0.0-rc1', { prerelease: true }), release('v1.0.0')],
    });

    const resolved = await resolveRelease(source, ['acme/app'], { channel: 'stable', tag: 'v2.0.0-rc1', perPage: 50 });

    expect(resolved.release.tagName).toBe('v2.0.0-rc1');
    expect(source.listCalls).toEqual([]);
    expect(source.tagCalls).toEqual([{ repository: 'acme/app', tag: 'v2.0.0-rc1' }]);
  });

  it('fails when the tag exists in no candidate', async () => {
    const source = new StaticReleaseSource({
      'acme/a': [release('v1.0.0')],
      'acme/b': [release('v1.0.0')],
    });

    const error = await resolveRelease(source, ['acme/a', 'acme/b'], { channel: 'stable', tag: 'v9.9.9', perPage: 50 })
      .then(() => null, (e: unknown) => e);

    expect(error).toBeInstanceOf(ResolutionError);
    expect(error).toMatchObject({
      message: 'No matching release found (tag v9.9.9).',
      hints: [
        'acme/a: no release tagged v9.9.9',
        'acme/b: no release tagged v9.9.9',
        'Check the repository name (--repo owner/name).',
        'Set GITHUB_TOKEN for higher API rate limits or private repositories.',
      ],
    });
  });

  it('rejects a tagged draft', async () => {
    const source = new StaticReleaseSource({ 'acme/a': [release('v1.0.0', { draft: true })] });

    await expect(
      resolveRelease(source, ['acme/a'], { channel: 'stable', tag: 'v1.0.0', perPage: 50 })
    ).rejects.toThrow('No matching release found (tag v1.0.0).');
  });

  it('reports every candidate failure in the hints', async () => {
    const source = new StaticReleaseSource({
      'acme/a': new Error('socket hang up'),
      'acme/b': [],
    });

    await expect(resolveRelease(source, ['acme/a', 'acme/b'], { channel: 'pre', perPage: 50 })).rejects.toMatchObject({
      message: 'No matching release found (channel pre).',
      hints: expect.arrayContaining(['acme/a: socket hang up', 'acme/b: no published release']),
    });
  });
});
