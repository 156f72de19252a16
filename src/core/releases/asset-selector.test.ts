import { describe, it, expect } from 'vitest';
import { compileAssetPattern, selectAsset } from './asset-selector';
import { ConfigError } from '../errors';
import { DEFAULT_SETTINGS } from '../config';
import { asset, release } from '../../test-utils/fixtures';

describe('selectAsset', () => {
  const candidate = release('v1.0', {
    assets: [asset('cpuGovernor_1.0_amd64.deb'), asset('cpuGovernor_1.0_arm64.deb'), asset('notes.txt')],
  });

  it('returns the first matching asset in release order', () => {
    expect(selectAsset(candidate, DEFAULT_SETTINGS.assetPattern)?.name).toBe('cpuGovernor_1.0_amd64.deb');
  });

  it('honors a narrower pattern', () => {
    expect(selectAsset(candidate, '_arm64\\.deb$')?.name).toBe('cpuGovernor_1.0_arm64.deb');
  });

  it('returns null when nothing matches', () => {
    expect(selectAsset(candidate, '_riscv64\\.deb$')).toBeNull();
    expect(selectAsset(release('v1.0'), DEFAULT_SETTINGS.assetPattern)).toBeNull();
  });

  it('matches architecture-independent packages', () => {
    const allArch = release('v1.1', { assets: [asset('cpuGovernor_1.1_all.deb')] });
    expect(selectAsset(allArch, DEFAULT_SETTINGS.assetPattern)?.name).toBe('cpuGovernor_1.1_all.deb');
  });
});

describe('compileAssetPattern', () => {
  it('rejects an invalid regular expression', () => {
    expect(() => compileAssetPattern('([')).toThrow(ConfigError);
    expect(() => compileAssetPattern('([')).toThrow('Invalid asset pattern: ([');
  });
});
