import type { Release, ReleaseAsset } from '../../types';
import { ConfigError } from '../errors';

export function compileAssetPattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigError(`Invalid asset pattern: ${pattern}`, { cause: error });
  }
}

/**
 * First asset, in release order, whose name matches the pattern.
 */
export function selectAsset(release: Release, pattern: string | RegExp): ReleaseAsset | null {
  const regex = typeof pattern === 'string' ? compileAssetPattern(pattern) : pattern;
  return release.assets.find((asset) => regex.test(asset.name)) ?? null;
}
