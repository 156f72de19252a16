/**
 * Release Resolver
 * Picks one release from the first candidate repository that has one.
 */

import logger from '../../utils/logger';
import type { Channel, Release, RepositoryId, ResolvedRelease } from '../../types';
import { ResolutionError, errorMessage } from '../errors';
import type { ReleaseSource } from './github-client';

export interface ResolveReleaseOptions {
  channel: Channel;
  /** Exact tag; bypasses channel selection */
  tag?: string;
  perPage: number;
}

export interface CandidateFailure {
  repository: RepositoryId;
  reason: string;
}

/**
 * Newest published release of the preferred channel, else the newest of the other one.
 * Releases are expected newest first, as the API returns them.
 */
export function selectRelease(releases: Release[], channel: Channel): Release | null {
  const published = releases.filter((release) => !release.draft);
  const newestStable = published.find((release) => !release.prerelease);
  const newestPre = published.find((release) => release.prerelease);

  if (channel === 'pre') {
    return newestPre ?? newestStable ?? null;
  }
  return newestStable ?? newestPre ?? null;
}

export async function resolveRelease(
  source: ReleaseSource,
  candidates: RepositoryId[],
  options: ResolveReleaseOptions
): Promise<ResolvedRelease> {
  const failures: CandidateFailure[] = [];

  for (const repository of candidates) {
    let reason: string;
    try {
      const release = await resolveFromRepository(source, repository, options);
      if (release) {
        logger.info('release resolved', {
          repository,
          tag: release.tagName,
          prerelease: release.prerelease,
        });
        return { repository, release };
      }
      reason = options.tag ? `no release tagged ${options.tag}` : 'no published release';
    } catch (error) {
      reason = errorMessage(error);
    }

    logger.warn('release candidate skipped', { repository, reason });
    failures.push({ repository, reason });
  }

  const target = options.tag ? `tag ${options.tag}` : `channel ${options.channel}`;
  throw new ResolutionError(`No matching release found (${target}).`, {
    hints: [
      ...failures.map((failure) => `${failure.repository}: ${failure.reason}`),
      'Check the repository name (--repo owner/name).',
      'Set GITHUB_TOKEN for higher API rate limits or private repositories.',
    ],
  });
}

async function resolveFromRepository(
  source: ReleaseSource,
  repository: RepositoryId,
  options: ResolveReleaseOptions
): Promise<Release | null> {
  if (options.tag) {
    const release = await source.getReleaseByTag(repository, options.tag);
    return release && !release.draft ? release : null;
  }

  const releases = await source.listReleases(repository, options.perPage);
  return selectRelease(releases, options.channel);
}
