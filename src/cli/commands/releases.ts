import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, resolveApiToken, resolveInstallOptions } from '../../core/config';
import { ResolutionError, errorMessage } from '../../core/errors';
import { GitHubReleaseClient, type ReleaseSource } from '../../core/releases/github-client';
import logger from '../../utils/logger';
import type { Release, RepositoryId } from '../../types';
import { info, reportError, warn } from '../output';

export interface ReleasesCommandOptions {
  repo?: string;
  tag?: string;
  verbose?: boolean;
}

/**
 * Lists the releases of the first candidate repository that answers,
 * or the assets of one tagged release.
 */
export async function releasesCommand(options: ReleasesCommandOptions): Promise<number> {
  try {
    const settings = await getConfigManager().loadSettings((reason) =>
      warn(`Ignoring invalid settings (${reason}); using defaults.`)
    );
    await logger.initialize({ level: settings.logLevel, verbose: options.verbose });

    const { repositories, tag } = resolveInstallOptions(settings, { repo: options.repo, tag: options.tag });
    const source = new GitHubReleaseClient({ apiBaseUrl: settings.apiBaseUrl, token: resolveApiToken() });

    if (tag) {
      const { repository, release } = await findTaggedRelease(source, repositories, tag);
      info(`${repository} ${release.tagName}`);
      console.log(renderAssetTable(release));
    } else {
      const { repository, releases } = await findReleaseList(source, repositories, settings.releasesPerPage);
      info(`${repository}: ${releases.length} release(s)`);
      console.log(renderReleaseTable(releases));
    }
    return 0;
  } catch (error) {
    return reportError(error);
  } finally {
    await logger.close();
  }
}

async function findReleaseList(
  source: ReleaseSource,
  repositories: RepositoryId[],
  perPage: number
): Promise<{ repository: RepositoryId; releases: Release[] }> {
  const hints: string[] = [];
  for (const repository of repositories) {
    try {
      return { repository, releases: await source.listReleases(repository, perPage) };
    } catch (error) {
      hints.push(`${repository}: ${errorMessage(error)}`);
    }
  }
  throw new ResolutionError('No candidate repository returned a release list.', { hints });
}

async function findTaggedRelease(
  source: ReleaseSource,
  repositories: RepositoryId[],
  tag: string
): Promise<{ repository: RepositoryId; release: Release }> {
  const hints: string[] = [];
  for (const repository of repositories) {
    try {
      const release = await source.getReleaseByTag(repository, tag);
      if (release) {
        return { repository, release };
      }
      hints.push(`${repository}: no release tagged ${tag}`);
    } catch (error) {
      hints.push(`${repository}: ${errorMessage(error)}`);
    }
  }
  throw new ResolutionError(`No release tagged ${tag} found.`, { hints });
}

export function renderReleaseTable(releases: Release[]): string {
  const table = new Table({
    head: [chalk.cyan('Tag'), chalk.cyan('Channel'), chalk.cyan('Draft'), chalk.cyan('Published'), chalk.cyan('Assets')],
  });

  for (const release of releases) {
    table.push([
      release.tagName,
      release.prerelease ? 'pre' : 'stable',
      release.draft ? 'yes' : 'no',
      release.publishedAt ?? '-',
      String(release.assets.length),
    ]);
  }

  return table.toString();
}

export function renderAssetTable(release: Release): string {
  const table = new Table({
    head: [chalk.cyan('Asset'), chalk.cyan('Size'), chalk.cyan('URL')],
  });

  for (const asset of release.assets) {
    table.push([asset.name, asset.size === undefined ? '-' : String(asset.size), asset.downloadUrl]);
  }

  return table.toString();
}
