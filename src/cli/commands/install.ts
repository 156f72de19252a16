/**
 * install command
 * Resolves, downloads and installs the package, then restarts its unit.
 */

import chalk from 'chalk';
import cliProgress from 'cli-progress';
import { getConfigManager, resolveApiToken, resolveInstallOptions } from '../../core/config';
import { InstallPipeline } from '../../core/install/pipeline';
import { GitHubReleaseClient } from '../../core/releases/github-client';
import { SpawnCommandRunner } from '../../core/system/command-runner';
import { DpkgPackageManager } from '../../core/system/dpkg';
import { Systemctl } from '../../core/system/systemctl';
import { requireRoot, requireTools } from '../../core/system/preflight';
import logger from '../../utils/logger';
import type { Channel, DownloadProgress, InstallReport } from '../../types';
import { ok, printEvent, reportError, warn } from '../output';

export interface InstallCommandOptions {
  pre?: boolean;
  stable?: boolean;
  tag?: string;
  repo?: string;
  assetRegex?: string;
  service?: string;
  package?: string;
  /** commander sets this to true unless --no-lowercase-fallback is given */
  lowercaseFallback?: boolean;
  verbose?: boolean;
}

export async function installCommand(options: InstallCommandOptions): Promise<number> {
  const configManager = getConfigManager();
  const progress = new DownloadProgressBar();

  try {
    const settings = await configManager.loadSettings((reason) =>
      warn(`Ignoring invalid settings (${reason}); using defaults.`)
    );
    await logger.initialize({ level: settings.logLevel, verbose: options.verbose });

    const installOptions = resolveInstallOptions(settings, {
      channel: channelFromFlags(options),
      tag: options.tag,
      repo: options.repo,
      assetRegex: options.assetRegex,
      service: options.service,
      package: options.package,
      lowercaseFallback: options.lowercaseFallback === false ? false : undefined,
    });
    logger.info('install started', { ...installOptions });

    requireRoot();
    requireTools();

    const runner = new SpawnCommandRunner();
    const dpkg = new DpkgPackageManager(runner);
    const token = resolveApiToken();
    const pipeline = new InstallPipeline(
      {
        releases: new GitHubReleaseClient({ apiBaseUrl: settings.apiBaseUrl, token }),
        archive: dpkg,
        packageManager: dpkg,
        services: new Systemctl(runner),
        token,
      },
      {
        onStep: (event) => {
          progress.stop();
          printEvent(event);
        },
        onDownloadProgress: (update) => progress.update(update),
      }
    );

    const report = await pipeline.run(installOptions);
    printSummary(report);
    logger.info('install finished', { ...report });
    return 0;
  } catch (error) {
    progress.stop();
    return reportError(error);
  } finally {
    await logger.close();
  }
}

function channelFromFlags(options: InstallCommandOptions): Channel | undefined {
  if (options.pre) return 'pre';
  if (options.stable) return 'stable';
  return undefined;
}

function printSummary(report: InstallReport): void {
  const from = report.previousVersion ? `${report.previousVersion} → ` : '';
  ok(`Done: ${report.packageName} ${from}${report.installedVersion} (service active: ${report.unitName})`);
  if (report.repaired) {
    console.log(chalk.gray('  Dependencies were repaired with apt-get -f install.'));
  }
}

class DownloadProgressBar {
  private bar: cliProgress.SingleBar | null = null;

  update(progress: DownloadProgress): void {
    if (progress.totalBytes <= 0) return;

    if (!this.bar) {
      this.bar = new cliProgress.SingleBar(
        {
          hideCursor: true,
          clearOnComplete: false,
          format: ' {bar} | {percentage}% | {value}/{total} bytes',
        },
        cliProgress.Presets.shades_classic
      );
      this.bar.start(progress.totalBytes, 0);
    }
    this.bar.update(progress.bytesDownloaded);
  }

  stop(): void {
    if (this.bar) {
      this.bar.stop();
      this.bar = null;
    }
  }
}
