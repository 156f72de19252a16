/**
 * Install Pipeline
 * resolve release → select asset → download → extract metadata → install → activate
 */

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import logger from '../../utils/logger';
import type {
  DownloadProgress,
  InstallOptions,
  InstallReport,
  PipelineEvent,
  ResolvedTarget,
} from '../../types';
import { AssetError } from '../errors';
import { downloadAsset } from '../download/downloader';
import type { ReleaseSource } from '../releases/github-client';
import { resolveRelease } from '../releases/resolver';
import { compileAssetPattern, selectAsset } from '../releases/asset-selector';
import type { PackageArchiveReader, PackageManager } from '../system/dpkg';
import type { ServiceManager } from '../system/systemctl';
import { extractTargetMetadata } from './metadata-extractor';
import { installPackage } from './installer';
import { ServiceActivator } from './service-activator';

export const APP_DISPLAY_NAME = 'cpuGovernor';

export interface InstallPipelineDeps {
  releases: ReleaseSource;
  archive: PackageArchiveReader;
  packageManager: PackageManager;
  services: ServiceManager;
  download?: typeof downloadAsset;
  /** Parent of the per-run temporary directory */
  tempRoot?: string;
  /** API token, also sent with asset downloads from github.com */
  token?: string;
}

export interface PipelineCallbacks {
  onStep?: (event: PipelineEvent) => void;
  onDownloadProgress?: (progress: DownloadProgress) => void;
}

export class InstallPipeline {
  private readonly download: typeof downloadAsset;
  private readonly activator: ServiceActivator;

  constructor(
    private readonly deps: InstallPipelineDeps,
    private readonly callbacks: PipelineCallbacks = {}
  ) {
    this.download = deps.download ?? downloadAsset;
    this.activator = new ServiceActivator(deps.services);
  }

  async run(options: InstallOptions): Promise<InstallReport> {
    const pattern = compileAssetPattern(options.assetPattern);

    const target = options.tag ? `${options.channel}, tag=${options.tag}` : options.channel;
    this.step('info', `Resolving release from ${options.repositories.join(', ')} (${target}) ...`);
    const { repository, release } = await resolveRelease(this.deps.releases, options.repositories, {
      channel: options.channel,
      tag: options.tag,
      perPage: options.releasesPerPage,
    });
    const version = release.tagName.replace(/^v/, '');

    const asset = selectAsset(release, pattern);
    if (!asset) {
      throw new AssetError(`No .deb asset matching the pattern in release ${release.tagName}.`, {
        hints: [
          `Pattern: ${options.assetPattern}`,
          `Assets: ${release.assets.map((item) => item.name).join(', ') || '(none)'}`,
          `List them with: cpugovernor-install releases --repo ${repository} --tag ${release.tagName}`,
        ],
      });
    }

    const tempDir = await fs.mkdtemp(path.join(this.deps.tempRoot ?? os.tmpdir(), `${APP_DISPLAY_NAME}-install-`));
    try {
      const debPath = path.join(tempDir, `${APP_DISPLAY_NAME}_${version}.deb`);

      this.step('info', `Downloading: ${asset.downloadUrl}`);
      await this.download(asset.downloadUrl, debPath, {
        retries: options.downloadRetries,
        retryDelayMs: options.downloadRetryDelayMs,
        token: this.deps.token,
        onProgress: this.callbacks.onDownloadProgress,
      });

      const metadata = await extractTargetMetadata(debPath, this.deps.archive, {
        packageName: options.packageName,
        serviceName: options.serviceName,
        defaultUnitName: options.defaultUnitName,
        unitMarker: options.unitMarker,
      });
      const resolved: ResolvedTarget = { repository, release, asset, ...metadata };
      logger.info('install target resolved', {
        repository,
        tag: release.tagName,
        asset: asset.name,
        packageName: resolved.packageName,
        unitName: resolved.unitName,
        unitSource: metadata.unitSource,
      });

      const previousVersion = await this.deps.packageManager.installedVersion(resolved.packageName);
      this.step(
        'info',
        previousVersion
          ? `Installed: ${resolved.packageName} ${previousVersion}`
          : `No existing ${resolved.packageName} installation found.`
      );
      this.step('info', `Target: ${resolved.packageName} (tag=${release.tagName}) | Unit: ${resolved.unitName}`);

      await this.activator.stopIfPresent(resolved.unitName, { lowercaseFallback: options.lowercaseUnitFallback });

      this.step('info', 'Installing package ...');
      const outcome = await installPackage(debPath, this.deps.packageManager, {
        onRepair: () => this.step('warn', 'dpkg -i failed, trying apt-get -f install'),
      });
      this.step('ok', `Installed: ${resolved.packageName} ${version}`);

      const unitName = await this.activator.activate(resolved.unitName, {
        lowercaseFallback: options.lowercaseUnitFallback,
        journalLines: options.journalLines,
        onWarning: (message) => this.step('warn', message),
      });

      const installedVersion = (await this.deps.packageManager.installedVersion(resolved.packageName)) ?? version;

      return {
        repository,
        tagName: release.tagName,
        version,
        assetName: asset.name,
        packageName: resolved.packageName,
        unitName,
        previousVersion,
        installedVersion,
        repaired: outcome.repaired,
      };
    } finally {
      await fs.remove(tempDir);
    }
  }

  private step(level: PipelineEvent['level'], message: string): void {
    this.callbacks.onStep?.({ level, message });
  }
}
