// Core module exports

// Releases
export { GitHubReleaseClient, resolveRelease, selectRelease, selectAsset, compileAssetPattern } from './releases';
export type { ReleaseSource, GitHubReleaseClientOptions, ResolveReleaseOptions } from './releases';

// Download
export { downloadAsset } from './download/downloader';
export type { DownloadOptions, DownloadResult } from './download/downloader';

// System adapters
export * from './system';

// Install
export * from './install';

// Config
export { ConfigManager, getConfigManager, resolveInstallOptions, resolveApiToken, DEFAULT_SETTINGS } from './config';
export type { Settings, SettingsKey, CliInstallFlags } from './config';

// Errors
export * from './errors';
