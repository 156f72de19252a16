// ============================================
// Release types
// ============================================

/** Release maturity selector */
export type Channel = 'stable' | 'pre';

/** `owner/name` identifier of a repository hosting the releases */
export type RepositoryId = string;

/** A single downloadable file attached to a release */
export interface ReleaseAsset {
  name: string;
  downloadUrl: string;
  size?: number;
}

/** A tagged, published artifact bundle */
export interface Release {
  tagName: string;
  prerelease: boolean;
  draft: boolean;
  publishedAt?: string | null;
  assets: ReleaseAsset[];
}

/** Release chosen for this run, with the repository it came from */
export interface ResolvedRelease {
  repository: RepositoryId;
  release: Release;
}

/** Everything the install step needs to know about what it installs */
export interface ResolvedTarget extends ResolvedRelease {
  asset: ReleaseAsset;
  packageName: string;
  unitName: string;
}

// ============================================
// Install types
// ============================================

/** Effective options of one install run (flags, env and settings merged) */
export interface InstallOptions {
  repositories: RepositoryId[];
  channel: Channel;
  tag?: string;
  assetPattern: string;
  packageName?: string;
  serviceName?: string;
  defaultUnitName: string;
  unitMarker: string;
  lowercaseUnitFallback: boolean;
  releasesPerPage: number;
  downloadRetries: number;
  downloadRetryDelayMs: number;
  journalLines: number;
}

/** Outcome of a successful install run */
export interface InstallReport {
  repository: RepositoryId;
  tagName: string;
  version: string;
  assetName: string;
  packageName: string;
  unitName: string;
  previousVersion: string | null;
  installedVersion: string;
  repaired: boolean;
}

/** Pipeline step notifications, rendered by the CLI */
export type PipelineEventLevel = 'info' | 'ok' | 'warn';

export interface PipelineEvent {
  level: PipelineEventLevel;
  message: string;
}

/** Download progress */
export interface DownloadProgress {
  bytesDownloaded: number;
  /** 0 when the server did not send a content length */
  totalBytes: number;
}
