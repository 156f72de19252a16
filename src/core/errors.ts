/**
 * Installer error taxonomy.
 * Every InstallerError ends the run with exit code 1; hints are printed under the message.
 */

export type InstallerErrorKind =
  | 'config'
  | 'preflight'
  | 'resolution'
  | 'asset'
  | 'download'
  | 'metadata'
  | 'install'
  | 'activation';

export interface InstallerErrorOptions {
  hints?: string[];
  cause?: unknown;
}

export class InstallerError extends Error {
  readonly kind: InstallerErrorKind;
  readonly hints: string[];

  constructor(kind: InstallerErrorKind, message: string, options: InstallerErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'InstallerError';
    this.kind = kind;
    this.hints = options.hints ?? [];
  }

  get exitCode(): number {
    return 1;
  }
}

export class ConfigError extends InstallerError {
  constructor(message: string, options?: InstallerErrorOptions) {
    super('config', message, options);
    this.name = 'ConfigError';
  }
}

export class PreflightError extends InstallerError {
  constructor(message: string, options?: InstallerErrorOptions) {
    super('preflight', message, options);
    this.name = 'PreflightError';
  }
}

export class ResolutionError extends InstallerError {
  constructor(message: string, options?: InstallerErrorOptions) {
    super('resolution', message, options);
    this.name = 'ResolutionError';
  }
}

export class AssetError extends InstallerError {
  constructor(message: string, options?: InstallerErrorOptions) {
    super('asset', message, options);
    this.name = 'AssetError';
  }
}

export class DownloadError extends InstallerError {
  constructor(message: string, options?: InstallerErrorOptions) {
    super('download', message, options);
    this.name = 'DownloadError';
  }
}

export class MetadataError extends InstallerError {
  constructor(message: string, options?: InstallerErrorOptions) {
    super('metadata', message, options);
    this.name = 'MetadataError';
  }
}

export class InstallError extends InstallerError {
  constructor(message: string, options?: InstallerErrorOptions) {
    super('install', message, options);
    this.name = 'InstallError';
  }
}

/**
 * The unit did not come up after the package was installed.
 * The package stays installed (partial success).
 */
export class ActivationError extends InstallerError {
  readonly unitName: string;
  readonly journal: string;

  constructor(unitName: string, journal: string, options?: InstallerErrorOptions) {
    super('activation', `Service is not active: ${unitName}`, options);
    this.name = 'ActivationError';
    this.unitName = unitName;
    this.journal = journal;
  }
}

/** Non-2xx answer from the release API */
export class ReleaseApiError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null) {
    super(message);
    this.name = 'ReleaseApiError';
    this.status = status;
  }
}

export function isInstallerError(error: unknown): error is InstallerError {
  return error instanceof InstallerError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
