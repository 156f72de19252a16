import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import type { Channel, InstallOptions } from '../types';
import { ConfigError, errorMessage } from './errors';

const REPOSITORY_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

const settingsSchema = z.object({
  repositories: z
    .array(z.string().regex(REPOSITORY_PATTERN, 'expected owner/name'))
    .min(1),
  channel: z.enum(['stable', 'pre']),
  assetPattern: z.string().min(1),
  packageName: z.string().min(1).optional(),
  serviceName: z.string().min(1).optional(),
  defaultUnitName: z.string().min(1),
  unitMarker: z.string(),
  lowercaseUnitFallback: z.boolean(),
  apiBaseUrl: z.string().url(),
  releasesPerPage: z.number().int().min(1).max(100),
  downloadRetries: z.number().int().min(0),
  downloadRetryDelayMs: z.number().int().min(0),
  journalLines: z.number().int().min(1),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']),
});

export type Settings = z.infer<typeof settingsSchema>;

export type SettingsKey = keyof Settings;

export const DEFAULT_SETTINGS: Settings = {
  repositories: ['ehive-dev/cpu_governor', 'ehive-dev/cpuGovernor', 'ehive-dev/cpu-governor'],
  channel: 'stable',
  assetPattern: '^cpuGovernor_.*_(all|arm64|amd64)\\.deb$',
  defaultUnitName: 'cpuGovernor.service',
  unitMarker: 'cpu',
  lowercaseUnitFallback: true,
  apiBaseUrl: 'https://api.github.com',
  releasesPerPage: 50,
  downloadRetries: 3,
  downloadRetryDelayMs: 1000,
  journalLines: 200,
  logLevel: 'info',
};

export const SETTINGS_DESCRIPTIONS: Record<SettingsKey, string> = {
  repositories: 'Candidate repositories, tried in order',
  channel: 'Release channel (stable | pre)',
  assetPattern: 'Regular expression for the .deb asset name',
  packageName: 'dpkg package name override',
  serviceName: 'systemd unit name override',
  defaultUnitName: 'Unit used when the package ships none',
  unitMarker: 'Preferred substring when several units ship',
  lowercaseUnitFallback: 'Try the lower-cased unit name if missing',
  apiBaseUrl: 'Release API base URL',
  releasesPerPage: 'Releases fetched per candidate',
  downloadRetries: 'Download retries after the first attempt',
  downloadRetryDelayMs: 'Delay between download attempts (ms)',
  journalLines: 'Journal lines shown on activation failure',
  logLevel: 'Log level',
};

/** Flags given on the command line; undefined means "not given" */
export interface CliInstallFlags {
  channel?: Channel;
  tag?: string;
  repo?: string;
  assetRegex?: string;
  service?: string;
  package?: string;
  lowercaseFallback?: boolean;
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir?: string) {
    this.configDir =
      configDir ??
      process.env.CPU_GOVERNOR_INSTALLER_HOME ??
      path.join(os.homedir(), '.cpugovernor-installer');
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * Loads settings.json merged over the defaults.
   * A missing file yields the defaults; an invalid file is reported through `onInvalid` and ignored.
   */
  async loadSettings(onInvalid?: (reason: string) => void): Promise<Settings> {
    if (!(await fs.pathExists(this.configPath))) {
      return { ...DEFAULT_SETTINGS };
    }

    let raw: unknown;
    try {
      raw = await fs.readJson(this.configPath);
    } catch (error) {
      onInvalid?.(`cannot parse ${this.configPath}: ${errorMessage(error)}`);
      return { ...DEFAULT_SETTINGS };
    }

    const merged = isPlainObject(raw) ? { ...DEFAULT_SETTINGS, ...raw } : raw;
    const parsed = settingsSchema.safeParse(merged);
    if (!parsed.success) {
      onInvalid?.(formatIssues(parsed.error));
      return { ...DEFAULT_SETTINGS };
    }
    return parsed.data;
  }

  async saveSettings(settings: Settings): Promise<void> {
    await this.ensureDirectories();
    await fs.writeJson(this.configPath, settings, { spaces: 2 });
  }

  /**
   * Sets one key from its command-line text form and persists the result.
   */
  async set(key: string, value: string): Promise<Settings> {
    if (!isSettingsKey(key)) {
      throw new ConfigError(`Unknown setting: ${key}`, {
        hints: [`Known settings: ${Object.keys(SETTINGS_DESCRIPTIONS).join(', ')}`],
      });
    }

    const current = await this.loadSettings();
    const candidate = { ...current, [key]: parseSettingValue(key, value) };
    const parsed = settingsSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new ConfigError(`Invalid value for ${key}: ${formatIssues(parsed.error)}`);
    }

    await this.saveSettings(parsed.data);
    return parsed.data;
  }

  async reset(): Promise<Settings> {
    await this.saveSettings(DEFAULT_SETTINGS);
    return { ...DEFAULT_SETTINGS };
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getLogsDir(): string {
    return this.logsDir;
  }
}

/**
 * Merges flags, environment and settings into the options of one run.
 * Precedence: flag > environment > settings file > default.
 */
export function resolveInstallOptions(
  settings: Settings,
  flags: CliInstallFlags,
  env: NodeJS.ProcessEnv = process.env
): InstallOptions {
  const repo = nonEmpty(flags.repo) ?? nonEmpty(env.REPO);
  const repositories = repo ? [repo] : settings.repositories;
  for (const repository of repositories) {
    if (!REPOSITORY_PATTERN.test(repository)) {
      throw new ConfigError(`Invalid repository identifier: ${repository}`, {
        hints: ['Use the owner/name form, e.g. ehive-dev/cpu_governor'],
      });
    }
  }

  return {
    repositories,
    channel: flags.channel ?? settings.channel,
    tag: nonEmpty(flags.tag) ?? nonEmpty(env.TAG),
    assetPattern:
      nonEmpty(flags.assetRegex) ?? nonEmpty(env.CPU_GOVERNOR_ASSET_REGEX) ?? settings.assetPattern,
    packageName:
      nonEmpty(flags.package) ?? nonEmpty(env.CPU_GOVERNOR_PACKAGE) ?? settings.packageName,
    serviceName:
      nonEmpty(flags.service) ?? nonEmpty(env.CPU_GOVERNOR_SERVICE) ?? settings.serviceName,
    defaultUnitName: settings.defaultUnitName,
    unitMarker: settings.unitMarker,
    lowercaseUnitFallback: flags.lowercaseFallback ?? settings.lowercaseUnitFallback,
    releasesPerPage: settings.releasesPerPage,
    downloadRetries: settings.downloadRetries,
    downloadRetryDelayMs: settings.downloadRetryDelayMs,
    journalLines: settings.journalLines,
  };
}

/** API token from the environment; never persisted */
export function resolveApiToken(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return nonEmpty(env.GITHUB_TOKEN);
}

export function isSettingsKey(key: string): key is SettingsKey {
  return Object.prototype.hasOwnProperty.call(SETTINGS_DESCRIPTIONS, key);
}

/**
 * Parses the text form given to `config set`: comma lists, booleans, numbers.
 * An empty value clears an optional override.
 */
function parseSettingValue(key: SettingsKey, value: string): unknown {
  if ((key === 'packageName' || key === 'serviceName') && value.trim() === '') {
    return undefined;
  }
  if (key === 'repositories') {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.trim() !== '' && !isNaN(Number(value)) && typeof DEFAULT_SETTINGS[key] === 'number') {
    return Number(value);
  }
  return value;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
