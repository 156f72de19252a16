/**
 * dpkg / apt adapter
 */

import type { CommandResult, CommandRunner } from './command-runner';

/** What the metadata extractor reads from a .deb archive */
export interface PackageArchiveReader {
  verifyArchive(debPath: string): Promise<boolean>;
  /** Control field value, or null when absent */
  readField(debPath: string, field: string): Promise<string | null>;
  /** Paths of the files shipped in the archive */
  listContents(debPath: string): Promise<string[]>;
}

/** Install side of the system package manager */
export interface PackageManager {
  install(debPath: string): Promise<CommandResult>;
  update(): Promise<CommandResult>;
  fixBroken(): Promise<CommandResult>;
  /** Installed version, or null when the package is not installed */
  installedVersion(packageName: string): Promise<string | null>;
}

export class DpkgPackageManager implements PackageArchiveReader, PackageManager {
  constructor(private readonly runner: CommandRunner) {}

  async verifyArchive(debPath: string): Promise<boolean> {
    const result = await this.runner.run('dpkg-deb', ['--info', debPath]);
    return result.exitCode === 0;
  }

  async readField(debPath: string, field: string): Promise<string | null> {
    const result = await this.runner.run('dpkg-deb', ['-f', debPath, field]);
    if (result.exitCode !== 0) {
      return null;
    }
    const value = result.stdout.replace(/\r/g, '').trim();
    return value ? value : null;
  }

  async listContents(debPath: string): Promise<string[]> {
    const result = await this.runner.run('dpkg-deb', ['-c', debPath]);
    if (result.exitCode !== 0) {
      return [];
    }
    return parseContentListing(result.stdout);
  }

  async installedVersion(packageName: string): Promise<string | null> {
    const result = await this.runner.run('dpkg-query', ['-W', '--showformat=${Version}\\n', packageName]);
    if (result.exitCode !== 0) {
      return null;
    }
    const version = result.stdout.trim();
    return version ? version : null;
  }

  install(debPath: string): Promise<CommandResult> {
    return this.runner.run('dpkg', ['-i', debPath], { inheritOutput: true });
  }

  update(): Promise<CommandResult> {
    return this.runner.run('apt-get', ['update', '-y'], { inheritOutput: true });
  }

  fixBroken(): Promise<CommandResult> {
    return this.runner.run('apt-get', ['-f', 'install', '-y'], { inheritOutput: true });
  }
}

/**
 * `dpkg-deb -c` prints `tar -tv` style lines; the path is the last column
 * (for symlinks, the link target).
 */
export function parseContentListing(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      const columns = line.split(/\s+/);
      return columns[columns.length - 1] ?? '';
    })
    .filter((entry) => entry.length > 0);
}
