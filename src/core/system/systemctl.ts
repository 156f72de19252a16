/**
 * systemd adapter (systemctl / journalctl)
 */

import type { CommandResult, CommandRunner } from './command-runner';

export interface ServiceManager {
  hasUnitFile(unit: string): Promise<boolean>;
  stop(unit: string): Promise<CommandResult>;
  daemonReload(): Promise<CommandResult>;
  enable(unit: string): Promise<CommandResult>;
  restart(unit: string): Promise<CommandResult>;
  isActive(unit: string): Promise<boolean>;
  journal(unit: string, lines: number): Promise<string>;
}

export class Systemctl implements ServiceManager {
  constructor(private readonly runner: CommandRunner) {}

  async hasUnitFile(unit: string): Promise<boolean> {
    const result = await this.runner.run('systemctl', ['list-unit-files', '--no-legend', '--no-pager']);
    if (result.exitCode !== 0) {
      return false;
    }
    return parseUnitFileNames(result.stdout).includes(unit);
  }

  stop(unit: string): Promise<CommandResult> {
    return this.runner.run('systemctl', ['stop', unit]);
  }

  daemonReload(): Promise<CommandResult> {
    return this.runner.run('systemctl', ['daemon-reload']);
  }

  enable(unit: string): Promise<CommandResult> {
    return this.runner.run('systemctl', ['enable', unit]);
  }

  restart(unit: string): Promise<CommandResult> {
    return this.runner.run('systemctl', ['restart', unit]);
  }

  async isActive(unit: string): Promise<boolean> {
    const result = await this.runner.run('systemctl', ['is-active', '--quiet', unit]);
    return result.exitCode === 0;
  }

  async journal(unit: string, lines: number): Promise<string> {
    const result = await this.runner.run('journalctl', ['-u', unit, '-n', String(lines), '--no-pager', '-o', 'cat']);
    return result.stdout;
  }
}

/** First column of `systemctl list-unit-files` */
export function parseUnitFileNames(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim().split(/\s+/)[0] ?? '')
    .filter((name) => name.length > 0);
}
