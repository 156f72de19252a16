import { Command, Option, type CommanderError, type OutputConfiguration } from 'commander';
import chalk from 'chalk';
import type { InstallCommandOptions } from './commands/install';
import type { ReleasesCommandOptions } from './commands/releases';

export const VERSION = '1.0.0';

export interface ProgramOptions {
  /** Receives every commander exit (help, version, usage errors) of the program and its commands */
  onExit: (err: CommanderError) => void;
  output?: OutputConfiguration;
}

async function run(action: () => Promise<number>): Promise<void> {
  process.exitCode = await action();
}

/**
 * Builds the command tree. Exit handling and output are set before the
 * commands are added so every subcommand inherits them.
 */
export function createProgram(options: ProgramOptions): Command {
  const program = new Command();

  program.exitOverride(options.onExit);
  if (options.output) {
    program.configureOutput(options.output);
  }

  program
    .name('cpugovernor-install')
    .description(chalk.cyan('Installs or updates cpuGovernor from its GitHub releases'))
    .version(VERSION, '-v, --version', 'Show the version')
    .helpOption('-h, --help', 'Show help');

  // install (default)
  program
    .command('install', { isDefault: true })
    .description('Download the latest release, install it and restart the service')
    .addOption(new Option('--pre', 'Prefer the newest pre-release').conflicts('stable'))
    .addOption(new Option('--stable', 'Prefer the newest stable release').conflicts('pre'))
    .option('--tag <tag>', 'Install this release tag')
    .option('--repo <owner/repo>', 'Use only this repository')
    .option('--asset-regex <regex>', 'Regular expression for the .deb asset name')
    .option('--service <unit>', 'systemd unit to restart')
    .option('--package <name>', 'dpkg package name')
    .option('--no-lowercase-fallback', 'Do not fall back to the lower-cased unit name')
    .option('--verbose', 'Write debug logs to the console')
    .allowExcessArguments(false)
    .action(async (opts: InstallCommandOptions) => {
      const { installCommand } = await import('./commands/install');
      await run(() => installCommand(opts));
    });

  // releases
  program
    .command('releases')
    .description('List releases, or the assets of one release')
    .option('--repo <owner/repo>', 'Use only this repository')
    .option('--tag <tag>', 'Show the assets of this release tag')
    .option('--verbose', 'Write debug logs to the console')
    .allowExcessArguments(false)
    .action(async (opts: ReleasesCommandOptions) => {
      const { releasesCommand } = await import('./commands/releases');
      await run(() => releasesCommand(opts));
    });

  // config
  const config = program.command('config').description('Manage settings');

  config
    .command('get')
    .description('Show a setting')
    .argument('[key]', 'Setting key')
    .allowExcessArguments(false)
    .action(async (key?: string) => {
      const { configGet } = await import('./commands/config');
      await run(() => configGet(key));
    });

  config
    .command('set')
    .description('Change a setting')
    .argument('<key>', 'Setting key')
    .argument('<value>', 'Value (comma-separated for lists, empty to clear an override)')
    .allowExcessArguments(false)
    .action(async (key: string, value: string) => {
      const { configSet } = await import('./commands/config');
      await run(() => configSet(key, value));
    });

  config
    .command('list')
    .description('Show all settings')
    .allowExcessArguments(false)
    .action(async () => {
      const { configList } = await import('./commands/config');
      await run(() => configList());
    });

  config
    .command('reset')
    .description('Restore the default settings')
    .allowExcessArguments(false)
    .action(async () => {
      const { configReset } = await import('./commands/config');
      await run(() => configReset());
    });

  return program;
}
