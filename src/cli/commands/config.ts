import chalk from 'chalk';
import Table from 'cli-table3';
import {
  getConfigManager,
  isSettingsKey,
  SETTINGS_DESCRIPTIONS,
  type Settings,
  type SettingsKey,
} from '../../core/config';
import { ConfigError } from '../../core/errors';
import logger from '../../utils/logger';
import { ok, reportError, warn } from '../output';

/**
 * Loads the settings, starts file logging, runs the action and maps errors to an exit code.
 */
async function withSettings(action: (settings: Settings) => Promise<void>): Promise<number> {
  try {
    const settings = await getConfigManager().loadSettings((reason) =>
      warn(`Ignoring invalid settings (${reason}); using defaults.`)
    );
    await logger.initialize({ level: settings.logLevel });
    await action(settings);
    return 0;
  } catch (error) {
    return reportError(error);
  } finally {
    await logger.close();
  }
}

/**
 * Prints one setting, or all of them as JSON
 */
export function configGet(key?: string): Promise<number> {
  return withSettings(async (settings) => {
    if (key === undefined) {
      console.log(chalk.cyan('\nCurrent settings:'));
      console.log(JSON.stringify(settings, null, 2));
      return;
    }

    if (!isSettingsKey(key)) {
      throw new ConfigError(`Unknown setting: ${key}`, {
        hints: [`Known settings: ${Object.keys(SETTINGS_DESCRIPTIONS).join(', ')}`],
      });
    }
    console.log(chalk.cyan(`${key}: `) + chalk.white(formatValue(settings[key])));
  });
}

export function configSet(key: string, value: string): Promise<number> {
  return withSettings(async () => {
    const settings = await getConfigManager().set(key, value);
    const saved = isSettingsKey(key) ? formatValue(settings[key]) : value;
    ok(`Saved: ${key} = ${saved}`);
    logger.info('setting changed', { key, value: saved });
  });
}

export function configList(): Promise<number> {
  return withSettings(async (settings) => {
    console.log(chalk.cyan(`\nSettings (${getConfigManager().getConfigPath()}):\n`));
    console.log(renderSettingsTable(settings));
  });
}

export function configReset(): Promise<number> {
  return withSettings(async () => {
    await getConfigManager().reset();
    ok('Settings reset to defaults');
    logger.info('settings reset');
  });
}

export function renderSettingsTable(settings: Settings): string {
  const table = new Table({
    head: [chalk.cyan('Setting'), chalk.cyan('Value'), chalk.cyan('Description')],
    colWidths: [24, 48, 44],
    wordWrap: true,
  });

  for (const key of Object.keys(SETTINGS_DESCRIPTIONS)) {
    if (!isSettingsKey(key)) continue;
    table.push([key, formatValue(settings[key]), SETTINGS_DESCRIPTIONS[key]]);
  }

  return table.toString();
}

export function formatValue(value: Settings[SettingsKey]): string {
  if (value === undefined) return '-';
  if (Array.isArray(value)) return value.join(', ');
  return String(value);
}
