/**
 * Service Activator
 * Stops the unit before the install and brings it back up afterwards.
 */

import logger from '../../utils/logger';
import { ActivationError, errorMessage } from '../errors';
import type { CommandResult } from '../system/command-runner';
import type { ServiceManager } from '../system/systemctl';

export interface ActivateOptions {
  /** Use the lower-cased unit name when only that one exists */
  lowercaseFallback: boolean;
  journalLines: number;
  onWarning?: (message: string) => void;
}

export interface StopOptions {
  /** Also stop the lower-cased unit when only that one exists */
  lowercaseFallback: boolean;
}

export class ServiceActivator {
  constructor(private readonly services: ServiceManager) {}

  /**
   * Stops the unit if it is defined. Failures are logged and ignored.
   */
  async stopIfPresent(unit: string, options: StopOptions = { lowercaseFallback: false }): Promise<boolean> {
    try {
      const target = await this.findUnit(unit, options.lowercaseFallback);
      if (!target) {
        return false;
      }
      await this.bestEffort('stop', () => this.services.stop(target), target);
      return true;
    } catch (error) {
      logger.warn('pre-install stop skipped', { unit, error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Reloads, enables and restarts the unit, then requires it to be active.
   * Returns the unit name that was activated.
   */
  async activate(unit: string, options: ActivateOptions): Promise<string> {
    await this.bestEffort('daemon-reload', () => this.services.daemonReload(), unit);

    const target = options.lowercaseFallback ? await this.resolveUnitName(unit, options.onWarning) : unit;

    await this.bestEffort('enable', () => this.services.enable(target), target);
    await this.bestEffort('restart', () => this.services.restart(target), target);

    if (await this.services.isActive(target)) {
      logger.info('service active', { unit: target });
      return target;
    }

    const journal = await this.readJournal(target, options.journalLines);
    throw new ActivationError(target, journal, {
      hints: [`Inspect with: systemctl status ${target}`, `Logs: journalctl -u ${target} -n ${options.journalLines}`],
    });
  }

  /**
   * The unit itself if it has a unit file, else (with the fallback) its lower-cased name if that has one.
   */
  private async findUnit(unit: string, lowercaseFallback: boolean): Promise<string | null> {
    if (await this.services.hasUnitFile(unit)) {
      return unit;
    }
    const lower = unit.toLowerCase();
    if (lowercaseFallback && lower !== unit && (await this.services.hasUnitFile(lower))) {
      return lower;
    }
    return null;
  }

  private async resolveUnitName(unit: string, onWarning?: (message: string) => void): Promise<string> {
    const lower = unit.toLowerCase();
    if (lower === unit || (await this.findUnit(unit, true)) !== lower) {
      return unit;
    }

    const message = `Unit ${unit} not found; using ${lower} (assumes the unit name is the lower-cased display name).`;
    logger.warn('lower-cased unit name fallback', { unit, fallback: lower });
    onWarning?.(message);
    return lower;
  }

  private async readJournal(unit: string, lines: number): Promise<string> {
    try {
      return await this.services.journal(unit, lines);
    } catch (error) {
      logger.warn('journal unavailable', { unit, error: errorMessage(error) });
      return '';
    }
  }

  private async bestEffort(step: string, action: () => Promise<CommandResult>, unit: string): Promise<void> {
    try {
      const result = await action();
      if (result.exitCode !== 0) {
        logger.warn(`systemctl ${step} failed`, { unit, exitCode: result.exitCode, stderr: result.stderr.trim() });
      }
    } catch (error) {
      logger.warn(`systemctl ${step} failed`, { unit, error: errorMessage(error) });
    }
  }
}
