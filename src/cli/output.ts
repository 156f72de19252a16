import chalk from 'chalk';
import { isInstallerError, ActivationError, errorMessage } from '../core/errors';
import logger from '../utils/logger';
import type { PipelineEvent } from '../types';

export function info(message: string): void {
  console.log(`${chalk.bold.blue('[i]')} ${message}`);
}

export function ok(message: string): void {
  console.log(`${chalk.bold.green('[✓]')} ${message}`);
}

export function warn(message: string): void {
  console.log(`${chalk.bold.yellow('[!]')} ${message}`);
}

export function fail(message: string): void {
  console.error(`${chalk.bold.red('[✗]')} ${message}`);
}

export function printEvent(event: PipelineEvent): void {
  switch (event.level) {
    case 'ok':
      ok(event.message);
      break;
    case 'warn':
      warn(event.message);
      break;
    default:
      info(event.message);
  }
}

/**
 * Prints an error with its hints and logs it; returns the exit code.
 */
export function reportError(error: unknown): number {
  if (isInstallerError(error)) {
    logger.error(error.message, { kind: error.kind, hints: error.hints, stack: error.stack });
    fail(error.message);
    for (const hint of error.hints) {
      console.error(chalk.gray(`    ${hint}`));
    }
    if (error instanceof ActivationError && error.journal.trim()) {
      console.error(chalk.gray(`\n--- journalctl -u ${error.unitName} ---`));
      console.error(error.journal.trimEnd());
    }
    return error.exitCode;
  }

  if (error instanceof Error) {
    logger.logError(error, 'unexpected error');
  } else {
    logger.error('unexpected error', { error: String(error) });
  }
  fail(`Unexpected error: ${errorMessage(error)}`);
  return 1;
}
