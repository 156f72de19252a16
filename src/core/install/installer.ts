import logger from '../../utils/logger';
import { InstallError } from '../errors';
import type { CommandResult } from '../system/command-runner';
import type { PackageManager } from '../system/dpkg';

export interface InstallOutcome {
  /** The first install failed and the repair pass plus retry were needed */
  repaired: boolean;
}

export interface InstallHooks {
  onRepair?: () => void;
}

/**
 * Installs the .deb; on failure runs one repair pass (apt update, apt -f install)
 * and retries exactly once.
 */
export async function installPackage(
  debPath: string,
  packageManager: PackageManager,
  hooks: InstallHooks = {}
): Promise<InstallOutcome> {
  const first = await packageManager.install(debPath);
  if (first.exitCode === 0) {
    return { repaired: false };
  }

  logger.warn('dpkg -i failed, running dependency repair', { debPath, exitCode: first.exitCode });
  hooks.onRepair?.();

  ensureSucceeded(await packageManager.update(), 'apt-get update');
  ensureSucceeded(await packageManager.fixBroken(), 'apt-get -f install');

  const retry = await packageManager.install(debPath);
  if (retry.exitCode !== 0) {
    throw new InstallError(`Package installation failed after dependency repair (exit code ${retry.exitCode}).`, {
      hints: ['Inspect the dpkg output above; dpkg --audit lists half-installed packages.'],
    });
  }

  logger.info('package installed after dependency repair', { debPath });
  return { repaired: true };
}

function ensureSucceeded(result: CommandResult, step: string): void {
  if (result.exitCode !== 0) {
    throw new InstallError(`Dependency repair failed: ${step} exited with code ${result.exitCode}.`);
  }
}
