import * as fs from 'fs-extra';
import * as path from 'path';
import { PreflightError } from '../errors';

export const REQUIRED_TOOLS = ['dpkg', 'dpkg-deb', 'dpkg-query', 'apt-get', 'systemctl', 'journalctl'];

const SYSTEM_PATH_SEGMENTS = ['/usr/local/sbin', '/usr/local/bin', '/usr/sbin', '/usr/bin', '/sbin', '/bin'];

export function requireRoot(getuid: (() => number) | undefined = process.getuid): void {
  const uid = getuid ? getuid() : -1;
  if (uid !== 0) {
    throw new PreflightError('Please run as root.', {
      hints: ['Re-run with sudo, e.g. sudo cpugovernor-install'],
    });
  }
}

/**
 * Full path of the tool in the first PATH (or standard system) directory holding it.
 */
export function findTool(name: string, pathEnv: string | undefined = process.env.PATH): string | null {
  const segments = [...(pathEnv ?? '').split(path.delimiter), ...SYSTEM_PATH_SEGMENTS].filter(
    (segment) => segment.length > 0
  );

  for (const segment of new Set(segments)) {
    const candidate = path.join(segment, name);
    try {
      if (fs.statSync(candidate).isFile()) {
        return candidate;
      }
    } catch {
      continue;
    }
  }
  return null;
}

export function requireTools(
  names: string[] = REQUIRED_TOOLS,
  pathEnv: string | undefined = process.env.PATH
): void {
  const missing = names.filter((name) => findTool(name, pathEnv) === null);
  if (missing.length > 0) {
    throw new PreflightError(`Required tools not found: ${missing.join(', ')}`, {
      hints: ['This installer targets Debian/Ubuntu hosts with dpkg, apt and systemd.'],
    });
  }
}
