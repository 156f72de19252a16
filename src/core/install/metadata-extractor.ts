/**
 * Metadata Extractor
 * Derives the package name and the systemd unit name from a downloaded .deb.
 */

import * as path from 'path';
import logger from '../../utils/logger';
import { MetadataError } from '../errors';
import type { PackageArchiveReader } from '../system/dpkg';

export interface MetadataOptions {
  packageName?: string;
  serviceName?: string;
  /** Used when the archive ships no unit file */
  defaultUnitName: string;
  /** Preferred substring (case-insensitive) when several units ship */
  unitMarker: string;
}

export interface TargetMetadata {
  packageName: string;
  unitName: string;
  unitSource: 'override' | 'archive' | 'default';
}

export async function extractTargetMetadata(
  debPath: string,
  reader: PackageArchiveReader,
  options: MetadataOptions
): Promise<TargetMetadata> {
  if (!(await reader.verifyArchive(debPath))) {
    throw new MetadataError(`Not a valid Debian package: ${path.basename(debPath)}`);
  }

  const packageName = options.packageName ?? (await reader.readField(debPath, 'Package'));
  if (!packageName) {
    throw new MetadataError('Could not determine the package name from the .deb.', {
      hints: ['Override it with --package <name> or CPU_GOVERNOR_PACKAGE=<name>.'],
    });
  }

  let unitName: string;
  let unitSource: TargetMetadata['unitSource'];
  if (options.serviceName) {
    unitName = options.serviceName;
    unitSource = 'override';
  } else {
    const units = serviceUnitsIn(await reader.listContents(debPath));
    logger.debug('service units in archive', { units });
    const picked = pickServiceUnit(units, options.unitMarker);
    unitName = picked ?? options.defaultUnitName;
    unitSource = picked ? 'archive' : 'default';
  }

  if (!unitName) {
    throw new MetadataError('Could not determine the service unit.', {
      hints: ['Override it with --service <unit> or CPU_GOVERNOR_SERVICE=<unit>.'],
    });
  }

  return { packageName, unitName, unitSource };
}

/**
 * Sorted, de-duplicated basenames of the `.service` files in an archive listing.
 */
export function serviceUnitsIn(entries: string[]): string[] {
  const units = new Set(
    entries.filter((entry) => entry.endsWith('.service')).map((entry) => path.posix.basename(entry))
  );
  return Array.from(units).sort();
}

export function pickServiceUnit(units: string[], marker: string): string | null {
  if (units.length === 0) return null;
  if (units.length === 1) return units[0] ?? null;

  const needle = marker.toLowerCase();
  const preferred = needle ? units.find((unit) => unit.toLowerCase().includes(needle)) : undefined;
  return preferred ?? units[0] ?? null;
}
