/**
 * Removable-media discovery
 *
 * Flight controllers that expose their SD card over USB get auto-mounted
 * under a handful of well-known roots, in a directory named after the volume
 * label. A volume counts as a flight controller when its name contains one
 * of the vendor tokens.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger, errorMessage, isDirectory } from '@flightlog/utils';
import type { MountDiscoveryOptions } from './types.js';

const log = createLogger({ module: 'locator:mounts' });

export const DEFAULT_MOUNT_BASE_DIRS: readonly string[] = [
  '/media/pi',
  '/media/$USER',
  '/mnt',
  '/run/media/$USER',
];

export const DEFAULT_VENDOR_TOKENS: readonly string[] = ['PIXHAWK', 'APM', 'PX4', 'FMUV', 'MINDPX'];

export const DEFAULT_LOG_SUBDIRS: readonly (readonly string[])[] = [
  ['APM', 'logs'],
  ['logs'],
];

/**
 * Directory check that logs and answers false on permission errors
 */
export async function probeDirectory(dir: string): Promise<boolean> {
  try {
    return await isDirectory(dir);
  } catch (error) {
    log.warn({ dir, error: errorMessage(error) }, 'Unable to inspect directory');
    return false;
  }
}

/**
 * Substitute `$USER` and drop duplicates, keeping first occurrence
 */
export function resolveMountBaseDirs(
  user?: string,
  templates: readonly string[] = DEFAULT_MOUNT_BASE_DIRS
): string[] {
  const username = user || process.env['USER'] || 'pi';
  const resolved = templates.map((dir) => dir.split('$USER').join(username));
  return [...new Set(resolved)];
}

export function isVendorVolume(
  name: string,
  tokens: readonly string[] = DEFAULT_VENDOR_TOKENS
): boolean {
  const upper = name.toUpperCase();
  return tokens.some((token) => upper.includes(token.toUpperCase()));
}

/**
 * Find log directories on auto-mounted flight-controller volumes
 */
export async function findMountLogDirs(options: MountDiscoveryOptions = {}): Promise<string[]> {
  const baseDirs = resolveMountBaseDirs(options.user, options.baseDirs);
  const tokens = options.vendorTokens ?? DEFAULT_VENDOR_TOKENS;
  const subdirs = options.logSubdirs ?? DEFAULT_LOG_SUBDIRS;
  const found: string[] = [];

  for (const baseDir of baseDirs) {
    if (!(await probeDirectory(baseDir))) continue;

    let names: string[];
    try {
      names = (await readdir(baseDir)).sort();
    } catch (error) {
      log.warn({ baseDir, error: errorMessage(error) }, 'Unable to list mount directory');
      continue;
    }

    for (const name of names) {
      if (!isVendorVolume(name, tokens)) continue;

      const volume = join(baseDir, name);
      if (!(await probeDirectory(volume))) continue;

      for (const subdir of subdirs) {
        const logsPath = join(volume, ...subdir);
        if (await probeDirectory(logsPath)) {
          found.push(logsPath);
        }
      }
    }
  }

  log.info({ dirs: found }, `Found ${found.length} potential flight controller log directories`);
  return found;
}
