/**
 * Log Locator
 *
 * Collects flight logs from the configured directory and any auto-mounted
 * flight-controller volumes, then picks the most recently modified one.
 */

import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger, errorMessage, normalizeExtension } from '@flightlog/utils';
import { findMountLogDirs, probeDirectory } from './mounts.js';
import type { LocateResult, LocatorOptions, LogFile, LogSource } from './types.js';

const log = createLogger({ module: 'locator' });

export const DEFAULT_LOG_EXTENSION = '.bin';

/**
 * Regular files in `dir` ending in `extension`. Not recursive; hidden files
 * are skipped and entries are visited in name order.
 */
export async function listLogFiles(
  dir: string,
  extension: string = DEFAULT_LOG_EXTENSION,
  source: LogSource = 'configured'
): Promise<LogFile[]> {
  let names: string[];
  try {
    names = (await readdir(dir)).sort();
  } catch (error) {
    log.warn({ dir, error: errorMessage(error) }, 'Unable to read log directory');
    return [];
  }

  const files: LogFile[] = [];
  for (const name of names) {
    if (name.startsWith('.') || !name.endsWith(extension)) continue;

    const fullPath = join(dir, name);
    try {
      const stats = await stat(fullPath);
      if (!stats.isFile()) continue;
      files.push({
        path: fullPath,
        source,
        sourceDir: dir,
        size: stats.size,
        modifiedAt: stats.mtime,
      });
    } catch (error) {
      // Removed between readdir and stat, or a dangling symlink
      log.debug({ path: fullPath, error: errorMessage(error) }, 'Skipping unreadable log file');
    }
  }

  return files;
}

/**
 * Newest file by modification time. On a tie the earlier candidate wins.
 */
export function selectLatest(files: readonly LogFile[]): LogFile | null {
  let latest: LogFile | null = null;
  for (const file of files) {
    if (latest === null || file.modifiedAt.getTime() > latest.modifiedAt.getTime()) {
      latest = file;
    }
  }
  return latest;
}

export async function locateLogs(options: LocatorOptions = {}): Promise<LocateResult> {
  const extension = normalizeExtension(options.extension ?? DEFAULT_LOG_EXTENSION);
  const candidates: LogFile[] = [];
  const searchedDirs: string[] = [];

  if (options.logsDir) {
    if (await probeDirectory(options.logsDir)) {
      const files = await listLogFiles(options.logsDir, extension, 'configured');
      candidates.push(...files);
      searchedDirs.push(options.logsDir);
      log.info(
        { dir: options.logsDir, count: files.length },
        `Found ${files.length} ${extension} files in configured logs directory`
      );
    } else {
      log.warn({ dir: options.logsDir }, 'Configured log directory does not exist');
    }
  }

  if (options.includeMounts !== false) {
    const mountDirs = await findMountLogDirs(options);
    for (const dir of mountDirs) {
      const files = await listLogFiles(dir, extension, 'mount');
      candidates.push(...files);
      searchedDirs.push(dir);
      log.info(
        { dir, count: files.length },
        `Found ${files.length} ${extension} files in auto-discovered path`
      );
    }
  }

  const latest = selectLatest(candidates);
  if (latest) {
    log.info(
      { path: latest.path, modifiedAt: latest.modifiedAt.toISOString() },
      'Found latest log file'
    );
  } else {
    log.warn({ searchedDirs, extension }, 'No log files found in any location');
  }

  return { latest, candidates, searchedDirs };
}

/**
 * Path of the newest log, or null when none was found
 */
export async function findLatestLog(options: LocatorOptions = {}): Promise<string | null> {
  const { latest } = await locateLogs(options);
  return latest?.path ?? null;
}
