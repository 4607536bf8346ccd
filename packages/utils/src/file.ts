/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { mkdtemp, rm, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { isErrnoException } from './guards.js';

/**
 * Stat a path, following symlinks. Returns null if it doesn't exist.
 */
export async function safeStat(targetPath: string): Promise<Stats | null> {
  try {
    return await stat(targetPath);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

export async function pathExists(targetPath: string): Promise<boolean> {
  return (await safeStat(targetPath)) !== null;
}

export async function isDirectory(targetPath: string): Promise<boolean> {
  const stats = await safeStat(targetPath);
  return stats?.isDirectory() ?? false;
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Create a fresh private directory under the OS temp dir
 */
export async function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `${prefix}-`));
}

export async function removeDir(dirPath: string): Promise<void> {
  await rm(dirPath, { recursive: true, force: true });
}
