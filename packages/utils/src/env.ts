/**
 * Environment loading
 * 
 * Loads `.env` from the workspace root as a side effect of being imported.
 * Entry points import this module before anything that reads process.env
 * at load time (the logger does).
 */

import { config as dotenvConfig } from 'dotenv';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

// packages/utils/src -> workspace root
export const WORKSPACE_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '../../..');

/**
 * Load `<root>/.env` into process.env; variables already set win
 */
export function loadEnvFile(root: string = WORKSPACE_ROOT): void {
  dotenvConfig({ path: resolve(root, '.env') });
}

/**
 * `./` and `../` paths from the environment are relative to the workspace
 * root, so cron and systemd runs see the same files as a shell in the repo.
 */
export function resolveFromRoot(path: string, root: string = WORKSPACE_ROOT): string {
  if (path.startsWith('./') || path.startsWith('../')) {
    return resolve(root, path);
  }
  return resolve(path);
}

loadEnvFile();
