/**
 * CLI Configuration
 *
 * Environment first (`.env` at the workspace root), command-line flags on top.
 * Relative paths from the environment resolve against the workspace root,
 * relative paths from flags against the working directory.
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { taskIdSchema } from '@flightlog/core';
import { normalizeExtension } from '@flightlog/utils';
import { resolveFromRoot } from '@flightlog/utils/env';

// Environment schema
const envSchema = z.object({
  CREDENTIALS_PATH: z.string().optional(),
  STORAGE_BUCKET: z.string().optional(),
  LOGS_DIR: z.string().optional(),
  TASK_ID: z.string().optional(),
  LOG_EXTENSION: z.string().optional(),
  STORAGE_PUBLIC_BASE_URL: z.string().url().optional(),
  STORAGE_CREATE_BUCKET: z.string().transform(v => v === 'true').default('false'),
});

export interface BatchOverrides {
  credentials?: string;
  bucket?: string;
  logsDir?: string;
  taskId?: string;
  extension?: string;
}

export interface BatchConfig {
  credentialsPath: string;
  bucket: string;
  logsDir: string;
  taskId: string;
  extension: string;
  publicBaseUrl?: string;
  createBucket: boolean;
}

export type BatchConfigResult =
  | { ok: true; config: BatchConfig }
  | { ok: false; errors: string[] };

const DEFAULT_EXTENSION = '.bin';

function present(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * A flag wins over the environment; each resolves from its own base
 */
function pathSetting(flag: string | undefined, envValue: string | undefined): string | undefined {
  const fromFlag = present(flag);
  if (fromFlag) return resolve(fromFlag);
  const fromEnv = present(envValue);
  return fromEnv ? resolveFromRoot(fromEnv) : undefined;
}

function extensionSetting(flag: string | undefined, envValue: string | undefined): string {
  return normalizeExtension(present(flag) ?? present(envValue) ?? DEFAULT_EXTENSION);
}

/**
 * Merge env and flags, reporting every missing or invalid setting at once
 */
export function resolveBatchConfig(
  env: NodeJS.ProcessEnv,
  overrides: BatchOverrides = {}
): BatchConfigResult {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }
  const values = parsed.data;

  const credentialsPath = pathSetting(overrides.credentials, values.CREDENTIALS_PATH);
  const bucket = present(overrides.bucket) ?? present(values.STORAGE_BUCKET);
  const logsDir = pathSetting(overrides.logsDir, values.LOGS_DIR);
  const rawTaskId = present(overrides.taskId) ?? present(values.TASK_ID);

  const errors: string[] = [];
  if (!credentialsPath) errors.push('CREDENTIALS_PATH environment variable is not set');
  if (!bucket) errors.push('STORAGE_BUCKET environment variable is not set');
  if (!logsDir) errors.push('LOGS_DIR environment variable is not set');

  let taskId: string | undefined;
  if (!rawTaskId) {
    errors.push('TASK_ID environment variable is not set');
  } else {
    const task = taskIdSchema.safeParse(rawTaskId);
    if (task.success) {
      taskId = task.data;
    } else {
      errors.push(`TASK_ID is invalid: ${task.error.issues.map((issue) => issue.message).join(', ')}`);
    }
  }

  if (!credentialsPath || !bucket || !logsDir || !taskId) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    config: {
      credentialsPath,
      bucket,
      logsDir,
      taskId,
      extension: extensionSetting(overrides.extension, values.LOG_EXTENSION),
      publicBaseUrl: values.STORAGE_PUBLIC_BASE_URL,
      createBucket: values.STORAGE_CREATE_BUCKET,
    },
  };
}

/**
 * Locator settings only; nothing is required
 */
export function resolveLocatorConfig(
  env: NodeJS.ProcessEnv,
  overrides: Pick<BatchOverrides, 'logsDir' | 'extension'> = {}
): { logsDir?: string; extension: string } {
  return {
    logsDir: pathSetting(overrides.logsDir, env['LOGS_DIR']),
    extension: extensionSetting(overrides.extension, env['LOG_EXTENSION']),
  };
}
