/**
 * Object keys
 *
 * Every uploaded log lands under `logs/`, namespaced by the caller's task id.
 */

import { z } from 'zod';

export const LOG_KEY_PREFIX = 'logs';
export const DEFAULT_TASK_ID = 'undefined_task';

export const taskIdSchema = z
  .string()
  .trim()
  .min(1, 'Task id is required')
  .max(128, 'Task id must be at most 128 characters')
  .refine((value) => !/[/\\]/.test(value), 'Task id must not contain path separators')
  .refine((value) => !value.includes('..'), 'Task id must not contain ".."');

export type TaskId = z.infer<typeof taskIdSchema>;

/**
 * Key for a batch upload: one object per task, e.g. `logs/task-7.bin`
 */
export function batchObjectKey(taskId: TaskId, extension: string = '.bin'): string {
  return `${LOG_KEY_PREFIX}/${taskId}${extension}`;
}

/**
 * Key for a form upload keeps the submitted filename, e.g. `logs/task-7_00000042.BIN`
 */
export function formObjectKey(taskId: TaskId, filename: string): string {
  return `${LOG_KEY_PREFIX}/${taskId}_${filename}`;
}
