/**
 * Batch upload pipeline
 *
 * locate newest log → open storage → upload to `logs/<taskId><ext>`.
 * Storage is opened only after a log has been found.
 */

import { LogNotFoundError, batchObjectKey } from '@flightlog/core';
import { locateLogs, type LocateResult, type LocatorOptions, type LogFile } from '@flightlog/locator';
import { LogStorage, loadCredentials, type LogUploader, type UploadOutcome } from '@flightlog/upload';
import type { BatchConfig } from '../config/index.js';

export type BatchStep = 'locate' | 'connect' | 'upload';

export interface BatchOptions {
  dryRun?: boolean;
  makePublic?: boolean;
  includeMounts?: boolean;
}

export interface BatchDependencies {
  locate: (options: LocatorOptions) => Promise<LocateResult>;
  openStorage: (config: BatchConfig) => Promise<LogUploader>;
  onStep?: (step: BatchStep, detail: string) => void;
}

export interface BatchResult {
  file: LogFile;
  key: string;
  outcome: UploadOutcome | null;
}

export async function openLogStorage(config: BatchConfig): Promise<LogUploader> {
  const credentials = await loadCredentials(config.credentialsPath);
  return LogStorage.initialize(credentials, config.bucket, {
    publicBaseUrl: config.publicBaseUrl,
    createBucket: config.createBucket,
  });
}

export const defaultDependencies: BatchDependencies = {
  locate: locateLogs,
  openStorage: openLogStorage,
};

export async function runBatchUpload(
  config: BatchConfig,
  options: BatchOptions = {},
  deps: BatchDependencies = defaultDependencies
): Promise<BatchResult> {
  deps.onStep?.('locate', `Searching ${config.logsDir} and removable media`);
  const { latest, searchedDirs } = await deps.locate({
    logsDir: config.logsDir,
    extension: config.extension,
    includeMounts: options.includeMounts,
  });
  if (!latest) {
    throw new LogNotFoundError(searchedDirs, config.extension);
  }

  const key = batchObjectKey(config.taskId, config.extension);
  if (options.dryRun) {
    return { file: latest, key, outcome: null };
  }

  deps.onStep?.('connect', `Connecting to bucket ${config.bucket}`);
  const storage = await deps.openStorage(config);

  deps.onStep?.('upload', `Uploading ${latest.path} to ${key}`);
  const outcome = await storage.upload(latest.path, key, { makePublic: options.makePublic });

  return { file: latest, key, outcome };
}
