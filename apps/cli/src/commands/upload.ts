/**
 * Upload Command
 * 
 * Find the newest flight log and upload it under the task's key.
 */

import ora from 'ora';
import { z } from 'zod';
import { errorMessage } from '@flightlog/utils';
import { resolveBatchConfig } from '../config/index.js';
import { runBatchUpload, defaultDependencies } from '../lib/batchUpload.js';
import {
  printError,
  printHeader,
  printJson,
  printKeyValue,
  printSuccess,
  printWarning,
  formatBytes,
} from '../lib/output.js';

const uploadOptionsSchema = z.object({
  logsDir: z.string().optional(),
  taskId: z.string().optional(),
  bucket: z.string().optional(),
  credentials: z.string().optional(),
  extension: z.string().optional(),
  mounts: z.boolean().default(true),
  public: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  json: z.boolean().default(false),
});

export async function uploadCommand(rawOptions: unknown): Promise<void> {
  const parsedOptions = uploadOptionsSchema.safeParse(rawOptions);
  if (!parsedOptions.success) {
    printError(`Invalid options: ${parsedOptions.error.issues.map((issue) => issue.message).join(', ')}`);
    process.exit(1);
  }
  const options = parsedOptions.data;

  const resolved = resolveBatchConfig(process.env, {
    logsDir: options.logsDir,
    taskId: options.taskId,
    bucket: options.bucket,
    credentials: options.credentials,
    extension: options.extension,
  });
  if (!resolved.ok) {
    for (const message of resolved.errors) {
      printError(message);
    }
    printError('Missing required configuration. Please check your .env file.');
    process.exit(1);
  }
  const { config } = resolved;

  const spinner = options.json ? null : ora('Locating latest flight log...').start();

  try {
    const result = await runBatchUpload(
      config,
      { dryRun: options.dryRun, makePublic: options.public, includeMounts: options.mounts },
      { ...defaultDependencies, onStep: (_step, detail) => { if (spinner) spinner.text = detail; } }
    );

    if (options.json) {
      printJson({
        file: result.file.path,
        modifiedAt: result.file.modifiedAt.toISOString(),
        size: result.file.size,
        key: result.key,
        uploaded: result.outcome !== null,
        url: result.outcome?.url ?? null,
      });
      return;
    }

    if (!result.outcome) {
      spinner?.info('Dry run: nothing uploaded');
      printHeader('Would upload');
      printKeyValue('File', result.file.path);
      printKeyValue('Modified', result.file.modifiedAt.toLocaleString());
      printKeyValue('Size', formatBytes(result.file.size));
      printKeyValue('Key', result.key);
      printWarning('Run without --dry-run to upload');
      return;
    }

    spinner?.succeed(`Upload completed successfully to ${result.key}`);
    printKeyValue('File', result.file.path);
    printKeyValue('Bucket', result.outcome.bucket);
    printKeyValue('Size', formatBytes(result.outcome.size));
    if (result.outcome.url) {
      printKeyValue('URL', result.outcome.url);
    }
    printSuccess('Done');
  } catch (error) {
    spinner?.fail('Upload failed');
    printError(errorMessage(error));
    process.exit(1);
  }
}
