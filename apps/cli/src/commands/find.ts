/**
 * Find Command
 * 
 * Show the newest log and every candidate considered.
 */

import ora from 'ora';
import { z } from 'zod';
import { locateLogs } from '@flightlog/locator';
import { errorMessage } from '@flightlog/utils';
import { resolveLocatorConfig } from '../config/index.js';
import {
  formatBytes,
  printError,
  printHeader,
  printJson,
  printKeyValue,
  printTable,
  printWarning,
} from '../lib/output.js';

const findOptionsSchema = z.object({
  logsDir: z.string().optional(),
  extension: z.string().optional(),
  mounts: z.boolean().default(true),
  json: z.boolean().default(false),
});

export async function findCommand(rawOptions: unknown): Promise<void> {
  const parsed = findOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    printError('Invalid options');
    process.exit(1);
  }
  const options = parsed.data;
  const locator = resolveLocatorConfig(process.env, options);

  const spinner = options.json ? null : ora('Searching for flight logs...').start();

  try {
    const result = await locateLogs({ ...locator, includeMounts: options.mounts });
    spinner?.stop();

    if (options.json) {
      printJson({
        latest: result.latest?.path ?? null,
        searchedDirs: result.searchedDirs,
        candidates: result.candidates.map((file) => ({
          path: file.path,
          source: file.source,
          size: file.size,
          modifiedAt: file.modifiedAt.toISOString(),
        })),
      });
      return;
    }

    if (!result.latest) {
      printWarning(`No ${locator.extension} files found in any location`);
      process.exit(1);
    }

    printHeader('Latest flight log');
    printKeyValue('File', result.latest.path);
    printKeyValue('Source', result.latest.source);
    printKeyValue('Modified', result.latest.modifiedAt.toLocaleString());
    printKeyValue('Size', formatBytes(result.latest.size));

    printHeader(`Candidates (${result.candidates.length})`);
    printTable(result.candidates.map((file) => ({
      file: file.path,
      source: file.source,
      size: formatBytes(file.size),
      modified: file.modifiedAt.toISOString(),
    })));
  } catch (error) {
    spinner?.fail('Search failed');
    printError(errorMessage(error));
    process.exit(1);
  }
}
