/**
 * Mounts Command
 * 
 * List log directories on auto-mounted flight controllers.
 */

import chalk from 'chalk';
import { z } from 'zod';
import { findMountLogDirs, resolveMountBaseDirs } from '@flightlog/locator';
import { printHeader, printInfo, printJson, printKeyValue } from '../lib/output.js';

const mountsOptionsSchema = z.object({
  user: z.string().optional(),
  json: z.boolean().default(false),
});

export async function mountsCommand(rawOptions: unknown): Promise<void> {
  const options = mountsOptionsSchema.parse(rawOptions);
  const dirs = await findMountLogDirs({ user: options.user });

  if (options.json) {
    printJson({ baseDirs: resolveMountBaseDirs(options.user), logDirs: dirs });
    return;
  }

  printHeader('Mount roots');
  for (const baseDir of resolveMountBaseDirs(options.user)) {
    printKeyValue('Root', baseDir);
  }

  printHeader('Flight controller log directories');
  if (dirs.length === 0) {
    printInfo('No flight controller storage detected');
    return;
  }
  for (const dir of dirs) {
    console.log(`  ${chalk.cyan(dir)}`);
  }
}
