/**
 * CLI Entry Point
 * 
 * Batch driver: find the newest flight log and push it to object storage.
 * Suitable for cron or a systemd timer; exits non-zero on any failure.
 */

import '@flightlog/utils/env';
import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@flightlog/utils';
import { uploadCommand } from './commands/upload.js';
import { findCommand } from './commands/find.js';
import { mountsCommand } from './commands/mounts.js';

const program = new Command();

program
  .name('flightlog')
  .description('Upload the newest flight-controller log to object storage')
  .version('1.0.0')
  .option('--json', 'Output in JSON format');

// ============================================
// UPLOAD
// ============================================

program
  .command('upload', { isDefault: true })
  .description('Upload the newest log to logs/<task-id><extension>')
  .option('-d, --logs-dir <dir>', 'Directory to search (overrides LOGS_DIR)')
  .option('-t, --task-id <id>', 'Task id for the object key (overrides TASK_ID)')
  .option('-b, --bucket <name>', 'Storage bucket (overrides STORAGE_BUCKET)')
  .option('-c, --credentials <path>', 'Credentials JSON file (overrides CREDENTIALS_PATH)')
  .option('-e, --extension <ext>', 'Log file extension (overrides LOG_EXTENSION)')
  .option('--no-mounts', 'Do not search removable media')
  .option('--public', 'Make the uploaded object publicly readable')
  .option('--dry-run', 'Locate the log and show the key without uploading')
  .action(async (_options: unknown, command: Command) => {
    await uploadCommand(command.optsWithGlobals());
  });

// ============================================
// DISCOVERY
// ============================================

program
  .command('find')
  .description('Show the newest log and all candidates')
  .option('-d, --logs-dir <dir>', 'Directory to search (overrides LOGS_DIR)')
  .option('-e, --extension <ext>', 'Log file extension (overrides LOG_EXTENSION)')
  .option('--no-mounts', 'Do not search removable media')
  .action(async (_options: unknown, command: Command) => {
    await findCommand(command.optsWithGlobals());
  });

program
  .command('mounts')
  .description('List log directories on auto-mounted flight controllers')
  .option('-u, --user <name>', 'User name substituted into mount roots')
  .action(async (_options: unknown, command: Command) => {
    await mountsCommand(command.optsWithGlobals());
  });

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('flightlog --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Error:'), errorMessage(error));
  process.exit(1);
});
