import { Command } from 'commander';
import { DEFAULT_BATCH_SIZE, DEFAULT_HASH_SIZE, DEFAULT_THRESHOLD } from '../utils/config.js';
import { OUTPUT_LAYOUT } from '../utils/paths.js';
import type {
  ApplyCliOptions,
  BackupCliOptions,
  CliHandlers,
  RestoreCliOptions,
  ScanCliOptions,
  SuggestCliOptions,
} from './types.js';

export const PROGRAM_NAME = 'image-dedupe';
export const PROGRAM_VERSION = '0.1.0';

/**
 * Build the command tree; handlers report exit codes through onExit
 */
export function buildProgram(handlers: CliHandlers, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Find exact and near-duplicate images, delete selected copies with backup and restore')
    .version(PROGRAM_VERSION);

  program
    .command('scan')
    .description('Scan a directory tree and write the duplicate results file')
    .argument('<root>', 'Directory to scan')
    .option('--out <file>', 'Results file', OUTPUT_LAYOUT.RESULTS_FILE)
    .option('--threshold <number>', `Similarity threshold 0.0-1.0 (default: ${DEFAULT_THRESHOLD})`)
    .option('--extensions <list>', 'Comma-separated extension allowlist (e.g. jpg,png)')
    .option('--batch-size <number>', `Files hashed concurrently per batch (default: ${DEFAULT_BATCH_SIZE})`)
    .option('--hash-size <number>', `Difference-hash grid side, even (default: ${DEFAULT_HASH_SIZE})`)
    .option('--no-recursive', 'Only scan the top-level directory')
    .option('--verbose', 'Enable verbose logging')
    .action(async (root: string, options: ScanCliOptions) => {
      onExit(await handlers.scan(root, options));
    });

  program
    .command('apply-deletions')
    .description('Back up, verify and delete the files listed in a deletion request')
    .argument('[request]', 'Deletion request file', OUTPUT_LAYOUT.REQUEST_FILE)
    .option('--backup-root <dir>', `Directory holding backups (default: ${OUTPUT_LAYOUT.BACKUP_ROOT})`)
    .option('--backup-pattern <pattern>', 'Backup directory name pattern containing {timestamp}')
    .option('--verbose', 'Enable verbose logging')
    .action(async (requestPath: string, options: ApplyCliOptions) => {
      onExit(await handlers.applyDeletions(requestPath, options));
    });

  program
    .command('restore')
    .description('Copy every file of a backup back to its original location')
    .argument('<backupId>', 'Backup id as shown by list-backups')
    .option('--backup-root <dir>', `Directory holding backups (default: ${OUTPUT_LAYOUT.BACKUP_ROOT})`)
    .option('--overwrite', 'Replace destinations that now hold different content')
    .option('--verbose', 'Enable verbose logging')
    .action(async (backupId: string, options: RestoreCliOptions) => {
      onExit(await handlers.restore(backupId, options));
    });

  program
    .command('list-backups')
    .description('List backups and their state')
    .option('--backup-root <dir>', `Directory holding backups (default: ${OUTPUT_LAYOUT.BACKUP_ROOT})`)
    .option('--verbose', 'Enable verbose logging')
    .action(async (options: BackupCliOptions) => {
      onExit(await handlers.listBackups(options));
    });

  program
    .command('suggest')
    .description('Write a deletion request keeping one file per duplicate group')
    .argument('[results]', 'Results file', OUTPUT_LAYOUT.RESULTS_FILE)
    .option('--out <file>', 'Deletion request file', OUTPUT_LAYOUT.REQUEST_FILE)
    .option('--verbose', 'Enable verbose logging')
    .action(async (resultsPath: string, options: SuggestCliOptions) => {
      onExit(await handlers.suggest(resultsPath, options));
    });

  return program;
}
