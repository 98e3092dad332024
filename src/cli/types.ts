/**
 * CLI argument parsing types
 * Numeric options stay strings here; src/utils/config.ts validates them
 */

export interface CommonCliOptions {
  verbose?: boolean;
}

export interface ScanCliOptions extends CommonCliOptions {
  out: string;
  threshold?: string;
  extensions?: string;
  batchSize?: string;
  hashSize?: string;
  recursive: boolean;
}

export interface BackupCliOptions extends CommonCliOptions {
  backupRoot?: string;
}

export interface ApplyCliOptions extends BackupCliOptions {
  backupPattern?: string;
}

export interface RestoreCliOptions extends BackupCliOptions {
  overwrite?: boolean;
}

export interface SuggestCliOptions extends CommonCliOptions {
  out: string;
}

/**
 * Command implementations; each resolves to the process exit code
 */
export interface CliHandlers {
  scan(root: string, options: ScanCliOptions): Promise<number>;
  applyDeletions(requestPath: string, options: ApplyCliOptions): Promise<number>;
  restore(backupId: string, options: RestoreCliOptions): Promise<number>;
  listBackups(options: BackupCliOptions): Promise<number>;
  suggest(resultsPath: string, options: SuggestCliOptions): Promise<number>;
}
