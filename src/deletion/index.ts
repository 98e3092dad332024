/**
 * Backup-then-delete transactions, restore and backup listing
 */

export {
  MANIFEST_SCHEMA_VERSION,
  TRANSACTION_STATES,
  type TransactionState,
  type LogStatus,
  type DeletionRequest,
  type ManifestEntry,
  type BackupManifest,
  type DeletionLogEntry,
  isValidBackupManifest,
  isValidManifestEntry,
  isValidDeletionLogEntry,
  isValidDeletionRequestFile,
} from './types.js';

export { canTransition, assertTransition, isTerminal } from './state.js';
export { BackupJournal, readBackupManifest, readDeletionLog } from './journal.js';
export type { LogRecord } from './journal.js';
export { DeletionTransaction, normalizeRequestPaths } from './transaction.js';
export type { TransactionOptions, TransactionReport, FileOutcome } from './transaction.js';
export { restoreBackup } from './restore.js';
export type { RestoreOptions, RestoreReport, RestoreOutcome } from './restore.js';
export { readDeletionRequest, writeDeletionRequest } from './request.js';
export { listBackups } from './backups.js';
export type { BackupListing } from './backups.js';
export { defaultFileOps, resolveFileOps } from './file-ops.js';
export type { FileOps } from './file-ops.js';
