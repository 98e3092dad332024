/**
 * Deletion request, backup manifest and deletion log schemas
 * The manifest lives at <backupRoot>/<backupId>/manifest.json and the log,
 * one JSON object per line, at <backupRoot>/<backupId>/deletion-log.jsonl
 */

import type { FileFailureKind } from '../utils/errors.js';
import { isRecord, isStringArray } from '../utils/guards.js';

export const MANIFEST_SCHEMA_VERSION = '1.0.0';

export type TransactionState = 'INIT' | 'BACKING_UP' | 'DELETING' | 'COMPLETE' | 'ABORTED';

export const TRANSACTION_STATES: readonly TransactionState[] = [
  'INIT',
  'BACKING_UP',
  'DELETING',
  'COMPLETE',
  'ABORTED',
];

export type LogStatus = 'backed_up' | 'deleted' | 'failed' | 'restored';

const LOG_STATUSES: readonly LogStatus[] = ['backed_up', 'deleted', 'failed', 'restored'];

const FAILURE_KINDS: readonly FileFailureKind[] = [
  'InaccessibleFile',
  'StaleSelection',
  'BackupVerificationFailed',
  'IOFailure',
];

/**
 * Operator-approved selection, produced by the external report step
 */
export interface DeletionRequest {
  files: string[];
  decidedBy: 'operator';
}

export interface ManifestEntry {
  /** Absolute path the file was backed up from */
  original_path: string;
  /** Absolute path of the verified copy */
  backup_path: string;
  /** Size in bytes */
  size: number;
  /** SHA-256 of the copied bytes (hex) */
  digest: string;
}

export interface BackupManifest {
  schema_version: string;
  backup_id: string;
  /** Transaction start (ISO 8601) */
  created_at: string;
  /** Last manifest write (ISO 8601) */
  updated_at: string;
  state: TransactionState;
  entries: ManifestEntry[];
}

export interface DeletionLogEntry {
  backup_id: string;
  path: string;
  status: LogStatus;
  /** ISO 8601 */
  timestamp: string;
  /** Verified content digest for backed_up, deleted and restored entries */
  digest?: string;
  error_kind?: FileFailureKind;
  error_detail?: string;
}

function isTransactionState(value: unknown): value is TransactionState {
  return TRANSACTION_STATES.some((state) => state === value);
}

export function isValidManifestEntry(value: unknown): value is ManifestEntry {
  if (!isRecord(value)) return false;
  return (
    typeof value.original_path === 'string' &&
    typeof value.backup_path === 'string' &&
    typeof value.size === 'number' &&
    typeof value.digest === 'string'
  );
}

/**
 * Type guard: check if value is a valid BackupManifest
 */
export function isValidBackupManifest(value: unknown): value is BackupManifest {
  if (!isRecord(value)) return false;
  return (
    typeof value.schema_version === 'string' &&
    typeof value.backup_id === 'string' &&
    typeof value.created_at === 'string' &&
    typeof value.updated_at === 'string' &&
    isTransactionState(value.state) &&
    Array.isArray(value.entries) &&
    value.entries.every(isValidManifestEntry)
  );
}

export function isValidDeletionLogEntry(value: unknown): value is DeletionLogEntry {
  if (!isRecord(value)) return false;
  return (
    typeof value.backup_id === 'string' &&
    typeof value.path === 'string' &&
    LOG_STATUSES.some((status) => status === value.status) &&
    typeof value.timestamp === 'string' &&
    (value.digest === undefined || typeof value.digest === 'string') &&
    (value.error_kind === undefined || FAILURE_KINDS.some((kind) => kind === value.error_kind)) &&
    (value.error_detail === undefined || typeof value.error_detail === 'string')
  );
}

/**
 * Type guard for the deletion request file: { files: [path, ...], decided_by?: "operator" }
 */
export function isValidDeletionRequestFile(
  value: unknown
): value is { files: string[]; decided_by?: 'operator' } {
  if (!isRecord(value)) return false;
  return (
    isStringArray(value.files) &&
    value.files.every((file) => file.trim().length > 0) &&
    (value.decided_by === undefined || value.decided_by === 'operator')
  );
}
