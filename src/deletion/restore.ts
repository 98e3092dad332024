/**
 * Restore a backup: copy every manifest entry back to its original path
 * - Works on manifests in any state, including interrupted runs
 * - Backup copies are never removed, so restoring twice is safe
 * - A destination that already holds the backed-up bytes counts as restored
 */

import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { RunContext } from '../core/context.js';
import { type FileFailureKind, describeError, errorCode } from '../utils/errors.js';
import { type FileOps, resolveFileOps } from './file-ops.js';
import { BackupJournal } from './journal.js';
import type { ManifestEntry } from './types.js';

export interface RestoreOptions {
  backupRoot: string;
  /** Replace destinations that exist with different content */
  overwrite?: boolean;
  fileOps?: Partial<FileOps>;
}

export interface RestoreOutcome {
  path: string;
  status: 'restored' | 'failed';
  /** True when the destination already held the backed-up content */
  alreadyPresent?: boolean;
  kind?: FileFailureKind;
  detail?: string;
}

export interface RestoreReport {
  backupId: string;
  restored: number;
  failed: number;
  outcomes: RestoreOutcome[];
}

type DestinationState = { exists: false } | { exists: true; digest: string };

async function inspectDestination(fileOps: FileOps, path: string): Promise<DestinationState> {
  try {
    return { exists: true, digest: await fileOps.digestFile(path) };
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return { exists: false };
    }
    throw error;
  }
}

async function restoreEntry(
  entry: ManifestEntry,
  fileOps: FileOps,
  overwrite: boolean
): Promise<RestoreOutcome> {
  const path = entry.original_path;
  const failed = (kind: FileFailureKind, detail: string): RestoreOutcome => ({
    path,
    status: 'failed',
    kind,
    detail,
  });

  let backupDigest: string;
  try {
    backupDigest = await fileOps.digestFile(entry.backup_path);
  } catch (error) {
    return failed('IOFailure', `backup copy unreadable: ${describeError(error)}`);
  }
  if (backupDigest !== entry.digest) {
    return failed('BackupVerificationFailed', 'backup copy does not match its manifest digest');
  }

  let destination: DestinationState;
  try {
    destination = await inspectDestination(fileOps, path);
  } catch (error) {
    return failed('IOFailure', `cannot inspect destination: ${describeError(error)}`);
  }

  if (destination.exists && destination.digest === entry.digest) {
    return { path, status: 'restored', alreadyPresent: true };
  }
  if (destination.exists && !overwrite) {
    return failed('IOFailure', 'destination exists with different content (use --overwrite to replace it)');
  }

  try {
    await mkdir(dirname(path), { recursive: true });
    await fileOps.copyOverwrite(entry.backup_path, path);
  } catch (error) {
    return failed('IOFailure', `restore copy failed: ${describeError(error)}`);
  }

  try {
    const restoredDigest = await fileOps.digestFile(path);
    if (restoredDigest !== entry.digest) {
      return failed('BackupVerificationFailed', 'restored file does not match its manifest digest');
    }
  } catch (error) {
    return failed('IOFailure', `restored file unreadable: ${describeError(error)}`);
  }

  return { path, status: 'restored', alreadyPresent: false };
}

export async function restoreBackup(
  backupId: string,
  options: RestoreOptions,
  ctx: RunContext
): Promise<RestoreReport> {
  const { logger } = ctx;
  const fileOps = resolveFileOps(options.fileOps);
  const journal = await BackupJournal.open(options.backupRoot, backupId, ctx.now);

  if (journal.state !== 'COMPLETE') {
    logger.warn(`Backup ${backupId} is in state ${journal.state}; restoring the ${journal.entries.length} recorded entries`);
  }

  logger.phaseStart('Restore');
  const outcomes: RestoreOutcome[] = [];

  for (const [index, entry] of journal.entries.entries()) {
    const outcome = await restoreEntry(entry, fileOps, options.overwrite ?? false);
    outcomes.push(outcome);

    if (outcome.status === 'restored') {
      await journal.log({ path: entry.original_path, status: 'restored', digest: entry.digest });
      logger.debug(
        outcome.alreadyPresent ? `Already in place: ${entry.original_path}` : `Restored ${entry.original_path}`
      );
    } else {
      logger.warn(`${outcome.kind ?? 'IOFailure'}: ${entry.original_path}: ${outcome.detail ?? ''}`);
      await journal.log({
        path: entry.original_path,
        status: 'failed',
        error_kind: outcome.kind,
        error_detail: outcome.detail,
      });
    }

    logger.progress({ phase: 'Restore', current: index + 1, total: journal.entries.length });
  }

  const restored = outcomes.filter((outcome) => outcome.status === 'restored').length;
  const failed = outcomes.length - restored;
  logger.phaseComplete('Restore', `${restored}/${outcomes.length} file(s) restored`);

  return { backupId: journal.backupId, restored, failed, outcomes };
}
