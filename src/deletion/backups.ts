/**
 * Enumerate backups under a backup root
 * A backup whose manifest cannot be read is listed as corrupt instead of failing the listing
 */

import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import { IOFailureError, describeError, errorCode } from '../utils/errors.js';
import { comparePaths, isValidBackupId } from '../utils/paths.js';
import { readBackupManifest } from './journal.js';
import type { TransactionState } from './types.js';

export type BackupListing =
  | {
      backupId: string;
      status: 'ok';
      createdAt: string;
      state: TransactionState;
      entryCount: number;
      totalBytes: number;
    }
  | {
      backupId: string;
      status: 'corrupt';
      reason: string;
    };

export async function listBackups(backupRoot: string): Promise<BackupListing[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(backupRoot, { withFileTypes: true });
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return [];
    }
    throw IOFailureError.fromCause('list backup root', backupRoot, error);
  }

  const ids = entries
    .filter((entry) => entry.isDirectory() && isValidBackupId(entry.name))
    .map((entry) => entry.name)
    .sort(comparePaths);

  const listings: BackupListing[] = [];
  for (const backupId of ids) {
    try {
      const manifest = await readBackupManifest(backupRoot, backupId);
      listings.push({
        backupId,
        status: 'ok',
        createdAt: manifest.created_at,
        state: manifest.state,
        entryCount: manifest.entries.length,
        totalBytes: manifest.entries.reduce((sum, entry) => sum + entry.size, 0),
      });
    } catch (error) {
      listings.push({ backupId, status: 'corrupt', reason: describeError(error) });
    }
  }
  return listings;
}
