import { listBackups, type BackupListing } from '../deletion/backups.js';
import type { FileOps } from '../deletion/file-ops.js';
import { readDeletionRequest, writeDeletionRequest } from '../deletion/request.js';
import { restoreBackup, type RestoreReport } from '../deletion/restore.js';
import { DeletionTransaction, type TransactionReport } from '../deletion/transaction.js';
import type { DeletionRequest } from '../deletion/types.js';
import { readResults } from '../results/io.js';
import type { BackupConfig } from '../utils/config.js';
import { IOFailureError, NoCandidatesError } from '../utils/errors.js';
import type { RunContext } from './context.js';

export async function orchestrateApply(
  requestPath: string,
  backup: BackupConfig,
  ctx: RunContext,
  fileOps?: Partial<FileOps>
): Promise<TransactionReport> {
  const request = await readDeletionRequest(requestPath);
  if (request.files.length === 0) {
    throw NoCandidatesError.fromEmptyRequest(requestPath);
  }

  ctx.logger.info(`Applying deletion request with ${request.files.length} file(s)`);
  const transaction = new DeletionTransaction(
    request,
    { backupRoot: backup.backupRoot, backupPattern: backup.backupPattern, fileOps },
    ctx
  );
  const report = await transaction.run();
  ctx.logger.info(`Backup id: ${report.backupId}`);
  return report;
}

export async function orchestrateRestore(
  backupId: string,
  backup: BackupConfig,
  overwrite: boolean,
  ctx: RunContext
): Promise<RestoreReport> {
  ctx.logger.info(`Restoring backup ${backupId} from ${backup.backupRoot}`);
  return restoreBackup(backupId, { backupRoot: backup.backupRoot, overwrite }, ctx);
}

export async function orchestrateListBackups(backup: BackupConfig): Promise<BackupListing[]> {
  return listBackups(backup.backupRoot);
}

/**
 * Build the "keep one per group" selection the report would pre-check:
 * every exact duplicate except the first, every similar file except the representative
 */
export async function orchestrateSuggest(
  resultsPath: string,
  requestPath: string,
  ctx: RunContext
): Promise<DeletionRequest> {
  const results = await readResults(resultsPath);

  const files = [
    ...results.exact_groups.flatMap((group) => group.files.slice(1)),
    ...results.similar_groups.flatMap((group) =>
      group.files.filter((file) => file !== group.representative)
    ),
  ];
  const request: DeletionRequest = { files, decidedBy: 'operator' };

  try {
    await writeDeletionRequest(requestPath, request);
  } catch (error) {
    throw IOFailureError.fromCause('write deletion request', requestPath, error);
  }
  ctx.logger.info(`Suggested ${files.length} file(s) for deletion in ${requestPath}; review before applying`);
  return request;
}
