/**
 * Deletion transaction: back up, verify, then delete operator-selected files
 *
 * INIT -> BACKING_UP -> DELETING -> COMPLETE (ABORTED on fatal I/O)
 *
 * - Every requested file is copied, verified and flushed to disk before any original is removed
 * - Files under the backup root are refused so no run can delete another run's copies
 * - An original is deleted only if both it and its copy still match the digest
 *   recorded in the manifest
 * - Per-file failures are logged and skipped; only journal writes and backup
 *   directory creation abort the run
 * - Files are processed one at a time so manifest and log writes never interleave
 */

import { mkdir, realpath, stat } from 'fs/promises';
import { dirname, resolve } from 'path';
import { probeReadable } from '../catalog/catalog.js';
import type { RunContext } from '../core/context.js';
import {
  DedupeError,
  type FileFailureKind,
  IOFailureError,
  describeError,
  errorCode,
} from '../utils/errors.js';
import { isWithin, mirrorPath } from '../utils/paths.js';
import { type FileOps, resolveFileOps } from './file-ops.js';
import { BackupJournal } from './journal.js';
import type { DeletionRequest, ManifestEntry, TransactionState } from './types.js';

export interface TransactionOptions {
  backupRoot: string;
  backupPattern: string;
  fileOps?: Partial<FileOps>;
}

export interface FileOutcome {
  path: string;
  status: 'deleted' | 'backed_up' | 'failed';
  kind?: FileFailureKind;
  detail?: string;
}

export interface TransactionReport {
  backupId: string;
  backupDir: string;
  state: TransactionState;
  requested: number;
  backedUp: number;
  deleted: number;
  failed: number;
  outcomes: FileOutcome[];
}

const MISSING_CODES = ['ENOENT', 'ENOTDIR'];

/**
 * Resolve request paths to absolute form and drop repeats, keeping first occurrences
 */
export function normalizeRequestPaths(files: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const file of files) {
    const absolute = resolve(file);
    if (!seen.has(absolute)) {
      seen.add(absolute);
      result.push(absolute);
    }
  }
  return result;
}

export class DeletionTransaction {
  private journal: BackupJournal | null = null;
  private readonly files: string[];
  private readonly fileOps: FileOps;
  private readonly outcomes = new Map<string, FileOutcome>();
  private readonly verified: ManifestEntry[] = [];
  private backupRootReal: string;

  constructor(
    request: DeletionRequest,
    private readonly options: TransactionOptions,
    private readonly ctx: RunContext
  ) {
    this.files = normalizeRequestPaths(request.files);
    this.fileOps = resolveFileOps(options.fileOps);
    this.backupRootReal = resolve(options.backupRoot);
  }

  get state(): TransactionState {
    return this.journal?.state ?? 'INIT';
  }

  get backupId(): string {
    return this.requireJournal().backupId;
  }

  /**
   * Run every phase; on a fatal error the run is marked ABORTED before rethrowing
   */
  async run(): Promise<TransactionReport> {
    try {
      await this.begin();
      await this.backUp();
      await this.deleteOriginals();
      return await this.complete();
    } catch (error) {
      await this.abort(error);
      throw error instanceof DedupeError
        ? error
        : new IOFailureError('Deletion transaction aborted', describeError(error));
    }
  }

  /**
   * Create the backup directory and the empty manifest
   */
  async begin(): Promise<string> {
    if (this.journal) {
      throw new Error(`Transaction already started as ${this.journal.backupId}`);
    }
    this.journal = await BackupJournal.create(
      this.options.backupRoot,
      this.options.backupPattern,
      this.ctx.now
    );
    this.backupRootReal = await realpath(this.options.backupRoot);
    this.ctx.logger.info(`Backup ${this.journal.backupId} created at ${this.journal.dir}`);
    return this.journal.backupId;
  }

  async backUp(): Promise<void> {
    const journal = this.requireJournal();
    const { logger } = this.ctx;
    await journal.transition('BACKING_UP');
    logger.phaseStart('Backup');

    for (const [index, path] of this.files.entries()) {
      await this.backUpFile(journal, path);
      logger.progress({ phase: 'Backup', current: index + 1, total: this.files.length });
    }

    logger.phaseComplete('Backup', `${this.verified.length}/${this.files.length} file(s) backed up and verified`);
  }

  async deleteOriginals(): Promise<void> {
    const journal = this.requireJournal();
    const { logger } = this.ctx;
    await journal.transition('DELETING');
    logger.phaseStart('Delete');

    let deleted = 0;
    for (const [index, entry] of this.verified.entries()) {
      if (await this.deleteFile(journal, entry)) {
        deleted++;
      }
      logger.progress({ phase: 'Delete', current: index + 1, total: this.verified.length });
    }

    logger.phaseComplete('Delete', `${deleted}/${this.verified.length} original(s) deleted`);
  }

  async complete(): Promise<TransactionReport> {
    const journal = this.requireJournal();
    await journal.transition('COMPLETE');
    return this.report();
  }

  report(): TransactionReport {
    const journal = this.requireJournal();
    const outcomes = this.files.map(
      (path): FileOutcome =>
        this.outcomes.get(path) ?? { path, status: 'failed', kind: 'IOFailure', detail: 'not processed' }
    );
    return {
      backupId: journal.backupId,
      backupDir: journal.dir,
      state: journal.state,
      requested: this.files.length,
      backedUp: this.verified.length,
      deleted: outcomes.filter((outcome) => outcome.status === 'deleted').length,
      failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
      outcomes,
    };
  }

  private async abort(cause: unknown): Promise<void> {
    const journal = this.journal;
    this.ctx.logger.error(`Deletion transaction aborted: ${describeError(cause)}`);
    if (!journal || journal.state === 'COMPLETE' || journal.state === 'ABORTED') {
      return;
    }
    try {
      await journal.transition('ABORTED');
    } catch (error) {
      this.ctx.logger.warn(`Could not record ABORTED state for ${journal.backupId}: ${describeError(error)}`);
    }
  }

  private requireJournal(): BackupJournal {
    if (!this.journal) {
      throw new Error('Transaction has not been started');
    }
    return this.journal;
  }

  private async fail(
    journal: BackupJournal,
    path: string,
    kind: FileFailureKind,
    detail: string
  ): Promise<void> {
    this.ctx.logger.warn(`${kind}: ${path}: ${detail}`);
    this.outcomes.set(path, { path, status: 'failed', kind, detail });
    await journal.log({ path, status: 'failed', error_kind: kind, error_detail: detail });
  }

  /**
   * Confirm the selection still points at a readable regular file outside the backup root
   */
  private async checkSelection(path: string): Promise<{ kind: FileFailureKind; detail: string } | null> {
    try {
      const stats = await stat(path);
      if (!stats.isFile()) {
        return { kind: 'StaleSelection', detail: 'no longer a regular file' };
      }
      if (isWithin(this.options.backupRoot, path) || isWithin(this.backupRootReal, await realpath(path))) {
        return {
          kind: 'StaleSelection',
          detail: `inside backup root ${this.options.backupRoot}; backup copies are never deleted`,
        };
      }
    } catch (error) {
      const code = errorCode(error);
      if (code !== undefined && MISSING_CODES.includes(code)) {
        return { kind: 'StaleSelection', detail: 'file no longer exists' };
      }
      return { kind: 'IOFailure', detail: describeError(error) };
    }

    try {
      await probeReadable(path);
    } catch (error) {
      return { kind: 'IOFailure', detail: `not readable: ${describeError(error)}` };
    }
    return null;
  }

  private async backUpFile(journal: BackupJournal, path: string): Promise<void> {
    const problem = await this.checkSelection(path);
    if (problem) {
      await this.fail(journal, path, problem.kind, problem.detail);
      return;
    }

    const backupPath = mirrorPath(journal.filesDir, path);
    let sourceDigest: string;
    let backupDigest: string;
    let size: number;

    try {
      await mkdir(dirname(backupPath), { recursive: true });
      sourceDigest = await this.fileOps.digestFile(path);
    } catch (error) {
      await this.fail(journal, path, 'IOFailure', describeError(error));
      return;
    }

    try {
      await this.fileOps.copyExclusive(path, backupPath);
    } catch (error) {
      // an existing copy belongs to an earlier entry and must survive
      if (errorCode(error) !== 'EEXIST') {
        await this.discardCopy(backupPath);
      }
      await this.fail(journal, path, 'IOFailure', `backup copy failed: ${describeError(error)}`);
      return;
    }

    try {
      backupDigest = await this.fileOps.digestFile(backupPath);
      size = await this.fileOps.sizeOf(backupPath);
    } catch (error) {
      await this.discardCopy(backupPath);
      await this.fail(journal, path, 'IOFailure', `backup copy unreadable: ${describeError(error)}`);
      return;
    }

    if (backupDigest !== sourceDigest) {
      await this.discardCopy(backupPath);
      await this.fail(
        journal,
        path,
        'BackupVerificationFailed',
        `copy digest ${backupDigest} does not match source digest ${sourceDigest}`
      );
      return;
    }

    try {
      await this.fileOps.sync(backupPath);
    } catch (error) {
      await this.discardCopy(backupPath);
      await this.fail(journal, path, 'IOFailure', `backup copy not flushed: ${describeError(error)}`);
      return;
    }

    const entry: ManifestEntry = { original_path: path, backup_path: backupPath, size, digest: sourceDigest };
    await journal.addEntry(entry);
    await journal.log({ path, status: 'backed_up', digest: sourceDigest });
    this.verified.push(entry);
    this.outcomes.set(path, { path, status: 'backed_up' });
    this.ctx.logger.debug(`Backed up ${path} -> ${backupPath}`);
  }

  /**
   * Delete one original; returns true when it was removed
   */
  private async deleteFile(journal: BackupJournal, entry: ManifestEntry): Promise<boolean> {
    const path = entry.original_path;

    let originalDigest: string;
    let backupDigest: string;
    try {
      originalDigest = await this.fileOps.digestFile(path);
    } catch (error) {
      const code = errorCode(error);
      if (code !== undefined && MISSING_CODES.includes(code)) {
        await this.fail(journal, path, 'StaleSelection', 'file disappeared after backup');
      } else {
        await this.fail(journal, path, 'IOFailure', describeError(error));
      }
      return false;
    }

    try {
      backupDigest = await this.fileOps.digestFile(entry.backup_path);
    } catch (error) {
      await this.fail(journal, path, 'BackupVerificationFailed', `backup copy unreadable: ${describeError(error)}`);
      return false;
    }

    if (originalDigest !== entry.digest || backupDigest !== entry.digest) {
      const detail =
        originalDigest !== entry.digest ? 'original changed since backup' : 'backup copy changed since backup';
      await this.fail(journal, path, 'BackupVerificationFailed', detail);
      return false;
    }

    try {
      await this.fileOps.unlink(path);
    } catch (error) {
      await this.fail(journal, path, 'IOFailure', `delete failed: ${describeError(error)}`);
      return false;
    }

    await journal.log({ path, status: 'deleted', digest: entry.digest });
    this.outcomes.set(path, { path, status: 'deleted' });
    this.ctx.logger.debug(`Deleted ${path}`);
    return true;
  }

  private async discardCopy(backupPath: string): Promise<void> {
    try {
      await this.fileOps.discard(backupPath);
    } catch (error) {
      this.ctx.logger.warn(`Could not remove unverified copy ${backupPath}: ${describeError(error)}`);
    }
  }
}
