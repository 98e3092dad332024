/**
 * Tests for restoring a backup to the original locations
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createRunContext } from '../core/context.js';
import { CorruptArtifactError, InvalidInputError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { DEFAULT_BACKUP_PATTERN, mirrorPath } from '../utils/paths.js';
import { readDeletionLog } from './journal.js';
import { restoreBackup } from './restore.js';
import { DeletionTransaction } from './transaction.js';

const BACKUP_ID = 'backup_deletions_20240601_100000';
const ctx = createRunContext({
  logger: new Logger({ quiet: true }),
  now: () => new Date('2024-06-01T10:00:00Z'),
});

describe('restoreBackup', () => {
  let root: string;
  let backupRoot: string;
  let a: string;
  let b: string;
  let warnSpy: jest.SpiedFunction<typeof console.warn>;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'image-dedupe-restore-'));
    backupRoot = join(root, 'backups');
    await mkdir(join(root, 'photos', 'nested'), { recursive: true });
    a = join(root, 'photos', 'a.jpg');
    b = join(root, 'photos', 'nested', 'b.jpg');
    await writeFile(a, 'alpha');
    await writeFile(b, 'bravo');
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    await new DeletionTransaction(
      { files: [a, b], decidedBy: 'operator' },
      { backupRoot, backupPattern: DEFAULT_BACKUP_PATTERN },
      ctx
    ).run();
  });

  afterEach(async () => {
    warnSpy.mockRestore();
    await rm(root, { recursive: true, force: true });
  });

  it('should put every file back with its original content', async () => {
    await rm(join(root, 'photos'), { recursive: true, force: true });

    const report = await restoreBackup(BACKUP_ID, { backupRoot }, ctx);

    expect(report).toEqual({
      backupId: BACKUP_ID,
      restored: 2,
      failed: 0,
      outcomes: [
        { path: a, status: 'restored', alreadyPresent: false },
        { path: b, status: 'restored', alreadyPresent: false },
      ],
    });
    expect(await readFile(a, 'utf-8')).toBe('alpha');
    expect(await readFile(b, 'utf-8')).toBe('bravo');
  });

  it('should be idempotent', async () => {
    await restoreBackup(BACKUP_ID, { backupRoot }, ctx);
    const second = await restoreBackup(BACKUP_ID, { backupRoot }, ctx);

    expect(second.restored).toBe(2);
    expect(second.outcomes.every((outcome) => outcome.alreadyPresent === true)).toBe(true);
    expect(await readFile(a, 'utf-8')).toBe('alpha');
  });

  it('should keep the backup copies after restoring', async () => {
    await restoreBackup(BACKUP_ID, { backupRoot }, ctx);

    const copy = mirrorPath(join(backupRoot, BACKUP_ID, 'files'), a);
    expect((await stat(copy)).isFile()).toBe(true);
  });

  it('should not replace a destination holding different content', async () => {
    await writeFile(a, 'a newer photo');

    const report = await restoreBackup(BACKUP_ID, { backupRoot }, ctx);

    expect(report.restored).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.outcomes[0]).toMatchObject({ path: a, status: 'failed', kind: 'IOFailure' });
    expect(await readFile(a, 'utf-8')).toBe('a newer photo');
  });

  it('should replace a conflicting destination with overwrite', async () => {
    await writeFile(a, 'a newer photo');

    const report = await restoreBackup(BACKUP_ID, { backupRoot, overwrite: true }, ctx);

    expect(report.failed).toBe(0);
    expect(await readFile(a, 'utf-8')).toBe('alpha');
  });

  it('should refuse a backup copy that no longer matches its digest', async () => {
    await writeFile(mirrorPath(join(backupRoot, BACKUP_ID, 'files'), b), 'tampered');

    const report = await restoreBackup(BACKUP_ID, { backupRoot }, ctx);

    expect(report.outcomes[1]).toEqual({
      path: b,
      status: 'failed',
      kind: 'BackupVerificationFailed',
      detail: 'backup copy does not match its manifest digest',
    });
    await expect(stat(b)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should append restore entries to the deletion log', async () => {
    await restoreBackup(BACKUP_ID, { backupRoot }, ctx);

    const log = await readDeletionLog(backupRoot, BACKUP_ID);
    expect(log.slice(-2).map((entry) => [entry.status, entry.path])).toEqual([
      ['restored', a],
      ['restored', b],
    ]);
  });

  it('should reject an invalid backup id', async () => {
    await expect(restoreBackup('../photos', { backupRoot }, ctx)).rejects.toThrow(InvalidInputError);
  });

  it('should reject an unknown backup id', async () => {
    await expect(restoreBackup('backup_deletions_19990101_000000', { backupRoot }, ctx)).rejects.toThrow(
      CorruptArtifactError
    );
  });
});
