/**
 * Backup journal: the on-disk record of one deletion transaction
 * - manifest.json is rewritten atomically after every change
 * - deletion-log.jsonl only ever grows, one entry per completed step
 * Both stay valid if the process stops between any two writes.
 */

import { mkdir, readFile } from 'fs/promises';
import { join } from 'path';
import {
  CorruptArtifactError,
  IOFailureError,
  InvalidInputError,
  describeError,
  errorCode,
} from '../utils/errors.js';
import { appendJsonLine, writeJsonAtomic } from '../utils/fs.js';
import {
  OUTPUT_LAYOUT,
  generateBackupId,
  getBackupDir,
  getBackupManifestPath,
  getDeletionLogPath,
  isValidBackupId,
} from '../utils/paths.js';
import { assertTransition, isTerminal } from './state.js';
import {
  MANIFEST_SCHEMA_VERSION,
  type BackupManifest,
  type DeletionLogEntry,
  type ManifestEntry,
  type TransactionState,
  isValidBackupManifest,
  isValidDeletionLogEntry,
} from './types.js';

const MAX_ID_ATTEMPTS = 100;

export type LogRecord = Omit<DeletionLogEntry, 'backup_id' | 'timestamp'>;

/**
 * Read and validate a backup manifest
 */
export async function readBackupManifest(backupRoot: string, backupId: string): Promise<BackupManifest> {
  if (!isValidBackupId(backupId)) {
    throw InvalidInputError.fromBackupId(backupId);
  }

  const manifestPath = getBackupManifestPath(backupRoot, backupId);
  let content: string;
  try {
    content = await readFile(manifestPath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw CorruptArtifactError.fromMissing('backup manifest', manifestPath);
    }
    throw CorruptArtifactError.fromParseFailure('backup manifest', manifestPath, describeError(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw CorruptArtifactError.fromParseFailure('backup manifest', manifestPath, describeError(error));
  }

  if (!isValidBackupManifest(parsed) || parsed.backup_id !== backupId) {
    throw CorruptArtifactError.fromParseFailure('backup manifest', manifestPath, 'Invalid manifest structure');
  }
  return parsed;
}

/**
 * Read every entry of a deletion log; a missing log reads as empty
 */
export async function readDeletionLog(backupRoot: string, backupId: string): Promise<DeletionLogEntry[]> {
  const logPath = getDeletionLogPath(backupRoot, backupId);
  let content: string;
  try {
    content = await readFile(logPath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return [];
    }
    throw CorruptArtifactError.fromParseFailure('deletion log', logPath, describeError(error));
  }

  const entries: DeletionLogEntry[] = [];
  const lines = content.split('\n').filter((line) => line.trim().length > 0);
  for (const [index, line] of lines.entries()) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw CorruptArtifactError.fromParseFailure('deletion log', logPath, `line ${index + 1}: ${describeError(error)}`);
    }
    if (!isValidDeletionLogEntry(parsed)) {
      throw CorruptArtifactError.fromParseFailure('deletion log', logPath, `line ${index + 1}: invalid entry`);
    }
    entries.push(parsed);
  }
  return entries;
}

export class BackupJournal {
  private constructor(
    readonly backupRoot: string,
    private manifest: BackupManifest,
    private readonly now: () => Date
  ) {}

  /**
   * Create a fresh backup directory and its initial manifest
   * Colliding ids get a -2, -3... suffix; any other failure is fatal
   */
  static async create(backupRoot: string, pattern: string, now: () => Date): Promise<BackupJournal> {
    try {
      await mkdir(backupRoot, { recursive: true });
    } catch (error) {
      throw IOFailureError.fromCause('create backup root', backupRoot, error);
    }

    const startedAt = now();
    let backupId: string | undefined;
    for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS && backupId === undefined; attempt++) {
      const candidate = generateBackupId(pattern, startedAt, attempt);
      try {
        await mkdir(getBackupDir(backupRoot, candidate));
        backupId = candidate;
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') {
          throw IOFailureError.fromCause('create backup directory', getBackupDir(backupRoot, candidate), error);
        }
      }
    }

    if (backupId === undefined) {
      throw new IOFailureError(
        `Failed to create backup directory: ${MAX_ID_ATTEMPTS} ids already taken under ${backupRoot}`
      );
    }

    const timestamp = startedAt.toISOString();
    const journal = new BackupJournal(
      backupRoot,
      {
        schema_version: MANIFEST_SCHEMA_VERSION,
        backup_id: backupId,
        created_at: timestamp,
        updated_at: timestamp,
        state: 'INIT',
        entries: [],
      },
      now
    );

    try {
      await mkdir(journal.filesDir, { recursive: true });
    } catch (error) {
      throw IOFailureError.fromCause('create backup directory', journal.filesDir, error);
    }
    await journal.persist();
    return journal;
  }

  /**
   * Open an existing backup for restore; the manifest is read-only from here
   */
  static async open(backupRoot: string, backupId: string, now: () => Date): Promise<BackupJournal> {
    const manifest = await readBackupManifest(backupRoot, backupId);
    return new BackupJournal(backupRoot, manifest, now);
  }

  get backupId(): string {
    return this.manifest.backup_id;
  }

  get dir(): string {
    return getBackupDir(this.backupRoot, this.backupId);
  }

  get filesDir(): string {
    return join(this.dir, OUTPUT_LAYOUT.FILES_DIR);
  }

  get manifestPath(): string {
    return getBackupManifestPath(this.backupRoot, this.backupId);
  }

  get logPath(): string {
    return getDeletionLogPath(this.backupRoot, this.backupId);
  }

  get state(): TransactionState {
    return this.manifest.state;
  }

  get entries(): readonly ManifestEntry[] {
    return this.manifest.entries;
  }

  snapshot(): BackupManifest {
    return { ...this.manifest, entries: [...this.manifest.entries] };
  }

  async addEntry(entry: ManifestEntry): Promise<void> {
    this.assertWritable();
    this.manifest = { ...this.manifest, entries: [...this.manifest.entries, entry] };
    await this.persist();
  }

  async transition(next: TransactionState): Promise<void> {
    assertTransition(this.manifest.state, next);
    this.manifest = { ...this.manifest, state: next };
    await this.persist();
  }

  /**
   * Append one log line stamped with this backup id and the current time
   */
  async log(record: LogRecord): Promise<DeletionLogEntry> {
    const entry: DeletionLogEntry = {
      backup_id: this.backupId,
      path: record.path,
      status: record.status,
      timestamp: this.now().toISOString(),
    };
    if (record.digest !== undefined) entry.digest = record.digest;
    if (record.error_kind !== undefined) entry.error_kind = record.error_kind;
    if (record.error_detail !== undefined) entry.error_detail = record.error_detail;

    try {
      await appendJsonLine(this.logPath, entry);
    } catch (error) {
      throw IOFailureError.fromCause('append to deletion log', this.logPath, error);
    }
    return entry;
  }

  private assertWritable(): void {
    if (isTerminal(this.manifest.state)) {
      throw new Error(`Backup ${this.backupId} is ${this.manifest.state}; its manifest is frozen`);
    }
  }

  private async persist(): Promise<void> {
    this.manifest = { ...this.manifest, updated_at: this.now().toISOString() };
    try {
      await writeJsonAtomic(this.manifestPath, this.manifest);
    } catch (error) {
      throw IOFailureError.fromCause('write backup manifest', this.manifestPath, error);
    }
  }
}
