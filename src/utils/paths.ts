/**
 * Path utilities and naming policy for artifacts and backups
 * Defines default artifact names, backup directory layout and backup id rules
 */

import { isAbsolute, join, parse, relative, resolve, sep } from 'path';

/**
 * Canonical artifact and backup layout
 */
export const OUTPUT_LAYOUT = {
  /** Default scan results file */
  RESULTS_FILE: 'duplicate_results.json',
  /** Default deletion request file */
  REQUEST_FILE: 'delete_request.json',
  /** Default directory holding one subdirectory per backup id */
  BACKUP_ROOT: 'dedupe-backups',
  /** Manifest inside a backup directory */
  MANIFEST_FILE: 'manifest.json',
  /** Append-only deletion log inside a backup directory */
  LOG_FILE: 'deletion-log.jsonl',
  /** Copied originals inside a backup directory */
  FILES_DIR: 'files',
} as const;

export const DEFAULT_BACKUP_PATTERN = 'backup_deletions_{timestamp}';

const TIMESTAMP_TOKEN = '{timestamp}';

export function getBackupDir(backupRoot: string, backupId: string): string {
  return join(backupRoot, backupId);
}

export function getBackupManifestPath(backupRoot: string, backupId: string): string {
  return join(backupRoot, backupId, OUTPUT_LAYOUT.MANIFEST_FILE);
}

export function getDeletionLogPath(backupRoot: string, backupId: string): string {
  return join(backupRoot, backupId, OUTPUT_LAYOUT.LOG_FILE);
}

/**
 * UTC timestamp in YYYYMMDD_HHMMSS form
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Validate that a backup id is a single safe directory name
 */
export function isValidBackupId(backupId: string): boolean {
  if (backupId.length === 0 || backupId.length > 200) {
    return false;
  }
  if (backupId === '.' || backupId === '..') {
    return false;
  }
  return /^[A-Za-z0-9._-]+$/.test(backupId);
}

/**
 * A naming pattern must contain {timestamp} and expand to a valid backup id
 */
export function isValidBackupPattern(pattern: string): boolean {
  if (!pattern.includes(TIMESTAMP_TOKEN)) {
    return false;
  }
  return isValidBackupId(pattern.split(TIMESTAMP_TOKEN).join('00000000_000000'));
}

/**
 * Expand a backup naming pattern, appending -2, -3... for the nth attempt
 * @param attempt - 1 for the first try
 */
export function generateBackupId(pattern: string, date: Date, attempt: number = 1): string {
  const base = pattern.split(TIMESTAMP_TOKEN).join(formatTimestamp(date));
  return attempt > 1 ? `${base}-${attempt}` : base;
}

/**
 * Mirror an original absolute path below a backup files directory
 * The filesystem root is stripped and a Windows drive letter becomes a directory,
 * so same-named files from different directories never collide:
 *   /home/u/pics/a.jpg -> <filesDir>/home/u/pics/a.jpg
 *   C:\pics\a.jpg      -> <filesDir>\C\pics\a.jpg
 */
export function mirrorPath(filesDir: string, originalPath: string): string {
  const absolute = resolve(originalPath);
  const { root } = parse(absolute);
  const drive = root.replace(/[:\\/]/g, '');
  const rest = absolute.slice(root.length);
  return drive ? join(filesDir, drive, rest) : join(filesDir, rest);
}

/**
 * True when child is inside (or equal to) parent
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  return rel === '' || (!rel.startsWith(`..${sep}`) && rel !== '..' && !isAbsolute(rel));
}

/**
 * Locale-independent UTF-16 code-unit ordering for every sorted path list
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
