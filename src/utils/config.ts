/**
 * Configuration resolution: defaults < environment variables < CLI overrides
 * Every value is validated here so the engine only sees well-formed settings
 */

import { resolve } from 'path';
import { InvalidInputError } from './errors.js';
import { DEFAULT_BACKUP_PATTERN, OUTPUT_LAYOUT, isValidBackupPattern } from './paths.js';

export const DEFAULT_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.bmp', '.tiff', '.tif', '.webp'];
export const DEFAULT_THRESHOLD = 0.85;
export const DEFAULT_BATCH_SIZE = 32;
export const DEFAULT_HASH_SIZE = 16;

const MAX_BATCH_SIZE = 1024;
const MIN_HASH_SIZE = 4;
const MAX_HASH_SIZE = 64;

export const ENV_VARS = {
  THRESHOLD: 'IMAGE_DEDUPE_THRESHOLD',
  BATCH_SIZE: 'IMAGE_DEDUPE_BATCH_SIZE',
  EXTENSIONS: 'IMAGE_DEDUPE_EXTENSIONS',
  HASH_SIZE: 'IMAGE_DEDUPE_HASH_SIZE',
  BACKUP_ROOT: 'IMAGE_DEDUPE_BACKUP_ROOT',
  BACKUP_PATTERN: 'IMAGE_DEDUPE_BACKUP_PATTERN',
} as const;

export type Env = Record<string, string | undefined>;

export interface ScanConfig {
  root: string;
  threshold: number;
  /** Lower-case extensions including the leading dot */
  extensions: string[];
  batchSize: number;
  /** Difference-hash grid side; the fingerprint has hashSize² bits */
  hashSize: number;
  recursive: boolean;
  /** Directories never entered while cataloguing */
  excludeDirs: string[];
}

export interface BackupConfig {
  backupRoot: string;
  backupPattern: string;
}

export interface ScanOverrides {
  threshold?: string;
  extensions?: string;
  batchSize?: string;
  hashSize?: string;
  recursive?: boolean;
}

export interface BackupOverrides {
  backupRoot?: string;
  backupPattern?: string;
}

export function parseThreshold(value: string, option: string = '--threshold'): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw InvalidInputError.fromOption(option, value, 'a number between 0.0 and 1.0');
  }
  return parsed;
}

export function parseIntegerInRange(value: string, option: string, min: number, max: number): number {
  if (!/^\d+$/.test(value.trim())) {
    throw InvalidInputError.fromOption(option, value, 'an integer');
  }
  const parsed = parseInt(value, 10);
  if (parsed < min || parsed > max) {
    throw InvalidInputError.fromOption(option, value, `an integer between ${min} and ${max}`);
  }
  return parsed;
}

/**
 * Parse a comma-separated allowlist; "JPG, .png" -> [".jpg", ".png"]
 */
export function parseExtensions(value: string, option: string = '--extensions'): string[] {
  const extensions = value
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));

  if (extensions.length === 0 || extensions.some((ext) => !/^\.[a-z0-9]+$/.test(ext))) {
    throw InvalidInputError.fromOption(option, value, 'a comma-separated list of extensions');
  }
  return [...new Set(extensions)];
}

/**
 * Hash sizes are even so that the hashSize² fingerprint bits fill whole hex digits
 */
export function parseHashSize(value: string): number {
  const parsed = parseIntegerInRange(value, '--hash-size', MIN_HASH_SIZE, MAX_HASH_SIZE);
  if (parsed % 2 !== 0) {
    throw InvalidInputError.fromOption('--hash-size', value, 'an even integer');
  }
  return parsed;
}

export function resolveBackupConfig(overrides: BackupOverrides = {}, env: Env = process.env): BackupConfig {
  const backupRoot = overrides.backupRoot ?? env[ENV_VARS.BACKUP_ROOT] ?? OUTPUT_LAYOUT.BACKUP_ROOT;
  const backupPattern = overrides.backupPattern ?? env[ENV_VARS.BACKUP_PATTERN] ?? DEFAULT_BACKUP_PATTERN;

  if (!isValidBackupPattern(backupPattern)) {
    throw InvalidInputError.fromOption(
      '--backup-pattern',
      backupPattern,
      'a directory name containing {timestamp} (letters, digits, ".", "_" and "-" only)'
    );
  }

  return { backupRoot: resolve(backupRoot), backupPattern };
}

export function resolveScanConfig(
  root: string,
  overrides: ScanOverrides = {},
  env: Env = process.env,
  backup: BackupConfig = resolveBackupConfig({}, env)
): ScanConfig {
  const thresholdRaw = overrides.threshold ?? env[ENV_VARS.THRESHOLD];
  const batchRaw = overrides.batchSize ?? env[ENV_VARS.BATCH_SIZE];
  const extensionsRaw = overrides.extensions ?? env[ENV_VARS.EXTENSIONS];
  const hashSizeRaw = overrides.hashSize ?? env[ENV_VARS.HASH_SIZE];

  return {
    root: resolve(root),
    threshold: thresholdRaw === undefined ? DEFAULT_THRESHOLD : parseThreshold(thresholdRaw),
    extensions: extensionsRaw === undefined ? [...DEFAULT_EXTENSIONS] : parseExtensions(extensionsRaw),
    batchSize:
      batchRaw === undefined
        ? DEFAULT_BATCH_SIZE
        : parseIntegerInRange(batchRaw, '--batch-size', 1, MAX_BATCH_SIZE),
    hashSize: hashSizeRaw === undefined ? DEFAULT_HASH_SIZE : parseHashSize(hashSizeRaw),
    recursive: overrides.recursive ?? true,
    excludeDirs: [backup.backupRoot],
  };
}
