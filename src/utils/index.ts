/**
 * Shared utilities: logging, errors, configuration, paths and filesystem helpers
 */

export { Logger, createLogger } from './logger.js';
export type { LoggerConfig, ProgressStats, SummaryStats } from './logger.js';

export {
  EXIT_CODES,
  DedupeError,
  InvalidInputError,
  NoCandidatesError,
  PartialFailureError,
  IOFailureError,
  CorruptArtifactError,
  describeError,
  errorCode,
  getExitCode,
  handleError,
} from './errors.js';
export type { ExitCode, FileFailureKind } from './errors.js';

export {
  DEFAULT_EXTENSIONS,
  DEFAULT_THRESHOLD,
  DEFAULT_BATCH_SIZE,
  DEFAULT_HASH_SIZE,
  ENV_VARS,
  resolveScanConfig,
  resolveBackupConfig,
} from './config.js';
export type { ScanConfig, BackupConfig, Env } from './config.js';

export {
  OUTPUT_LAYOUT,
  DEFAULT_BACKUP_PATTERN,
  getBackupDir,
  getBackupManifestPath,
  getDeletionLogPath,
  generateBackupId,
  isValidBackupId,
  mirrorPath,
  comparePaths,
} from './paths.js';

export { digestFile, digestBuffer, syncFile, writeJsonAtomic, appendJsonLine } from './fs.js';
