/**
 * Standardized error taxonomy with stable exit codes
 * Each error class extends Error and provides:
 * - code: stable exit code (1-5)
 * - message: user-facing message
 * - details: optional verbose details
 *
 * File-level failures (one image, one deletion) are never thrown; they are
 * recorded with a FileFailureKind and the run continues.
 */

import type { Logger } from './logger.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  INVALID_INPUT: 1,
  NO_CANDIDATES: 2,
  PARTIAL_FAILURE: 3,
  IO_FAILURE: 4,
  CORRUPT_ARTIFACT: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Per-file failure categories recorded in scan results and deletion logs
 */
export type FileFailureKind =
  | 'InaccessibleFile'
  | 'StaleSelection'
  | 'BackupVerificationFailed'
  | 'IOFailure';

/**
 * Base error class with exit code
 */
export abstract class DedupeError extends Error {
  abstract readonly code: ExitCode;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  getExitCode(): ExitCode {
    return this.code;
  }

  log(logger: Logger): void {
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error (exit code 1)
 * Triggered by: bad CLI arguments, out-of-range configuration values
 */
export class InvalidInputError extends DedupeError {
  readonly code = EXIT_CODES.INVALID_INPUT;

  static fromOption(option: string, value: string, expected: string): InvalidInputError {
    return new InvalidInputError(
      `Invalid value for ${option}: "${value}". Expected ${expected}.`,
      `Check the ${option} flag or its environment variable`
    );
  }

  static fromBackupId(backupId: string): InvalidInputError {
    return new InvalidInputError(
      `Invalid backup id: "${backupId}"`,
      'Backup ids are single directory names; run list-backups to see the available ones'
    );
  }
}

/**
 * No candidates error (exit code 2)
 * Triggered by: a scan that finds no images, a deletion request with no files
 */
export class NoCandidatesError extends DedupeError {
  readonly code = EXIT_CODES.NO_CANDIDATES;

  static fromEmptyScan(root: string): NoCandidatesError {
    return new NoCandidatesError(
      `No candidate images found under ${root}`,
      'Check the root path and the --extensions allowlist'
    );
  }

  static fromEmptyRequest(requestPath: string): NoCandidatesError {
    return new NoCandidatesError(`Deletion request lists no files: ${requestPath}`);
  }
}

/**
 * Partial failure (exit code 3)
 * The run completed but some files were skipped or failed
 */
export class PartialFailureError extends DedupeError {
  readonly code = EXIT_CODES.PARTIAL_FAILURE;

  static fromCounts(operation: string, failed: number, total: number): PartialFailureError {
    return new PartialFailureError(
      `${operation} finished with ${failed} of ${total} file(s) skipped or failed`,
      'See the log for per-file reasons'
    );
  }

  static fromUnlistedDirs(count: number): PartialFailureError {
    return new PartialFailureError(
      `Scan could not list ${count} director${count === 1 ? 'y' : 'ies'} (contents not scanned)`,
      'See unlisted_dirs in the results file'
    );
  }
}

/**
 * Fatal I/O failure (exit code 4)
 * Triggered by: unreadable scan root, backup directory or manifest not writable
 */
export class IOFailureError extends DedupeError {
  readonly code = EXIT_CODES.IO_FAILURE;

  static fromCause(action: string, path: string, cause: unknown): IOFailureError {
    return new IOFailureError(`Failed to ${action}: ${path}`, describeError(cause));
  }
}

/**
 * Corrupt artifact (exit code 5)
 * Triggered by: results, request or manifest files that fail to parse or validate
 */
export class CorruptArtifactError extends DedupeError {
  readonly code = EXIT_CODES.CORRUPT_ARTIFACT;

  static fromParseFailure(artifact: string, path: string, reason: string): CorruptArtifactError {
    return new CorruptArtifactError(
      `Corrupt ${artifact}: ${path}`,
      `${reason}. Refusing to continue on unreadable input`
    );
  }

  static fromMissing(artifact: string, path: string): CorruptArtifactError {
    return new CorruptArtifactError(`Missing ${artifact}: ${path}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function getExitCode(error: unknown): number {
  if (error instanceof DedupeError) {
    return error.getExitCode();
  }
  return EXIT_CODES.INVALID_INPUT;
}

/**
 * Log an error and return the exit code the process should end with
 */
export function handleError(error: unknown, logger: Logger): number {
  if (error instanceof DedupeError) {
    error.log(logger);
    return error.getExitCode();
  }

  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  return EXIT_CODES.INVALID_INPUT;
}
