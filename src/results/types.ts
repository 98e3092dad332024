/**
 * Scan results interchange format
 * Field names are consumed by the external report and selection step
 */

import { isRecord, isStringArray } from '../utils/guards.js';

export const RESULTS_SCHEMA_VERSION = '1.0.0';

export interface InaccessibleEntry {
  path: string;
  reason: string;
}

export interface ScanMetadata {
  /** Absolute scan root */
  root: string;
  /** Candidate files found, accessible or not */
  total_scanned: number;
  /** Candidate files that could not be read or decoded; never exceeds total_scanned */
  inaccessible_count: number;
  /** Scan completion time (ISO 8601) */
  timestamp: string;
  /** Similarity threshold used for grouping */
  threshold: number;
  /** Perceptual fingerprint length in bits */
  hash_bits: number;
  inaccessible: InaccessibleEntry[];
  /** Directories that could not be listed; files under them are not counted */
  unlisted_dirs: InaccessibleEntry[];
}

export interface ExactGroupEntry {
  digest: string;
  files: string[];
}

export interface SimilarGroupEntry {
  representative: string;
  files: string[];
  max_distance: number;
}

export interface ScanResults {
  schema_version: string;
  scan_metadata: ScanMetadata;
  exact_groups: ExactGroupEntry[];
  similar_groups: SimilarGroupEntry[];
}

function isInaccessibleList(value: unknown): value is InaccessibleEntry[] {
  return (
    Array.isArray(value) &&
    value.every(
      (entry: unknown) => isRecord(entry) && typeof entry.path === 'string' && typeof entry.reason === 'string'
    )
  );
}

export function isValidScanMetadata(value: unknown): value is ScanMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.root === 'string' &&
    typeof value.total_scanned === 'number' &&
    typeof value.inaccessible_count === 'number' &&
    typeof value.timestamp === 'string' &&
    typeof value.threshold === 'number' &&
    typeof value.hash_bits === 'number' &&
    isInaccessibleList(value.inaccessible) &&
    isInaccessibleList(value.unlisted_dirs)
  );
}

export function isValidExactGroupEntry(value: unknown): value is ExactGroupEntry {
  if (!isRecord(value)) return false;
  return typeof value.digest === 'string' && isStringArray(value.files) && value.files.length >= 2;
}

export function isValidSimilarGroupEntry(value: unknown): value is SimilarGroupEntry {
  if (!isRecord(value)) return false;
  return (
    typeof value.representative === 'string' &&
    isStringArray(value.files) &&
    value.files.length >= 2 &&
    value.files.includes(value.representative) &&
    typeof value.max_distance === 'number'
  );
}

/**
 * Type guard: check if value is a valid ScanResults document
 */
export function isValidScanResults(value: unknown): value is ScanResults {
  if (!isRecord(value)) return false;
  return (
    typeof value.schema_version === 'string' &&
    isValidScanMetadata(value.scan_metadata) &&
    Array.isArray(value.exact_groups) &&
    value.exact_groups.every(isValidExactGroupEntry) &&
    Array.isArray(value.similar_groups) &&
    value.similar_groups.every(isValidSimilarGroupEntry)
  );
}
