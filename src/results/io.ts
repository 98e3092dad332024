/**
 * Results IO: build the interchange document, save it atomically, read it back
 */

import { readFile } from 'fs/promises';
import type { CatalogSkip } from '../catalog/catalog.js';
import type { ExactGroup, SimilarGroup } from '../grouping/types.js';
import type { ImageRecord } from '../hash/types.js';
import { CorruptArtifactError, describeError, errorCode } from '../utils/errors.js';
import { writeJsonAtomic } from '../utils/fs.js';
import { comparePaths } from '../utils/paths.js';
import {
  type InaccessibleEntry,
  RESULTS_SCHEMA_VERSION,
  type ScanResults,
  isValidScanResults,
} from './types.js';

export interface ScanResultsInput {
  root: string;
  threshold: number;
  hashBits: number;
  timestamp: Date;
  catalogSkips: CatalogSkip[];
  records: ImageRecord[];
  exactGroups: ExactGroup[];
  similarGroups: SimilarGroup[];
}

export function buildScanResults(input: ScanResultsInput): ScanResults {
  const toEntry = (skip: CatalogSkip): InaccessibleEntry => ({
    path: skip.path,
    reason: `${skip.failure}: ${skip.reason}`,
  });
  const unreadable = input.catalogSkips.filter((skip) => skip.failure === 'unreadable');

  const inaccessible = [
    ...unreadable.map(toEntry),
    ...input.records.flatMap((record) =>
      record.accessible ? [] : [{ path: record.path, reason: `${record.failure}: ${record.reason}` }]
    ),
  ].sort((a, b) => comparePaths(a.path, b.path));

  const unlistedDirs = input.catalogSkips
    .filter((skip) => skip.failure === 'listing-failed')
    .map(toEntry)
    .sort((a, b) => comparePaths(a.path, b.path));

  return {
    schema_version: RESULTS_SCHEMA_VERSION,
    scan_metadata: {
      root: input.root,
      total_scanned: input.records.length + unreadable.length,
      inaccessible_count: inaccessible.length,
      timestamp: input.timestamp.toISOString(),
      threshold: input.threshold,
      hash_bits: input.hashBits,
      inaccessible,
      unlisted_dirs: unlistedDirs,
    },
    exact_groups: input.exactGroups.map((group) => ({ digest: group.digest, files: [...group.files] })),
    similar_groups: input.similarGroups.map((group) => ({
      representative: group.representative,
      files: [...group.files],
      max_distance: group.maxDistance,
    })),
  };
}

/**
 * Save results atomically: write to temp file, then rename
 */
export async function writeResults(path: string, results: ScanResults): Promise<void> {
  await writeJsonAtomic(path, results);
}

/**
 * Load and validate a results file
 * Any read, parse or shape failure is a CorruptArtifactError
 */
export async function readResults(path: string): Promise<ScanResults> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw CorruptArtifactError.fromMissing('results file', path);
    }
    throw CorruptArtifactError.fromParseFailure('results file', path, describeError(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw CorruptArtifactError.fromParseFailure('results file', path, describeError(error));
  }

  if (!isValidScanResults(parsed)) {
    throw CorruptArtifactError.fromParseFailure('results file', path, 'Invalid results structure');
  }
  return parsed;
}
