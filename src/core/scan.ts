import { catalogImages } from '../catalog/catalog.js';
import { buildExactGroups } from '../grouping/exact.js';
import { buildSimilarGroups } from '../grouping/similarity.js';
import { hashImages } from '../hash/hasher.js';
import { isAccessible } from '../hash/types.js';
import { buildScanResults, writeResults } from '../results/io.js';
import type { ScanResults } from '../results/types.js';
import type { ScanConfig } from '../utils/config.js';
import { IOFailureError, NoCandidatesError } from '../utils/errors.js';
import type { RunContext } from './context.js';

export interface ScanReport {
  results: ScanResults;
  resultsPath: string;
  hashed: number;
  inaccessible: number;
  unlistedDirs: number;
}

/**
 * Full scan: catalog -> hash -> exact index -> similarity groups -> results file
 * Exact groups are built first so their members never reach similarity clustering
 */
export async function orchestrateScan(
  config: ScanConfig,
  resultsPath: string,
  ctx: RunContext
): Promise<ScanReport> {
  const { logger } = ctx;
  logger.info(`Scanning ${config.root} (threshold ${config.threshold})`);

  const catalog = await catalogImages(
    config.root,
    { extensions: config.extensions, recursive: config.recursive, excludeDirs: config.excludeDirs },
    ctx
  );

  const unreadableFiles = catalog.inaccessible.filter((skip) => skip.failure === 'unreadable');
  if (catalog.files.length === 0 && unreadableFiles.length === 0) {
    throw NoCandidatesError.fromEmptyScan(config.root);
  }

  const records = await hashImages(
    catalog.files,
    { batchSize: config.batchSize, hashSize: config.hashSize },
    ctx
  );
  const hashed = records.filter(isAccessible);

  logger.phaseStart('Exact grouping');
  const exact = buildExactGroups(hashed);
  logger.phaseComplete('Exact grouping', `${exact.groups.length} group(s), ${exact.groupedPaths.size} file(s)`);

  logger.phaseStart('Similarity grouping');
  const similar = buildSimilarGroups(hashed, config.threshold, exact.groupedPaths);
  logger.phaseComplete(
    'Similarity grouping',
    `${similar.length} group(s), ${similar.reduce((sum, group) => sum + group.files.length, 0)} file(s)`
  );

  const results = buildScanResults({
    root: catalog.root,
    threshold: config.threshold,
    hashBits: config.hashSize * config.hashSize,
    timestamp: ctx.now(),
    catalogSkips: catalog.inaccessible,
    records,
    exactGroups: exact.groups,
    similarGroups: similar,
  });

  try {
    await writeResults(resultsPath, results);
  } catch (error) {
    throw IOFailureError.fromCause('write results file', resultsPath, error);
  }
  logger.info(`Results written to ${resultsPath}`);

  return {
    results,
    resultsPath,
    hashed: hashed.length,
    inaccessible: results.scan_metadata.inaccessible_count,
    unlistedDirs: results.scan_metadata.unlisted_dirs.length,
  };
}
