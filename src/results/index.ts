/**
 * Results schema and read/write operations
 */

export {
  RESULTS_SCHEMA_VERSION,
  type ScanResults,
  type ScanMetadata,
  type ExactGroupEntry,
  type SimilarGroupEntry,
  type InaccessibleEntry,
  isValidScanResults,
  isValidScanMetadata,
  isValidExactGroupEntry,
  isValidSimilarGroupEntry,
} from './types.js';

export { buildScanResults, writeResults, readResults } from './io.js';
export type { ScanResultsInput } from './io.js';
