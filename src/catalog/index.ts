/**
 * Candidate image enumeration
 */

export { catalogImages, probeReadable, hasAllowedExtension } from './catalog.js';
export type { CatalogOptions, CatalogResult, CatalogSkip, CatalogFailure } from './catalog.js';
