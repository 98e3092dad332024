/**
 * Exact and similarity grouping
 */

export { buildExactGroups } from './exact.js';
export type { ExactIndex } from './exact.js';
export { buildSimilarGroups, similarityCutoff } from './similarity.js';
export { DisjointSet } from './disjoint-set.js';
export type { ExactGroup, SimilarGroup, DuplicateGroup } from './types.js';
