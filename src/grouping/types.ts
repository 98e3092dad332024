/**
 * Duplicate group variants produced by the grouping stage
 */

/**
 * Files with bit-identical content; always two or more members
 */
export interface ExactGroup {
  kind: 'exact';
  digest: string;
  /** Members in catalog order */
  files: string[];
}

/**
 * Single-linkage cluster of perceptually similar files; always two or more members
 */
export interface SimilarGroup {
  kind: 'similar';
  /** The member to keep: largest file, then first path */
  representative: string;
  /** Members sorted by path */
  files: string[];
  /** Largest Hamming distance between any two members */
  maxDistance: number;
}

export type DuplicateGroup = ExactGroup | SimilarGroup;
