/**
 * Exact duplicate index: group records by content digest
 */

import type { AccessibleImage } from '../hash/types.js';
import type { ExactGroup } from './types.js';

export interface ExactIndex {
  groups: ExactGroup[];
  /** Every path that belongs to some exact group */
  groupedPaths: Set<string>;
}

/**
 * Digests shared by two or more records become groups
 * Groups are ordered by descending size, then by the position of their first member
 */
export function buildExactGroups(records: readonly AccessibleImage[]): ExactIndex {
  const byDigest = new Map<string, { firstSeen: number; files: string[] }>();

  records.forEach((record, index) => {
    const entry = byDigest.get(record.exactDigest);
    if (entry) {
      entry.files.push(record.path);
    } else {
      byDigest.set(record.exactDigest, { firstSeen: index, files: [record.path] });
    }
  });

  const ranked = [...byDigest.entries()]
    .filter(([, entry]) => entry.files.length > 1)
    .sort(([, a], [, b]) => b.files.length - a.files.length || a.firstSeen - b.firstSeen);

  const groups: ExactGroup[] = ranked.map(([digest, entry]) => ({
    kind: 'exact',
    digest,
    files: entry.files,
  }));

  const groupedPaths = new Set<string>();
  for (const group of groups) {
    for (const file of group.files) {
      groupedPaths.add(file);
    }
  }

  return { groups, groupedPaths };
}
