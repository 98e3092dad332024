/**
 * Similarity grouper: cluster perceptual fingerprints within a distance cutoff
 *
 * Linkage policy is single-linkage: two records join when their Hamming
 * distance is within the cutoff, and membership is transitive. A chain of
 * slightly re-compressed copies therefore lands in one group even when its
 * two ends are further apart than the cutoff; borderline images can be merged
 * through an intermediate. Do not switch to complete-linkage without revisiting
 * the "keep representative" suggestions built on top of these groups.
 *
 * Representative: the largest file; equal sizes fall back to the first path.
 */

import type { AccessibleImage } from '../hash/types.js';
import { fingerprintBits, toWords, wordDistance } from '../hash/fingerprint.js';
import { InvalidInputError } from '../utils/errors.js';
import { comparePaths } from '../utils/paths.js';
import { DisjointSet } from './disjoint-set.js';
import type { SimilarGroup } from './types.js';

function assertThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw InvalidInputError.fromOption('threshold', String(threshold), 'a number between 0.0 and 1.0');
  }
}

/**
 * Map a normalized similarity (1.0 = identical) to a Hamming-distance cutoff
 * similarity = 1 - distance / bits, so distance <= floor((1 - threshold) * bits)
 */
export function similarityCutoff(threshold: number, bits: number): number {
  assertThreshold(threshold);
  // (1 - 0.9) * 10 evaluates to 0.9999999999999998; the epsilon keeps it at 1
  return Math.floor((1 - threshold) * bits + 1e-9);
}

function pickRepresentative(members: AccessibleImage[]): AccessibleImage {
  return members.reduce((best, candidate) => {
    if (candidate.sizeBytes > best.sizeBytes) return candidate;
    if (candidate.sizeBytes === best.sizeBytes && comparePaths(candidate.path, best.path) < 0) {
      return candidate;
    }
    return best;
  });
}

/**
 * Cluster records that are not in `excluded`
 * Only clusters with two or more members are returned, largest first, then by first path
 */
export function buildSimilarGroups(
  records: readonly AccessibleImage[],
  threshold: number,
  excluded: ReadonlySet<string> = new Set()
): SimilarGroup[] {
  assertThreshold(threshold);
  const candidates = records.filter((record) => !excluded.has(record.path));
  if (candidates.length < 2) {
    return [];
  }

  const length = candidates[0].perceptualFingerprint.length;
  if (candidates.some((record) => record.perceptualFingerprint.length !== length)) {
    throw new Error('Fingerprints of different lengths cannot be compared');
  }

  const cutoff = similarityCutoff(threshold, fingerprintBits(candidates[0].perceptualFingerprint));
  const words = candidates.map((record) => toWords(record.perceptualFingerprint));
  const sets = new DisjointSet(candidates.length);

  for (let i = 0; i < candidates.length; i++) {
    for (let j = i + 1; j < candidates.length; j++) {
      if (wordDistance(words[i], words[j]) <= cutoff) {
        sets.union(i, j);
      }
    }
  }

  const groups: SimilarGroup[] = [];
  for (const component of sets.components()) {
    if (component.length < 2) continue;

    let maxDistance = 0;
    for (let a = 0; a < component.length; a++) {
      for (let b = a + 1; b < component.length; b++) {
        maxDistance = Math.max(maxDistance, wordDistance(words[component[a]], words[component[b]]));
      }
    }

    const members = component.map((index) => candidates[index]);
    groups.push({
      kind: 'similar',
      representative: pickRepresentative(members).path,
      files: members.map((member) => member.path).sort(comparePaths),
      maxDistance,
    });
  }

  return groups.sort(
    (a, b) => b.files.length - a.files.length || comparePaths(a.files[0], b.files[0])
  );
}
