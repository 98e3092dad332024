import { describe, it, expect } from '@jest/globals';
import type { AccessibleImage } from '../hash/types.js';
import { buildExactGroups } from './exact.js';

function record(path: string, exactDigest: string): AccessibleImage {
  return { accessible: true, path, sizeBytes: 100, exactDigest, perceptualFingerprint: '00' };
}

describe('buildExactGroups', () => {
  it('should group records sharing a digest and drop singletons', () => {
    const { groups, groupedPaths } = buildExactGroups([
      record('/photos/a.jpg', 'd1'),
      record('/photos/b.jpg', 'd2'),
      record('/photos/c.jpg', 'd1'),
      record('/photos/d.jpg', 'd2'),
      record('/photos/e.jpg', 'd2'),
      record('/photos/f.jpg', 'd3'),
    ]);

    expect(groups).toEqual([
      { kind: 'exact', digest: 'd2', files: ['/photos/b.jpg', '/photos/d.jpg', '/photos/e.jpg'] },
      { kind: 'exact', digest: 'd1', files: ['/photos/a.jpg', '/photos/c.jpg'] },
    ]);
    expect([...groupedPaths].sort()).toEqual([
      '/photos/a.jpg',
      '/photos/b.jpg',
      '/photos/c.jpg',
      '/photos/d.jpg',
      '/photos/e.jpg',
    ]);
  });

  it('should order equal-sized groups by their first member', () => {
    const { groups } = buildExactGroups([
      record('/z.png', 'late'),
      record('/a.png', 'early'),
      record('/y.png', 'late'),
      record('/b.png', 'early'),
    ]);

    expect(groups.map((group) => group.digest)).toEqual(['late', 'early']);
  });

  it('should return no groups when every digest is unique', () => {
    const { groups, groupedPaths } = buildExactGroups([record('/a.png', 'x'), record('/b.png', 'y')]);

    expect(groups).toEqual([]);
    expect(groupedPaths.size).toBe(0);
  });

  it('should group three identical files together', () => {
    const { groups } = buildExactGroups([
      record('/p/a.jpg', 'same'),
      record('/p/b.jpg', 'same'),
      record('/p/c.jpg', 'same'),
    ]);

    expect(groups).toHaveLength(1);
    expect(groups[0].files).toEqual(['/p/a.jpg', '/p/b.jpg', '/p/c.jpg']);
  });
});
