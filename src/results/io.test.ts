/**
 * Tests for building, saving and loading the results file
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CorruptArtifactError } from '../utils/errors.js';
import { buildScanResults, readResults, writeResults } from './io.js';
import { RESULTS_SCHEMA_VERSION, type ScanResults } from './types.js';

function sampleResults(): ScanResults {
  return buildScanResults({
    root: '/photos',
    threshold: 0.85,
    hashBits: 256,
    timestamp: new Date('2024-05-01T12:00:00Z'),
    catalogSkips: [
      { path: '/photos/locked', failure: 'listing-failed', reason: 'EACCES' },
      { path: '/photos/z.jpg', failure: 'unreadable', reason: 'EACCES' },
    ],
    records: [
      { accessible: true, path: '/photos/a.jpg', sizeBytes: 10, exactDigest: 'd1', perceptualFingerprint: '00' },
      { accessible: true, path: '/photos/b.jpg', sizeBytes: 10, exactDigest: 'd1', perceptualFingerprint: '00' },
      { accessible: false, path: '/photos/bad.png', failure: 'decode-failed', reason: 'unsupported image format' },
      { accessible: true, path: '/photos/c.jpg', sizeBytes: 30, exactDigest: 'd2', perceptualFingerprint: '01' },
      { accessible: true, path: '/photos/d.jpg', sizeBytes: 20, exactDigest: 'd3', perceptualFingerprint: '03' },
    ],
    exactGroups: [{ kind: 'exact', digest: 'd1', files: ['/photos/a.jpg', '/photos/b.jpg'] }],
    similarGroups: [
      { kind: 'similar', representative: '/photos/c.jpg', files: ['/photos/c.jpg', '/photos/d.jpg'], maxDistance: 1 },
    ],
  });
}

describe('buildScanResults', () => {
  it('should fill the metadata block', () => {
    const results = sampleResults();

    expect(results.schema_version).toBe(RESULTS_SCHEMA_VERSION);
    expect(results.scan_metadata).toEqual({
      root: '/photos',
      total_scanned: 6,
      inaccessible_count: 2,
      timestamp: '2024-05-01T12:00:00.000Z',
      threshold: 0.85,
      hash_bits: 256,
      inaccessible: [
        { path: '/photos/bad.png', reason: 'decode-failed: unsupported image format' },
        { path: '/photos/z.jpg', reason: 'unreadable: EACCES' },
      ],
      unlisted_dirs: [{ path: '/photos/locked', reason: 'listing-failed: EACCES' }],
    });
  });

  it('should keep unlisted directories out of the file counts', () => {
    const results = buildScanResults({
      root: '/photos',
      threshold: 0.85,
      hashBits: 256,
      timestamp: new Date('2024-05-01T12:00:00Z'),
      catalogSkips: [
        { path: '/photos/x', failure: 'listing-failed', reason: 'EACCES' },
        { path: '/photos/y', failure: 'listing-failed', reason: 'EACCES' },
        { path: '/photos/z.jpg', failure: 'unreadable', reason: 'EACCES' },
      ],
      records: [
        { accessible: true, path: '/photos/a.jpg', sizeBytes: 10, exactDigest: 'd1', perceptualFingerprint: '00' },
      ],
      exactGroups: [],
      similarGroups: [],
    });

    expect(results.scan_metadata.total_scanned).toBe(2);
    expect(results.scan_metadata.inaccessible_count).toBe(1);
    expect(results.scan_metadata.unlisted_dirs.map((entry) => entry.path)).toEqual(['/photos/x', '/photos/y']);
  });

  it('should map groups to their interchange shape', () => {
    const results = sampleResults();

    expect(results.exact_groups).toEqual([{ digest: 'd1', files: ['/photos/a.jpg', '/photos/b.jpg'] }]);
    expect(results.similar_groups).toEqual([
      { representative: '/photos/c.jpg', files: ['/photos/c.jpg', '/photos/d.jpg'], max_distance: 1 },
    ]);
  });
});

describe('results file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'image-dedupe-results-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read back what it wrote', async () => {
    const path = join(dir, 'duplicate_results.json');
    const results = sampleResults();

    await writeResults(path, results);

    await expect(readResults(path)).resolves.toEqual(results);
    expect(await readdir(dir)).toEqual(['duplicate_results.json']);
  });

  it('should write human-readable JSON', async () => {
    const path = join(dir, 'duplicate_results.json');
    await writeResults(path, sampleResults());

    const content = await readFile(path, 'utf-8');
    expect(content.startsWith('{\n  "schema_version": "1.0.0",')).toBe(true);
  });

  it('should reject a missing file', async () => {
    await expect(readResults(join(dir, 'nope.json'))).rejects.toThrow(CorruptArtifactError);
  });

  it('should reject malformed JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{"schema_version": ');

    await expect(readResults(path)).rejects.toThrow(CorruptArtifactError);
  });

  it('should reject documents with the wrong shape', async () => {
    const path = join(dir, 'shape.json');
    const results = sampleResults();
    await writeFile(
      path,
      JSON.stringify({
        ...results,
        similar_groups: [{ representative: '/elsewhere.jpg', files: ['/a.jpg', '/b.jpg'], max_distance: 2 }],
      })
    );

    await expect(readResults(path)).rejects.toThrow('Corrupt results file');
  });
});
