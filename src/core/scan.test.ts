/**
 * End-to-end scan tests against generated images
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { copyFile, mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import { readResults } from '../results/io.js';
import { resolveScanConfig, type ScanConfig } from '../utils/config.js';
import { NoCandidatesError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { createRunContext } from './context.js';
import { orchestrateScan } from './scan.js';

const SIDE = 48;

async function writeGradient(path: string, direction: 'rising' | 'falling', format: 'png' | 'jpeg'): Promise<void> {
  const pixels = Buffer.alloc(SIDE * SIDE);
  for (let y = 0; y < SIDE; y++) {
    for (let x = 0; x < SIDE; x++) {
      const level = x * 5;
      pixels[y * SIDE + x] = direction === 'rising' ? level : 255 - level;
    }
  }
  const image = sharp(pixels, { raw: { width: SIDE, height: SIDE, channels: 1 } });
  await (format === 'png' ? image.png() : image.jpeg({ quality: 92 })).toFile(path);
}

describe('orchestrateScan', () => {
  let root: string;
  let photos: string;
  let resultsPath: string;
  let warnSpy: jest.SpiedFunction<typeof console.warn>;
  const ctx = createRunContext({
    logger: new Logger({ quiet: true }),
    now: () => new Date('2024-06-01T10:00:00Z'),
  });

  function config(overrides: Partial<ScanConfig> = {}): ScanConfig {
    return {
      ...resolveScanConfig(photos, {}, {}, { backupRoot: join(photos, 'backups'), backupPattern: 'b_{timestamp}' }),
      ...overrides,
    };
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'image-dedupe-scan-'));
    photos = join(root, 'photos');
    resultsPath = join(root, 'out', 'duplicate_results.json');
    await mkdir(photos);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    warnSpy.mockRestore();
    await rm(root, { recursive: true, force: true });
  });

  it('should report three identical files as one exact group and nothing similar', async () => {
    await writeGradient(join(photos, 'a.jpg'), 'rising', 'jpeg');
    await copyFile(join(photos, 'a.jpg'), join(photos, 'b.jpg'));
    await copyFile(join(photos, 'a.jpg'), join(photos, 'c.jpg'));

    const report = await orchestrateScan(config(), resultsPath, ctx);

    expect(report.hashed).toBe(3);
    expect(report.inaccessible).toBe(0);
    expect(report.unlistedDirs).toBe(0);
    expect(report.results.exact_groups).toHaveLength(1);
    expect(report.results.exact_groups[0].files).toEqual([
      join(photos, 'a.jpg'),
      join(photos, 'b.jpg'),
      join(photos, 'c.jpg'),
    ]);
    expect(report.results.similar_groups).toEqual([]);
    expect(report.results.scan_metadata).toMatchObject({
      root: photos,
      total_scanned: 3,
      inaccessible_count: 0,
      timestamp: '2024-06-01T10:00:00.000Z',
      threshold: 0.85,
      hash_bits: 256,
    });
  });

  it('should group a re-encoded copy as similar and keep unrelated images apart', async () => {
    await writeGradient(join(photos, 'original.png'), 'rising', 'png');
    await writeGradient(join(photos, 'recompressed.jpg'), 'rising', 'jpeg');
    await writeGradient(join(photos, 'mirrored.png'), 'falling', 'png');

    const report = await orchestrateScan(config(), resultsPath, ctx);

    expect(report.results.exact_groups).toEqual([]);
    expect(report.results.similar_groups).toHaveLength(1);
    expect(report.results.similar_groups[0].files).toEqual([
      join(photos, 'original.png'),
      join(photos, 'recompressed.jpg'),
    ]);
  });

  it('should not report a file in both an exact and a similar group', async () => {
    await writeGradient(join(photos, 'a.png'), 'rising', 'png');
    await copyFile(join(photos, 'a.png'), join(photos, 'a-copy.png'));
    await writeGradient(join(photos, 'a.jpg'), 'rising', 'jpeg');

    const { results } = await orchestrateScan(config(), resultsPath, ctx);

    const exactFiles = results.exact_groups.flatMap((group) => group.files);
    const similarFiles = results.similar_groups.flatMap((group) => group.files);
    expect(exactFiles).toEqual([join(photos, 'a-copy.png'), join(photos, 'a.png')]);
    expect(similarFiles.filter((file) => exactFiles.includes(file))).toEqual([]);
  });

  it('should write the results file it returns', async () => {
    await writeGradient(join(photos, 'a.png'), 'rising', 'png');
    await copyFile(join(photos, 'a.png'), join(photos, 'b.png'));

    const report = await orchestrateScan(config(), resultsPath, ctx);

    await expect(readResults(resultsPath)).resolves.toEqual(report.results);
    expect(report.resultsPath).toBe(resultsPath);
  });

  it('should list undecodable files as inaccessible without failing the scan', async () => {
    await writeGradient(join(photos, 'good.png'), 'rising', 'png');
    await writeFile(join(photos, 'broken.jpg'), 'definitely not a jpeg');

    const report = await orchestrateScan(config(), resultsPath, ctx);

    expect(report.hashed).toBe(1);
    expect(report.inaccessible).toBe(1);
    expect(report.results.scan_metadata.inaccessible[0].path).toBe(join(photos, 'broken.jpg'));
    expect(report.results.scan_metadata.inaccessible[0].reason.startsWith('decode-failed: ')).toBe(true);
  });

  it('should skip the backup directory inside the scan root', async () => {
    await writeGradient(join(photos, 'a.png'), 'rising', 'png');
    await mkdir(join(photos, 'backups', 'b_1', 'files'), { recursive: true });
    await copyFile(join(photos, 'a.png'), join(photos, 'backups', 'b_1', 'files', 'a.png'));

    const report = await orchestrateScan(config(), resultsPath, ctx);

    expect(report.results.scan_metadata.total_scanned).toBe(1);
    expect(report.results.exact_groups).toEqual([]);
  });

  it('should fail with NoCandidatesError when no images are found', async () => {
    await writeFile(join(photos, 'readme.txt'), 'no images here');

    await expect(orchestrateScan(config(), resultsPath, ctx)).rejects.toThrow(NoCandidatesError);
    await expect(readFile(resultsPath, 'utf-8')).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
