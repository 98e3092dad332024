/**
 * Content hasher: exact digest + perceptual fingerprint per file
 * - Reads each file once; the same bytes feed SHA-256 and the image decoder
 * - Read or decode failures mark the file inaccessible instead of failing the batch
 * - Files are hashed in fixed-size batches to cap open handles and decoded pixels
 */

import { readFile } from 'fs/promises';
import sharp from 'sharp';
import type { RunContext } from '../core/context.js';
import { describeError } from '../utils/errors.js';
import { digestBuffer } from '../utils/fs.js';
import { computeDifferenceHash } from './fingerprint.js';
import type { ImageRecord } from './types.js';

export interface HashOptions {
  /** Files hashed concurrently per batch */
  batchSize: number;
  /** Difference-hash grid side */
  hashSize: number;
}

/**
 * Decode, flatten onto white, greyscale and shrink to the hash grid
 */
export async function perceptualFingerprint(imageBuffer: Buffer, hashSize: number): Promise<string> {
  const { data, info } = await sharp(imageBuffer)
    .flatten({ background: '#ffffff' })
    .greyscale()
    .resize(hashSize + 1, hashSize, { fit: 'fill' })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return computeDifferenceHash(data, info.width, info.height, info.channels);
}

export async function hashImage(path: string, hashSize: number): Promise<ImageRecord> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    return { accessible: false, path, failure: 'unreadable', reason: describeError(error) };
  }

  const exactDigest = digestBuffer(bytes);

  try {
    const fingerprint = await perceptualFingerprint(bytes, hashSize);
    return {
      accessible: true,
      path,
      sizeBytes: bytes.length,
      exactDigest,
      perceptualFingerprint: fingerprint,
    };
  } catch (error) {
    return { accessible: false, path, failure: 'decode-failed', reason: describeError(error) };
  }
}

/**
 * Hash every path, batch by batch; output order matches input order
 */
export async function hashImages(
  paths: string[],
  options: HashOptions,
  ctx: RunContext
): Promise<ImageRecord[]> {
  const { logger } = ctx;
  const batchSize = Math.max(1, options.batchSize);
  const records: ImageRecord[] = [];

  logger.phaseStart('Hashing');
  logger.progress({ phase: 'Hashing', current: 0, total: paths.length });

  for (let start = 0; start < paths.length; start += batchSize) {
    const batch = paths.slice(start, start + batchSize);
    const hashed = await Promise.all(batch.map((path) => hashImage(path, options.hashSize)));

    for (const record of hashed) {
      if (!record.accessible) {
        logger.warn(`Skipping ${record.path} (${record.failure}): ${record.reason}`);
      }
      records.push(record);
    }

    logger.progress({ phase: 'Hashing', current: records.length, total: paths.length });
  }

  const failed = records.filter((record) => !record.accessible).length;
  logger.phaseComplete('Hashing', `${records.length - failed} hashed, ${failed} failed`);

  return records;
}
