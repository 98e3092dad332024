/**
 * Filesystem helpers shared by the results store and the deletion transaction
 */

import { createHash, randomBytes } from 'crypto';
import { createReadStream } from 'fs';
import { appendFile, mkdir, open, rename, rm } from 'fs/promises';
import { dirname } from 'path';

export const DIGEST_ALGORITHM = 'sha256';

/**
 * Digest of an in-memory buffer (hex)
 */
export function digestBuffer(data: Buffer): string {
  return createHash(DIGEST_ALGORITHM).update(data).digest('hex');
}

/**
 * Stream a file through the digest; the read stream is closed on every exit path
 */
export async function digestFile(path: string): Promise<string> {
  const hash = createHash(DIGEST_ALGORITHM);
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * Flush a file's contents to disk
 */
export async function syncFile(path: string): Promise<void> {
  const handle = await open(path, 'r');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Save JSON atomically: write and flush a temp file beside the target, then rename
 * The temp file is removed if any step fails
 */
export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${randomBytes(4).toString('hex')}.tmp`;

  try {
    const handle = await open(tempPath, 'w');
    try {
      await handle.writeFile(`${JSON.stringify(value, null, 2)}\n`, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Append one JSON object as a single line
 */
export async function appendJsonLine(path: string, value: unknown): Promise<void> {
  await appendFile(path, `${JSON.stringify(value)}\n`, 'utf-8');
}
