/**
 * Image catalog: enumerate candidate image files below a root directory
 * - Filters by a case-insensitive extension allowlist
 * - Probes each candidate by reading one byte; failures are recorded, not raised
 * - Output is sorted with comparePaths so repeated runs agree
 */

import type { Dirent } from 'fs';
import { open, readdir, stat } from 'fs/promises';
import { extname, join, resolve } from 'path';
import type { RunContext } from '../core/context.js';
import { IOFailureError, describeError } from '../utils/errors.js';
import { comparePaths, isWithin } from '../utils/paths.js';

export type CatalogFailure = 'unreadable' | 'listing-failed';

export interface CatalogSkip {
  path: string;
  failure: CatalogFailure;
  reason: string;
}

export interface CatalogOptions {
  /** Lower-case extensions including the leading dot */
  extensions: string[];
  recursive?: boolean;
  /** Directories that are never entered */
  excludeDirs?: string[];
}

export interface CatalogResult {
  root: string;
  files: string[];
  inaccessible: CatalogSkip[];
}

/**
 * Open the file and read a single byte
 * The handle is closed whether or not the read succeeds
 */
export async function probeReadable(path: string): Promise<void> {
  const handle = await open(path, 'r');
  try {
    await handle.read(Buffer.alloc(1), 0, 1, 0);
  } finally {
    await handle.close();
  }
}

export function hasAllowedExtension(path: string, extensions: string[]): boolean {
  return extensions.includes(extname(path).toLowerCase());
}

/**
 * Catalog candidate images below root
 * Throws IOFailureError only when the root itself cannot be listed
 */
export async function catalogImages(
  root: string,
  options: CatalogOptions,
  ctx: RunContext
): Promise<CatalogResult> {
  const { logger } = ctx;
  const absoluteRoot = resolve(root);
  const recursive = options.recursive ?? true;
  const excludeDirs = (options.excludeDirs ?? []).filter((dir) => !isWithin(dir, absoluteRoot));

  const files: string[] = [];
  const inaccessible: CatalogSkip[] = [];

  try {
    const rootStats = await stat(absoluteRoot);
    if (!rootStats.isDirectory()) {
      throw new Error('not a directory');
    }
  } catch (error) {
    throw IOFailureError.fromCause('read scan root', absoluteRoot, error);
  }

  logger.phaseStart('Catalog');

  const pending: string[] = [absoluteRoot];
  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (dir === absoluteRoot) {
        throw IOFailureError.fromCause('list scan root', absoluteRoot, error);
      }
      logger.warn(`Cannot list directory ${dir}: ${describeError(error)}`);
      inaccessible.push({ path: dir, failure: 'listing-failed', reason: describeError(error) });
      continue;
    }

    for (const entry of entries) {
      const path = join(dir, entry.name);

      let isDirectory = entry.isDirectory();
      let isFile = entry.isFile();
      if (entry.isSymbolicLink()) {
        try {
          const target = await stat(path);
          isDirectory = false; // symlinked directories are not followed
          isFile = target.isFile();
        } catch (error) {
          if (hasAllowedExtension(path, options.extensions)) {
            inaccessible.push({ path, failure: 'unreadable', reason: describeError(error) });
          }
          continue;
        }
      }

      if (isDirectory) {
        if (recursive && !excludeDirs.some((excluded) => isWithin(excluded, path))) {
          pending.push(path);
        }
        continue;
      }

      if (!isFile || !hasAllowedExtension(path, options.extensions)) {
        continue;
      }

      try {
        await probeReadable(path);
        files.push(path);
      } catch (error) {
        logger.debug(`Inaccessible file ${path}: ${describeError(error)}`);
        inaccessible.push({ path, failure: 'unreadable', reason: describeError(error) });
      }
    }
  }

  files.sort(comparePaths);
  inaccessible.sort((a, b) => comparePaths(a.path, b.path));

  logger.phaseComplete(
    'Catalog',
    `${files.length} candidate image(s), ${inaccessible.length} inaccessible`
  );

  return { root: absoluteRoot, files, inaccessible };
}
