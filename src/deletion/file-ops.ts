/**
 * Filesystem operations used by backup, delete and restore
 * Tests substitute individual operations to simulate failing disks
 */

import { constants } from 'fs';
import { copyFile, rm, stat, unlink } from 'fs/promises';
import { digestFile, syncFile } from '../utils/fs.js';

export interface FileOps {
  /** Copy without overwriting an existing destination */
  copyExclusive(source: string, destination: string): Promise<void>;
  /** Copy, replacing any existing destination */
  copyOverwrite(source: string, destination: string): Promise<void>;
  unlink(path: string): Promise<void>;
  /** Remove a file if present */
  discard(path: string): Promise<void>;
  digestFile(path: string): Promise<string>;
  sizeOf(path: string): Promise<number>;
  /** Flush a file's contents to disk */
  sync(path: string): Promise<void>;
}

export const defaultFileOps: FileOps = {
  copyExclusive: (source, destination) => copyFile(source, destination, constants.COPYFILE_EXCL),
  copyOverwrite: (source, destination) => copyFile(source, destination),
  unlink: (path) => unlink(path),
  discard: (path) => rm(path, { force: true }),
  digestFile,
  sizeOf: async (path) => (await stat(path)).size,
  sync: syncFile,
};

export function resolveFileOps(overrides: Partial<FileOps> = {}): FileOps {
  return { ...defaultFileOps, ...overrides };
}
