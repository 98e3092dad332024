import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { appendJsonLine, digestBuffer, digestFile, syncFile, writeJsonAtomic } from './fs.js';

describe('fs helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'image-dedupe-fs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should digest a file the same way as its bytes', async () => {
    const path = join(dir, 'data.bin');
    await writeFile(path, 'abc');

    // SHA-256("abc")
    const expected = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';
    expect(digestBuffer(Buffer.from('abc'))).toBe(expected);
    await expect(digestFile(path)).resolves.toBe(expected);
  });

  it('should reject when digesting a missing file', async () => {
    await expect(digestFile(join(dir, 'missing.bin'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should write JSON atomically, creating parent directories', async () => {
    const path = join(dir, 'nested', 'out.json');

    await writeJsonAtomic(path, { files: ['a.jpg'] });
    await writeJsonAtomic(path, { files: ['b.jpg'] });

    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual({ files: ['b.jpg'] });
    expect(await readdir(join(dir, 'nested'))).toEqual(['out.json']);
  });

  it('should flush an existing file and reject a missing one', async () => {
    const path = join(dir, 'copy.bin');
    await writeFile(path, 'payload');

    await expect(syncFile(path)).resolves.toBeUndefined();
    await expect(syncFile(join(dir, 'missing.bin'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should remove the temp file when the rename fails', async () => {
    const target = join(dir, 'occupied');
    // a non-empty directory cannot be replaced by a file
    await writeJsonAtomic(join(target, 'inner.json'), {});

    await expect(writeJsonAtomic(target, { x: 1 })).rejects.toThrow();
    expect(await readdir(dir)).toEqual(['occupied']);
  });

  it('should append one JSON object per line', async () => {
    const path = join(dir, 'log.jsonl');

    await appendJsonLine(path, { n: 1 });
    await appendJsonLine(path, { n: 2 });

    expect(await readFile(path, 'utf-8')).toBe('{"n":1}\n{"n":2}\n');
  });
});
