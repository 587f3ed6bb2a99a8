import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  findFilesByExtension,
  hasContent,
  removeIfExists,
  safeReadFile,
  safeWriteFile,
} from '../file.js';

describe('file utilities', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'subburn-file-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should report whether a file has content', async () => {
    const empty = join(dir, 'empty.srt');
    const full = join(dir, 'full.srt');
    await writeFile(empty, '');
    await writeFile(full, '1\n');

    expect(await hasContent(empty)).toBe(false);
    expect(await hasContent(full)).toBe(true);
    expect(await hasContent(join(dir, 'missing.srt'))).toBe(false);
  });

  it('should remove a file only when it exists', async () => {
    const file = join(dir, 'temp.srt');
    await writeFile(file, 'x');

    expect(await removeIfExists(file)).toBe(true);
    expect(existsSync(file)).toBe(false);
    expect(await removeIfExists(file)).toBe(false);
  });

  it('should read back written files and return null for missing ones', async () => {
    const file = join(dir, 'nested', 'out.txt');
    await safeWriteFile(file, 'hello');

    expect(await safeReadFile(file)).toBe('hello');
    expect(await safeReadFile(join(dir, 'nope.txt'))).toBeNull();
  });

  it('should list matching files case-insensitively and sorted', async () => {
    await writeFile(join(dir, 'b.mkv'), 'x');
    await writeFile(join(dir, 'A.MKV'), 'x');
    await writeFile(join(dir, 'notes.txt'), 'x');
    await mkdir(join(dir, 'season.mkv'));

    const files = await findFilesByExtension(dir, ['.mkv']);
    expect(files).toEqual([join(dir, 'A.MKV'), join(dir, 'b.mkv')]);
  });
});
