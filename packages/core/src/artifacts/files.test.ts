import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, writeFile } from 'fs/promises';
import { pathExists, remove } from 'fs-extra';
import { tmpdir } from 'os';
import { join } from 'path';
import { listMatching, countMatching, removeFiles, copyFiles } from './files';

describe('artifact files', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'testbuilder-files-'));
  });

  afterEach(async () => {
    await remove(root);
  });

  it('lists matching regular files in sorted order', async () => {
    await writeFile(join(root, 'tr-mutex-1.c'), '');
    await writeFile(join(root, 'tr-mutex-0.c'), '');
    await writeFile(join(root, 'tc-mutex.c'), '');
    await writeFile(join(root, 'mutex.pml'), '');
    await mkdir(join(root, 'tr-mutex-dir.c'));

    expect(await listMatching(root, ['tr-mutex*.c', 'tc-mutex*.c'])).toEqual([
      'tc-mutex.c',
      'tr-mutex-0.c',
      'tr-mutex-1.c',
    ]);
    expect(await countMatching(root, 'mutex*.pml')).toBe(1);
  });

  it('returns nothing for a missing directory', async () => {
    expect(await listMatching(join(root, 'absent'), ['*'])).toEqual([]);
  });

  it('removes and copies files', async () => {
    const target = join(root, 'target');
    await writeFile(join(root, 'tr-a.c'), 'int a;');
    await copyFiles(root, target, ['tr-a.c']);
    expect(await readFile(join(target, 'tr-a.c'), 'utf8')).toBe('int a;');

    await removeFiles(target, ['tr-a.c']);
    expect(await pathExists(join(target, 'tr-a.c'))).toBe(false);
  });

  it('wraps copy failures in a FilesystemError', async () => {
    await expect(copyFiles(root, join(root, 'target'), ['missing.c'])).rejects.toMatchObject({
      code: 'FilesystemError',
    });
  });
});
