import { promises as fs } from 'fs';
import { copy, ensureDir, pathExists, remove } from 'fs-extra';
import { FilesystemError, join } from '@testbuilder/shared';
import { ArtifactPattern, matchesAny } from '../naming/scheme';

/**
 * Names of the regular files in `dir` matching any of `patterns`, sorted.
 * A directory that does not exist has no matches.
 */
export async function listMatching(dir: string, patterns: ArtifactPattern[]): Promise<string[]> {
  if (!(await pathExists(dir))) {
    return [];
  }
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && matchesAny(patterns, entry.name))
    .map((entry) => entry.name)
    .sort();
}

export async function countMatching(dir: string, pattern: ArtifactPattern): Promise<number> {
  return (await listMatching(dir, [pattern])).length;
}

/**
 * Deletes `names` from `dir` in order. Stops at the first failure; files
 * already removed stay removed.
 */
export async function removeFiles(dir: string, names: string[]): Promise<void> {
  for (const name of names) {
    const target = join(dir, name);
    try {
      await remove(target);
    } catch (error: unknown) {
      throw new FilesystemError(target, `Failed to remove ${target}`, { cause: error });
    }
  }
}

/**
 * Copies `names` from `fromDir` into `toDir`, overwriting. Stops at the first
 * failure without undoing earlier copies.
 */
export async function copyFiles(fromDir: string, toDir: string, names: string[]): Promise<void> {
  try {
    await ensureDir(toDir);
  } catch (error: unknown) {
    throw new FilesystemError(toDir, `Failed to create ${toDir}`, { cause: error });
  }
  for (const name of names) {
    const source = join(fromDir, name);
    const target = join(toDir, name);
    try {
      await copy(source, target, { overwrite: true });
    } catch (error: unknown) {
      throw new FilesystemError(target, `Failed to copy ${source} to ${target}`, { cause: error });
    }
  }
}
