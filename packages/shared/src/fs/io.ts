import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir, readJson as fseReadJson } from 'fs-extra';

/** Creates the parent directory of `path`. */
export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes `content` next to `path` under a temporary name and renames it into
 * place, so readers never see a partially written file.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/** Serializes with two-space indentation and a trailing newline. */
export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await atomicWrite(path, JSON.stringify(value, null, 2) + '\n');
}

export async function readJsonFile(path: string): Promise<unknown> {
  const value: unknown = await fseReadJson(path);
  return value;
}
