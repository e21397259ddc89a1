import fs from 'fs-extra';
import { join } from 'path';

/**
 * Writes `content` to `path` only when nothing exists there yet.
 * Parent directories are created as needed.
 *
 * @returns true when the file was written, false when it already existed
 */
export async function writeIfAbsent(path: string, content: string): Promise<boolean> {
  if (await fs.pathExists(path)) {
    return false;
  }
  await fs.outputFile(path, content);
  return true;
}

/**
 * True when `dir` is missing or has no entries.
 */
export async function isDirEmpty(dir: string): Promise<boolean> {
  if (!(await fs.pathExists(dir))) {
    return true;
  }
  const entries = await fs.readdir(dir);
  return entries.length === 0;
}

/**
 * Creates each of `dirs` under `root`. Existing directories are left alone.
 */
export async function ensureDirs(root: string, dirs: readonly string[]): Promise<void> {
  for (const dir of dirs) {
    await fs.ensureDir(join(root, dir));
  }
}
