import fs from 'fs-extra';
import { join } from 'path';
import type { Remapping } from './types.js';

/** Source directories checked, in order, inside each library. */
const SOURCE_DIRS = ['src', 'contracts'];

const MAX_DEPTH = 4;

export function formatRemapping(remapping: Remapping): string {
  return `${remapping.alias}=${remapping.path}`;
}

/**
 * Renders remappings as the contents of `remappings.txt`:
 * one per line, duplicates dropped, sorted, no trailing newline.
 */
export function renderRemappings(remappings: readonly Remapping[]): string {
  const lines = new Set(remappings.map(formatRemapping));
  return Array.from(lines).sort().join('\n');
}

/**
 * Discovers one remapping per library directory below `<root>/<libDir>`,
 * descending into each library's own `lib/` folder.
 *
 * A library maps to its `src/` or `contracts/` directory when it has one,
 * otherwise to its root. When two libraries share a name the one closest
 * to the project root wins. Returned paths are relative to `root`.
 *
 * @example
 * ```typescript
 * // lib/forge-std/src exists
 * await findRemappings('/project');
 * // [{ alias: 'forge-std/', path: 'lib/forge-std/src/' }]
 * ```
 */
export async function findRemappings(root: string, libDir = 'lib'): Promise<Remapping[]> {
  const found = new Map<string, Remapping>();
  let level = [libDir];

  for (let depth = 0; depth < MAX_DEPTH && level.length > 0; depth++) {
    const next: string[] = [];

    for (const dir of level) {
      const absDir = join(root, dir);
      if (!(await isDirectory(absDir))) continue;

      const entries = await fs.readdir(absDir, { withFileTypes: true });
      const libraries = entries
        .filter(e => e.isDirectory() && !e.name.startsWith('.'))
        .map(e => e.name)
        .sort();

      for (const name of libraries) {
        const libPath = `${dir}/${name}`;
        const alias = `${name}/`;

        if (!found.has(alias)) {
          found.set(alias, { alias, path: `${await sourcePath(root, libPath)}/` });
        }
        next.push(`${libPath}/lib`);
      }
    }

    level = next;
  }

  return Array.from(found.values()).sort((a, b) => (a.alias < b.alias ? -1 : a.alias > b.alias ? 1 : 0));
}

async function sourcePath(root: string, libPath: string): Promise<string> {
  for (const candidate of SOURCE_DIRS) {
    if (await isDirectory(join(root, libPath, candidate))) {
      return `${libPath}/${candidate}`;
    }
  }
  return libPath;
}

async function isDirectory(path: string): Promise<boolean> {
  if (!(await fs.pathExists(path))) return false;
  return (await fs.stat(path)).isDirectory();
}
