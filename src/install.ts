import fs from 'fs-extra';
import { join } from 'path';
import type { Git } from './git.js';
import { ui } from './ui.js';
import { RemoteValidator } from './utils/security.js';
import type { Dependency } from './types.js';

export type InstallOptions = {
  /** Clone instead of adding submodules */
  noGit: boolean;
  /** Commit each added submodule */
  commit: boolean;
};

/**
 * Derives the `lib/` directory name from a repository URL.
 *
 * @example
 * ```typescript
 * dependencyFromUrl('https://github.com/foundry-rs/forge-std.git');
 * // { name: 'forge-std', url: 'https://github.com/foundry-rs/forge-std.git' }
 * ```
 */
export function dependencyFromUrl(url: string): Dependency {
  const segments = url.replace(/\/+$/, '').split(/[/:]/);
  const last = segments[segments.length - 1] ?? '';
  const name = last.replace(/\.git$/, '');
  if (!name) {
    throw new Error(`Cannot derive a dependency name from "${url}"`);
  }
  return { name, url };
}

/**
 * Installs each dependency into `lib/<name>`.
 *
 * With git, dependencies become submodules; without it they are plain
 * clones. Given an empty list the submodules already listed in
 * `.gitmodules` are brought up to date instead.
 *
 * @returns The dependencies that were added
 */
export async function installDependencies(
  git: Git,
  deps: readonly Dependency[],
  options: InstallOptions
): Promise<Dependency[]> {
  if (deps.length === 0) {
    await syncSubmodules(git, options);
    return [];
  }

  for (const dep of deps) {
    RemoteValidator.validateRemoteUrl(dep.url);
  }

  const installed: Dependency[] = [];
  for (const dep of deps) {
    const target = `lib/${dep.name}`;
    ui.installing(dep.name, dep.url);

    if (options.noGit) {
      await git.clone(dep.url, target);
    } else {
      await git.submoduleAdd(dep.url, target);
      await git.submoduleUpdate({ init: true, recursive: true, paths: [target] });

      if (options.commit) {
        // .gitmodules lives at the work-tree top level, which may be above root
        await git.add([':(top).gitmodules', target]);
        await git.commit(`chore: install ${dep.name}`);
      }
    }

    installed.push(dep);
  }
  return installed;
}

async function syncSubmodules(git: Git, options: InstallOptions): Promise<void> {
  if (options.noGit) return;
  const topLevel = await git.topLevel();
  if (topLevel === undefined) return;
  if (!(await fs.pathExists(join(topLevel, '.gitmodules')))) return;

  await git.submoduleUpdate({ init: true, recursive: true });
}
