import { join } from 'path';
import type { AssetStore } from './assets.js';
import { writeIfAbsent } from './fsops.js';
import type { Git } from './git.js';
import type { Variant } from './types.js';

export const INIT_COMMIT_MESSAGE = 'chore: contract-init';
export const WORKFLOW_PATH = '.github/workflows/test.yml';

/**
 * Thrown when a commit was requested inside a repository that has
 * uncommitted or untracked changes.
 */
export class DirtyWorkingTreeError extends Error {
  constructor(readonly root: string) {
    super(
      `${root} is inside a git repository with uncommitted changes or untracked files.\n` +
      'Check `git status`, then commit, stash or ignore those changes, ' +
      'or run again without `--commit`.'
    );
    this.name = 'DirtyWorkingTreeError';
  }
}

/**
 * Guards the commit step before anything is written: when committing into
 * an existing repository without `force`, its working tree must be clean.
 *
 * @throws {DirtyWorkingTreeError}
 */
export async function assertCleanRepo(
  git: Git,
  options: { noGit: boolean; commit: boolean; force: boolean }
): Promise<void> {
  if (options.noGit || !options.commit || options.force) return;
  if (!(await git.isInRepo())) return;

  if (!(await git.isClean())) {
    throw new DirtyWorkingTreeError(git.root);
  }
}

/**
 * Makes `git.root` a repository if it is not one, adds `.gitignore` and the
 * CI workflow when they are missing, and commits everything on request.
 *
 * Existing ignore and workflow files are never touched.
 */
export async function initGitRepo(
  git: Git,
  assets: AssetStore,
  options: { commit: boolean; variant: Variant }
): Promise<void> {
  if (!(await git.isInRepo())) {
    await git.init();
  }

  await writeIfAbsent(join(git.root, '.gitignore'), assets.get(options.variant, 'gitignore'));
  await writeIfAbsent(join(git.root, WORKFLOW_PATH), assets.get(options.variant, 'workflow'));

  if (options.commit) {
    await git.addAll();
    await git.commit(INIT_COMMIT_MESSAGE);
  }
}
