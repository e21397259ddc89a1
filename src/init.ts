import fs from 'fs-extra';
import { realpath } from 'fs/promises';
import { join, resolve } from 'path';
import { loadAssetStore, type AssetStore } from './assets.js';
import { loadSettings, type Settings } from './config.js';
import { initEditorConfig } from './editor.js';
import { Git } from './git.js';
import { dependencyFromUrl, installDependencies } from './install.js';
import { confirmTemplateOverwrite } from './prompts.js';
import { assertCleanRepo, initGitRepo } from './repo.js';
import { assertEmptyOrForced, scaffoldProject, writeProjectConfig } from './scaffold.js';
import { fetchTemplate, resolveTemplateUrl } from './template.js';
import { ui } from './ui.js';
import { EnvironmentUtils } from './utils/environment.js';
import type { InitRequest, InitResult, TemplateDescriptor, Variant } from './types.js';

export const STD_LIB_DIR = 'lib/forge-std';

/**
 * Thrown for option combinations that cannot be honoured.
 */
export class InitRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InitRequestError';
  }
}

/**
 * Collaborators `initProject` can be given instead of the defaults.
 */
export type InitDependencies = {
  assets?: AssetStore;
  settings?: Settings;
  /** Decides whether to ask before a template replaces existing history */
  interactive?: boolean;
};

/**
 * Rejects requests that mix template mode with default-mode options.
 *
 * @throws {InitRequestError}
 */
export function validateInitRequest(request: InitRequest): void {
  if (request.template) {
    const conflicting = (['offline', 'force', 'vscode', 'vyper'] as const)
      .filter(flag => request[flag]);
    if (conflicting.length > 0) {
      throw new InitRequestError(
        `--template cannot be combined with ${conflicting.map(flag => `--${flag}`).join(', ')}`
      );
    }
    if (!request.template.reference.trim()) {
      throw new InitRequestError('Template reference cannot be empty');
    }
  }
}

/**
 * Initializes a new project at `request.root`.
 *
 * Template mode fetches a template repository and collapses its history.
 * Default mode runs, in order and stopping at the first failure:
 * 1. Non-empty directory and clean working tree checks (nothing written yet)
 * 2. Source, test and script skeleton for the chosen variant
 * 3. `foundry.toml`, unless present
 * 4. Git repository, `.gitignore`, CI workflow and optional commit
 * 5. Standard library install, unless offline
 * 6. Editor settings, when requested
 *
 * Nothing is rolled back when a step fails.
 *
 * @example
 * ```typescript
 * await initProject({
 *   root: './my-project',
 *   offline: false, force: false, vscode: true, vyper: false,
 *   shallow: true, noGit: false, commit: true
 * });
 * ```
 */
export async function initProject(
  request: InitRequest,
  deps: InitDependencies = {}
): Promise<InitResult> {
  validateInitRequest(request);

  const settings = deps.settings ?? loadSettings();

  await fs.ensureDir(request.root);
  const root = await realpath(resolve(request.root));
  const git = new Git(root, { shallow: request.shallow, timeoutMs: settings.gitTimeoutMs });

  if (request.template) {
    await initFromTemplate(git, request.template, {
      shallow: request.shallow,
      interactive: (deps.interactive ?? EnvironmentUtils.isInteractive()) && !request.assumeYes
    });
    ui.initialized();
    return { root, mode: 'template' };
  }

  const assets = deps.assets ?? await loadAssetStore();
  const variant: Variant = request.vyper ? 'vyper' : 'solidity';

  await assertEmptyOrForced(root, request.force);
  await assertCleanRepo(git, request);

  ui.initializing(root);

  await scaffoldProject(root, variant, assets);
  await writeProjectConfig(root, variant);

  if (!request.noGit) {
    await initGitRepo(git, assets, { commit: request.commit, variant });
  }

  if (!request.offline) {
    await installStdLib(git, settings, request);
  }

  if (request.vscode) {
    await initEditorConfig(root);
  }

  ui.initialized();
  return { root, mode: 'default' };
}

async function initFromTemplate(
  git: Git,
  template: TemplateDescriptor,
  options: { shallow: boolean; interactive: boolean }
): Promise<void> {
  const url = resolveTemplateUrl(template.reference);

  // git init keeps an existing repository; the hard reset then discards its history
  if (await fs.pathExists(join(git.root, '.git')) && await git.hasCommits()) {
    if (options.interactive) {
      await confirmTemplateOverwrite(git.root);
    } else {
      ui.existingRepository(git.root);
    }
  }

  ui.initializingFrom(git.root, url);
  const fetched = await fetchTemplate(git, template, { shallow: options.shallow });
  ui.info(`Created ${fetched.commit.slice(0, 7)} from ${url} at ${fetched.sourceCommit}`);
}

async function installStdLib(git: Git, settings: Settings, request: InitRequest): Promise<void> {
  const options = { noGit: request.noGit, commit: request.commit };

  if (await fs.pathExists(join(git.root, STD_LIB_DIR))) {
    ui.dependencyExists(STD_LIB_DIR);
    await installDependencies(git, [], options);
    return;
  }

  await installDependencies(git, [dependencyFromUrl(settings.stdLibUrl)], options);
}
