import { Command, Option } from 'commander';
import { initProject } from './init.js';
import { handleInitError } from './prompts.js';
import type { InitRequest } from './types.js';

const VERSION = '0.1.0';

/**
 * Options as commander parses them. `--no-deps` and `--no-git` show up as
 * `deps: false` and `git: false`.
 */
export type CliOptions = {
  template?: string;
  branch?: string;
  offline?: boolean;
  deps?: boolean;
  force?: boolean;
  vscode?: boolean;
  vyper?: boolean;
  shallow?: boolean;
  git?: boolean;
  commit?: boolean;
  yes?: boolean;
};

export function toInitRequest(root: string, options: CliOptions): InitRequest {
  return {
    root,
    template: options.template === undefined
      ? undefined
      : { reference: options.template, branch: options.branch },
    offline: Boolean(options.offline) || options.deps === false,
    force: Boolean(options.force),
    vscode: Boolean(options.vscode),
    vyper: Boolean(options.vyper),
    shallow: Boolean(options.shallow),
    noGit: options.git === false,
    commit: Boolean(options.commit),
    assumeYes: Boolean(options.yes)
  };
}

/**
 * Builds the `contract-init` command.
 *
 * @param run - Receives the parsed request; defaults to {@link initProject}
 */
export function createProgram(
  run: (request: InitRequest) => Promise<unknown> = initProject
): Command {
  return new Command()
    .name('contract-init')
    .description('Create a new smart-contract project from a template or a built-in skeleton.')
    .version(VERSION)
    .argument('[root]', 'the root directory of the new project', '.')
    .addOption(new Option('-t, --template <template>', 'the template to start from (URL, github.com/org/repo or org/repo)'))
    .addOption(new Option('-b, --branch <branch>', 'template branch to use instead of the default one'))
    .addOption(new Option('--offline', 'do not install dependencies from the network').conflicts('template'))
    .addOption(new Option('--no-deps', 'alias for --offline').conflicts('template'))
    .addOption(new Option('--force', 'create the project even if the root directory is not empty').conflicts('template'))
    .addOption(new Option('--vscode', 'write .vscode/settings.json and remappings.txt').conflicts('template'))
    .addOption(new Option('--vyper', 'create a Vyper project').conflicts('template'))
    .addOption(new Option('--shallow', 'perform shallow clones of submodules and dependencies'))
    .addOption(new Option('--no-git', 'do not create a git repository or install dependencies as submodules'))
    .addOption(new Option('--commit', 'commit the initial state of the project'))
    .addOption(new Option('-y, --yes', 'do not ask before replacing an existing repository with a template'))
    .action(async (root: string, options: CliOptions, command: Command) => {
      if (options.branch !== undefined && options.template === undefined) {
        command.error('error: option \'-b, --branch <branch>\' requires \'-t, --template <template>\'');
      }
      await run(toInitRequest(root, options));
    });
}

/**
 * Parses `argv`, runs initialization and turns failures into an exit code.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    handleInitError(error);
  }
}
