import { execa } from 'execa';
import { resolve } from 'path';

export type GitOptions = {
  /** Use `--depth 1` for fetches, clones and submodule updates */
  shallow?: boolean;
  /** Per-command timeout in milliseconds */
  timeoutMs?: number;
};

export type SubmoduleUpdateOptions = {
  init?: boolean;
  recursive?: boolean;
  /** Do not fetch new objects from submodule remotes */
  noFetch?: boolean;
  /** Restrict the update to these paths */
  paths?: string[];
};

const NOTHING_TO_COMMIT = 'nothing to commit, working tree clean';

/**
 * Thin wrapper around the git CLI, bound to a single working directory.
 *
 * Construct one per run and pass it to each step; it holds no state beyond
 * its root and options.
 *
 * @example
 * ```typescript
 * const git = new Git('/path/to/project', { shallow: true });
 * if (!(await git.isInRepo())) {
 *   await git.init();
 * }
 * ```
 */
export class Git {
  readonly root: string;
  readonly shallow: boolean;
  private readonly timeoutMs: number;

  constructor(root: string, options: GitOptions = {}) {
    this.root = resolve(root);
    this.shallow = options.shallow ?? false;
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  async init(): Promise<void> {
    await this.run(['init']);
  }

  async isInRepo(): Promise<boolean> {
    const { exitCode, stdout } = await this.tryRun(['rev-parse', '--is-inside-work-tree']);
    return exitCode === 0 && stdout.trim() === 'true';
  }

  /**
   * True when HEAD resolves, i.e. the repository has at least one commit.
   */
  async hasCommits(): Promise<boolean> {
    const { exitCode } = await this.tryRun(['rev-parse', '--verify', '--quiet', 'HEAD']);
    return exitCode === 0;
  }

  /**
   * True when there are no staged, unstaged or untracked changes.
   */
  async isClean(): Promise<boolean> {
    const status = await this.run(['status', '--porcelain']);
    return status === '';
  }

  async fetch(shallow: boolean, remote: string, branch?: string): Promise<void> {
    const args = ['fetch'];
    if (shallow) {
      args.push('--no-tags', '--depth', '1');
    }
    args.push(remote);
    if (branch) {
      args.push(branch);
    }
    await this.run(args);
  }

  async commitHash(short: boolean, rev: string): Promise<string> {
    return this.run(['rev-parse', ...(short ? ['--short'] : []), rev]);
  }

  /**
   * Creates a parentless commit object for `tree` and returns its hash.
   */
  async commitTree(tree: string, message: string): Promise<string> {
    return this.run(['commit-tree', tree, '-m', message]);
  }

  async reset(hard: boolean, rev: string): Promise<void> {
    await this.run(['reset', ...(hard ? ['--hard'] : []), rev]);
  }

  async submoduleInit(): Promise<void> {
    await this.run(['submodule', 'init']);
  }

  async submoduleUpdate(options: SubmoduleUpdateOptions = {}): Promise<void> {
    const args = ['submodule', 'update'];
    if (this.shallow) args.push('--depth', '1');
    if (options.init) args.push('--init');
    if (options.noFetch) args.push('--no-fetch');
    if (options.recursive) args.push('--recursive');
    if (options.paths?.length) args.push('--', ...options.paths);
    await this.run(args);
  }

  async submoduleAdd(url: string, path: string): Promise<void> {
    await this.run([
      'submodule', 'add',
      ...(this.shallow ? ['--depth', '1'] : []),
      url, path
    ]);
  }

  /**
   * Clones `url` into `path`, relative to the root.
   */
  async clone(url: string, path: string): Promise<void> {
    await this.run(['clone', ...(this.shallow ? ['--depth', '1'] : []), url, path]);
  }

  async addAll(): Promise<void> {
    await this.run(['add', '--all']);
  }

  async add(paths: string[]): Promise<void> {
    await this.run(['add', '--', ...paths]);
  }

  /**
   * Commits staged changes. An empty commit attempt is not an error.
   */
  async commit(message: string): Promise<void> {
    const result = await this.tryRun(['commit', '-m', message]);
    if (result.exitCode === 0) return;

    if (result.stdout.includes(NOTHING_TO_COMMIT) || result.stderr.includes(NOTHING_TO_COMMIT)) {
      return;
    }
    throw new Error(
      `git commit failed with exit code ${result.exitCode}: ${result.stderr.trim() || result.stdout.trim()}`
    );
  }

  /**
   * Top-level directory of the enclosing work tree, or undefined outside one.
   * Differs from `root` when `root` sits inside an existing repository.
   */
  async topLevel(): Promise<string | undefined> {
    const { exitCode, stdout } = await this.tryRun(['rev-parse', '--show-toplevel']);
    return exitCode === 0 ? stdout.trim() : undefined;
  }

  private async run(args: string[]): Promise<string> {
    const { stdout } = await execa('git', ['-C', this.root, ...args], {
      shell: false, // Explicitly disable shell interpretation
      timeout: this.timeoutMs
    });
    return stdout.trim();
  }

  private async tryRun(args: string[]): Promise<{ exitCode: number; stdout: string; stderr: string }> {
    const result = await execa('git', ['-C', this.root, ...args], {
      shell: false,
      timeout: this.timeoutMs,
      reject: false
    });
    return {
      exitCode: result.exitCode ?? 1,
      stdout: result.stdout,
      stderr: result.stderr
    };
  }
}
