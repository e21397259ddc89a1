import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, readFileSync, realpathSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import * as inquirerPrompts from '@inquirer/prompts';
import { DEFAULT_STD_LIB_URL, type Settings } from '../src/config.js';
import { LIB_DIR_KEY, SOURCE_DIR_KEY } from '../src/editor.js';
import { Git } from '../src/git.js';
import { InitRequestError, initProject, validateInitRequest } from '../src/init.js';
import { UserCancelledError } from '../src/prompts.js';
import { DirtyWorkingTreeError, INIT_COMMIT_MESSAGE, WORKFLOW_PATH } from '../src/repo.js';
import { NonEmptyDirectoryError } from '../src/scaffold.js';
import { ui } from '../src/ui.js';
import type { InitRequest } from '../src/types.js';
import { commitCount, createRepo, createTestDir, fileUrl, gitOutput, stubGitEnv } from './utils/index.js';

vi.mock('@inquirer/prompts');

describe('initProject', () => {
  let testDir: string;
  let root: string;
  let settings: Settings;

  const request = (overrides: Partial<InitRequest> = {}): InitRequest => ({
    root,
    offline: true,
    force: false,
    vscode: false,
    vyper: false,
    shallow: false,
    noGit: true,
    commit: false,
    ...overrides
  });

  beforeEach(() => {
    stubGitEnv();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    testDir = createTestDir('init-test', expect.getState().currentTestName);
    root = join(testDir, 'project');
    settings = { stdLibUrl: DEFAULT_STD_LIB_URL };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (testDir) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  describe('default mode', () => {
    test('creates the Solidity layout in a new directory', async () => {
      const result = await initProject(request(), { settings });

      expect(result).toEqual({ root: realpathSync(root), mode: 'default' });
      for (const path of ['src/Counter.sol', 'test/Counter.t.sol', 'script/Counter.s.sol', 'README.md', 'foundry.toml']) {
        expect(existsSync(join(root, path))).toBe(true);
      }
      expect(existsSync(join(root, '.git'))).toBe(false);
      expect(existsSync(join(root, '.gitignore'))).toBe(false);
    });

    test('creates the Vyper layout and ffi config', async () => {
      await initProject(request({ vyper: true }), { settings });

      expect(existsSync(join(root, 'src', 'Counter.vy'))).toBe(true);
      expect(existsSync(join(root, 'src', 'interface', 'ICounter.sol'))).toBe(true);
      expect(existsSync(join(root, 'src', 'utils', 'VyperDeployer.sol'))).toBe(true);
      expect(existsSync(join(root, 'src', 'Counter.sol'))).toBe(false);
      expect(readFileSync(join(root, 'foundry.toml'), 'utf8').split('\n')).toContain('ffi = true');
    });

    test('initializes git, installs the standard library and commits', async () => {
      const stdDir = join(testDir, 'forge-std');
      await createRepo(stdDir, { 'src/Test.sol': 'contract Test {}\n' });
      settings = { stdLibUrl: fileUrl(stdDir) };

      await initProject(request({ offline: false, noGit: false, commit: true }), { settings });

      const git = new Git(root);
      expect(existsSync(join(root, '.gitignore'))).toBe(true);
      expect(existsSync(join(root, WORKFLOW_PATH))).toBe(true);
      expect(readFileSync(join(root, 'lib', 'forge-std', 'src', 'Test.sol'), 'utf8')).toBe('contract Test {}\n');
      expect(await commitCount(root)).toBe(2);
      expect(await gitOutput(root, ['log', '--format=%s'])).toBe(
        `chore: install forge-std\n${INIT_COMMIT_MESSAGE}`
      );
      expect(await git.isClean()).toBe(true);
    });

    test('re-running never overwrites config, ignore or workflow files', async () => {
      await initProject(request({ noGit: false }), { settings });

      writeFileSync(join(root, 'foundry.toml'), '[profile.default]\nsrc = "contracts"\n');
      writeFileSync(join(root, '.gitignore'), 'custom/\n');
      writeFileSync(join(root, WORKFLOW_PATH), 'name: mine\n');

      await initProject(request({ noGit: false, force: true }), { settings });

      expect(readFileSync(join(root, 'foundry.toml'), 'utf8')).toBe('[profile.default]\nsrc = "contracts"\n');
      expect(readFileSync(join(root, '.gitignore'), 'utf8')).toBe('custom/\n');
      expect(readFileSync(join(root, WORKFLOW_PATH), 'utf8')).toBe('name: mine\n');
    });

    test('refuses a non-empty directory before writing anything', async () => {
      mkdirSync(root);
      writeFileSync(join(root, 'notes.txt'), 'x');

      await expect(initProject(request(), { settings })).rejects.toBeInstanceOf(NonEmptyDirectoryError);

      expect(existsSync(join(root, 'src'))).toBe(false);
      expect(existsSync(join(root, 'foundry.toml'))).toBe(false);
    });

    test('warns and continues in a non-empty directory with force', async () => {
      const warning = vi.spyOn(ui, 'forceNonEmpty');
      mkdirSync(root);
      writeFileSync(join(root, 'notes.txt'), 'x');

      await initProject(request({ force: true }), { settings });

      expect(warning).toHaveBeenCalledOnce();
      expect(readFileSync(join(root, 'notes.txt'), 'utf8')).toBe('x');
      expect(existsSync(join(root, 'src', 'Counter.sol'))).toBe(true);
    });

    test('refuses to commit into a dirty enclosing repository', async () => {
      const parent = join(testDir, 'parent');
      await createRepo(parent, { 'README.md': 'x\n' });
      writeFileSync(join(parent, 'scratch.txt'), 'x');
      root = join(parent, 'project');

      await expect(
        initProject(request({ noGit: false, commit: true }), { settings })
      ).rejects.toBeInstanceOf(DirtyWorkingTreeError);

      expect(existsSync(join(root, 'src'))).toBe(false);
    });

    test('installs and commits inside a clean enclosing repository', async () => {
      const parent = join(testDir, 'parent');
      await createRepo(parent, { 'README.md': 'x\n' });
      const stdDir = join(testDir, 'forge-std');
      await createRepo(stdDir, { 'src/Test.sol': 'contract Test {}\n' });
      settings = { stdLibUrl: fileUrl(stdDir) };
      root = join(parent, 'project');

      await initProject(request({ offline: false, noGit: false, commit: true }), { settings });

      expect(existsSync(join(root, '.git'))).toBe(false);
      expect(existsSync(join(root, 'lib', 'forge-std', 'src', 'Test.sol'))).toBe(true);
      expect(readFileSync(join(parent, '.gitmodules'), 'utf8')).toContain('path = project/lib/forge-std');
      expect(await gitOutput(parent, ['log', '--format=%s'])).toBe(
        `chore: install forge-std\n${INIT_COMMIT_MESSAGE}\ninitial`
      );
      expect(await new Git(root).isClean()).toBe(true);
    });

    test('skips the install when lib/forge-std already exists', async () => {
      const warning = vi.spyOn(ui, 'dependencyExists');
      mkdirSync(join(root, 'lib', 'forge-std', 'src'), { recursive: true });

      await initProject(request({ offline: false, noGit: false, force: true }), { settings });

      expect(warning).toHaveBeenCalledWith('lib/forge-std');
      expect(existsSync(join(root, '.gitmodules'))).toBe(false);
    });

    test('offline mode never installs', async () => {
      const installing = vi.spyOn(ui, 'installing');

      await initProject(request({ offline: true, noGit: false }), { settings });

      expect(installing).not.toHaveBeenCalled();
      expect(existsSync(join(root, 'lib'))).toBe(false);
    });

    test('writes editor settings when requested', async () => {
      await initProject(request({ vscode: true }), { settings });

      expect(JSON.parse(readFileSync(join(root, '.vscode', 'settings.json'), 'utf8'))).toEqual({
        [SOURCE_DIR_KEY]: 'src',
        [LIB_DIR_KEY]: 'lib'
      });
    });

    test('leaves partial state behind when a later step fails', async () => {
      settings = { stdLibUrl: fileUrl(join(testDir, 'forge-std')) };

      await expect(
        initProject(request({ offline: false, noGit: false }), { settings })
      ).rejects.toThrow(/Command failed/);

      expect(existsSync(join(root, 'src', 'Counter.sol'))).toBe(true);
      expect(existsSync(join(root, '.gitignore'))).toBe(true);
    });
  });

  describe('template mode', () => {
    let templateDir: string;
    let templateHead: string;

    beforeEach(async () => {
      vi.mocked(inquirerPrompts.confirm).mockReset();
      templateDir = join(testDir, 'template');
      templateHead = await createRepo(templateDir, {
        'foundry.toml': '[profile.default]\n',
        'src/Token.sol': 'contract Token {}\n'
      });
    });

    test('produces a single commit recording URL and source commit', async () => {
      const url = fileUrl(templateDir);

      const result = await initProject(request({ template: { reference: url } }), { settings, interactive: false });

      expect(result.mode).toBe('template');
      expect(await commitCount(root)).toBe(1);
      const message = await gitOutput(root, ['log', '-1', '--format=%B']);
      const sourceCommit = message.split(' at ')[1] ?? '';
      expect(message).toBe(`chore: init from ${url} at ${sourceCommit}`);
      expect(templateHead.startsWith(sourceCommit)).toBe(true);
      expect(readFileSync(join(root, 'src', 'Token.sol'), 'utf8')).toBe('contract Token {}\n');
      expect(existsSync(join(root, '.gitignore'))).toBe(false);
    });

    test('replaces existing history with a warning when not interactive', async () => {
      await createRepo(root, { 'OLD.md': 'old\n' });
      const warning = vi.spyOn(ui, 'existingRepository');

      await initProject(request({ template: { reference: fileUrl(templateDir) } }), { settings, interactive: false });

      expect(warning).toHaveBeenCalledWith(realpathSync(root));
      expect(await commitCount(root)).toBe(1);
      expect(existsSync(join(root, 'OLD.md'))).toBe(false);
      expect(inquirerPrompts.confirm).not.toHaveBeenCalled();
    });

    test('keeps existing history when the user declines', async () => {
      await createRepo(root, { 'OLD.md': 'old\n' });
      vi.mocked(inquirerPrompts.confirm).mockResolvedValue(false);

      await expect(
        initProject(request({ template: { reference: fileUrl(templateDir) } }), { settings, interactive: true })
      ).rejects.toBeInstanceOf(UserCancelledError);

      expect(await gitOutput(root, ['log', '--format=%s'])).toBe('initial');
      expect(existsSync(join(root, 'OLD.md'))).toBe(true);
    });

    test('--yes skips the question', async () => {
      await createRepo(root, { 'OLD.md': 'old\n' });

      await initProject(
        request({ template: { reference: fileUrl(templateDir) }, assumeYes: true }),
        { settings, interactive: true }
      );

      expect(inquirerPrompts.confirm).not.toHaveBeenCalled();
      expect(await commitCount(root)).toBe(1);
    });
  });

  describe('validateInitRequest', () => {
    test.each(['offline', 'force', 'vscode', 'vyper'] as const)('rejects --%s with a template', (flag) => {
      expect(() => validateInitRequest(request({ template: { reference: 'foo/bar' }, offline: false, [flag]: true })))
        .toThrow(new InitRequestError(`--template cannot be combined with --${flag}`));
    });

    test('rejects an empty template reference', () => {
      expect(() => validateInitRequest(request({ template: { reference: '  ' }, offline: false })))
        .toThrow('Template reference cannot be empty');
    });

    test('accepts default-mode flags without a template', () => {
      expect(() => validateInitRequest(request({ force: true, vscode: true, vyper: true }))).not.toThrow();
    });
  });
});
