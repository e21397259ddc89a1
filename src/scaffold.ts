import fs from 'fs-extra';
import { join } from 'path';
import type { AssetName, AssetStore } from './assets.js';
import { ensureDirs, isDirEmpty, writeIfAbsent } from './fsops.js';
import { findRemappings, formatRemapping } from './remappings.js';
import { ui } from './ui.js';
import type { Variant } from './types.js';

export const CONFIG_FILE_NAME = 'foundry.toml';

const CONFIG_DOCS_COMMENT =
  '# See more config options https://github.com/foundry-rs/foundry/blob/master/crates/config/README.md#all-options';

/**
 * Thrown when the target directory has content and `--force` was not given.
 */
export class NonEmptyDirectoryError extends Error {
  constructor(readonly root: string) {
    super(
      `Cannot run \`init\` on a non-empty directory: ${root}\n` +
      'Run with the `--force` flag to initialize regardless.'
    );
    this.name = 'NonEmptyDirectoryError';
  }
}

/**
 * Which asset lands where, relative to the project root.
 */
const SCAFFOLD_FILES: Record<Variant, Array<[AssetName, string]>> = {
  solidity: [
    ['test', 'test/Counter.t.sol'],
    ['script', 'script/Counter.s.sol'],
    ['readme', 'README.md'],
    ['contract', 'src/Counter.sol']
  ],
  vyper: [
    ['test', 'test/Counter.t.sol'],
    ['script', 'script/Counter.s.sol'],
    ['readme', 'README.md'],
    ['contract', 'src/Counter.vy'],
    ['interface', 'src/interface/ICounter.sol'],
    ['deployer', 'src/utils/VyperDeployer.sol']
  ]
};

const SCAFFOLD_DIRS: Record<Variant, string[]> = {
  solidity: ['src', 'test', 'script'],
  vyper: ['src', 'test', 'script', 'src/interface', 'src/utils']
};

/**
 * Fails before anything is written when `root` has entries and
 * `force` is not set. With `force` only a warning is printed.
 *
 * @throws {NonEmptyDirectoryError}
 */
export async function assertEmptyOrForced(root: string, force: boolean): Promise<void> {
  if (await isDirEmpty(root)) return;

  if (!force) {
    throw new NonEmptyDirectoryError(root);
  }
  ui.forceNonEmpty();
}

/**
 * Creates the directory layout and writes the variant's fixed files.
 * Those files are overwritten on every run.
 *
 * @returns Paths written, relative to `root`
 */
export async function scaffoldProject(
  root: string,
  variant: Variant,
  assets: AssetStore
): Promise<string[]> {
  await ensureDirs(root, SCAFFOLD_DIRS[variant]);

  const written: string[] = [];
  for (const [asset, path] of SCAFFOLD_FILES[variant]) {
    await fs.writeFile(join(root, path), assets.get(variant, asset));
    written.push(path);
  }
  return written;
}

/**
 * Writes `foundry.toml` unless one already exists.
 *
 * @returns true when the file was written
 */
export async function writeProjectConfig(root: string, variant: Variant): Promise<boolean> {
  const content = variant === 'vyper'
    ? renderVyperConfig()
    : await renderDefaultConfig(root);
  return writeIfAbsent(join(root, CONFIG_FILE_NAME), content);
}

/**
 * Fixed configuration for Vyper projects; `ffi` lets the deployer
 * helper shell out to the compiler.
 */
export function renderVyperConfig(): string {
  return [
    '[profile.default]',
    'src = "src"',
    'out = "out"',
    'libs = ["lib"]',
    'ffi = true',
    '',
    CONFIG_DOCS_COMMENT
  ].join('\n');
}

/**
 * Default profile for `root`. Libraries already present under `lib/`
 * are listed as remappings.
 */
export async function renderDefaultConfig(root: string): Promise<string> {
  const lines = [
    '[profile.default]',
    'src = "src"',
    'out = "out"',
    'libs = ["lib"]'
  ];

  const remappings = await findRemappings(root);
  if (remappings.length > 0) {
    lines.push('remappings = [');
    for (const remapping of remappings) {
      lines.push(`    ${JSON.stringify(formatRemapping(remapping))},`);
    }
    lines.push(']');
  }

  return `${lines.join('\n')}\n\n${CONFIG_DOCS_COMMENT}\n`;
}
