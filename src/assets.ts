import fs from 'fs-extra';
import { existsSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { Variant } from './types.js';

/** Logical names of the fixed files a skeleton is built from. */
export type AssetName =
  | 'contract'
  | 'interface'
  | 'deployer'
  | 'test'
  | 'script'
  | 'readme'
  | 'workflow'
  | 'gitignore';

/**
 * Template content keyed by variant and logical name.
 */
export interface AssetStore {
  /**
   * @throws {Error} When the variant has no such asset
   */
  get(variant: Variant, name: AssetName): string;
}

/**
 * Files under the templates directory, per variant.
 */
export const ASSET_MANIFEST: Record<Variant, Partial<Record<AssetName, string>>> = {
  solidity: {
    contract: 'solidity/Counter.sol',
    test: 'solidity/Counter.t.sol',
    script: 'solidity/Counter.s.sol',
    readme: 'solidity/README.md',
    workflow: 'solidity/workflow.yml',
    gitignore: 'common/gitignore'
  },
  vyper: {
    contract: 'vyper/Counter.vy',
    interface: 'vyper/ICounter.sol',
    deployer: 'vyper/VyperDeployer.sol',
    test: 'vyper/Counter.t.sol',
    script: 'vyper/Counter.s.sol',
    readme: 'vyper/README.md',
    workflow: 'vyper/workflow.yml',
    gitignore: 'common/gitignore'
  }
};

/**
 * Locates the `templates/` directory shipped next to the package,
 * whether running from `src/` or from the compiled `dist/src/`.
 */
export function resolveTemplatesDir(): string {
  const candidates = [
    fileURLToPath(new URL('../templates', import.meta.url)),
    fileURLToPath(new URL('../../templates', import.meta.url))
  ];
  const found = candidates.find(dir => existsSync(dir));
  if (!found) {
    throw new Error(`Template assets not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

/**
 * Reads every asset named in the manifest into memory.
 *
 * @param templatesDir - Directory holding the asset files
 */
export async function loadAssetStore(templatesDir: string = resolveTemplatesDir()): Promise<AssetStore> {
  const contents = new Map<string, string>();

  for (const entries of Object.values(ASSET_MANIFEST)) {
    for (const file of Object.values(entries)) {
      if (file && !contents.has(file)) {
        contents.set(file, await fs.readFile(join(templatesDir, file), 'utf8'));
      }
    }
  }

  return {
    get(variant, name) {
      const file = ASSET_MANIFEST[variant][name];
      const content = file === undefined ? undefined : contents.get(file);
      if (content === undefined) {
        throw new Error(`No "${name}" asset for the ${variant} variant`);
      }
      return content;
    }
  };
}
