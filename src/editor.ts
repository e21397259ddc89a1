import fs from 'fs-extra';
import { join } from 'path';
import { writeIfAbsent } from './fsops.js';
import { findRemappings, renderRemappings } from './remappings.js';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/security.js';
import type { EditorSettings } from './types.js';

export const SOURCE_DIR_KEY = 'solidity.packageDefaultDependenciesContractsDirectory';
export const LIB_DIR_KEY = 'solidity.packageDefaultDependenciesDirectory';

/**
 * Thrown when an existing `.vscode/settings.json` cannot be used.
 * The file is never rewritten in that case.
 */
export class EditorSettingsError extends Error {
  constructor(readonly path: string, reason: string) {
    super(`Failed to read editor settings at ${path}: ${reason}`);
    this.name = 'EditorSettingsError';
  }
}

/**
 * Writes `remappings.txt` and merges the Solidity extension keys into
 * `.vscode/settings.json`.
 *
 * - `remappings.txt` is only written when it is missing and at least one
 *   library exists under `lib/`.
 * - Settings keys the user already has are left as they are.
 *
 * @throws {EditorSettingsError} When existing settings are not a JSON object
 */
export async function initEditorConfig(root: string): Promise<void> {
  const remappings = await findRemappings(root);
  if (remappings.length > 0) {
    const written = await writeIfAbsent(join(root, 'remappings.txt'), renderRemappings(remappings));
    if (written) {
      ui.info(`Wrote remappings.txt (${remappings.length} remapping(s))`);
    }
  }

  const vscodeDir = join(root, '.vscode');
  const settingsFile = join(vscodeDir, 'settings.json');
  const settings = await loadEditorSettings(vscodeDir, settingsFile);

  const merged = mergeEditorSettings(settings, {
    [SOURCE_DIR_KEY]: 'src',
    [LIB_DIR_KEY]: 'lib'
  });

  await fs.writeFile(settingsFile, serializeEditorSettings(merged));
  ui.info('Updated .vscode/settings.json');
}

/**
 * Returns `settings` with each key of `defaults` added if missing.
 */
export function mergeEditorSettings(
  settings: EditorSettings,
  defaults: EditorSettings
): EditorSettings {
  const merged: EditorSettings = { ...settings };
  for (const [key, value] of Object.entries(defaults)) {
    if (!Object.prototype.hasOwnProperty.call(merged, key)) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Two-space indented JSON with top-level keys sorted and a trailing newline.
 */
export function serializeEditorSettings(settings: EditorSettings): string {
  // fromEntries defines properties, so a "__proto__" key stays an own key
  const sorted: EditorSettings = Object.fromEntries(
    Object.keys(settings).sort().map(key => [key, settings[key]])
  );
  return `${JSON.stringify(sorted, null, 2)}\n`;
}

async function loadEditorSettings(vscodeDir: string, settingsFile: string): Promise<EditorSettings> {
  if (!(await fs.pathExists(vscodeDir))) {
    await fs.ensureDir(vscodeDir);
    return {};
  }
  if (!(await fs.pathExists(settingsFile))) {
    return {};
  }

  const raw = await fs.readFile(settingsFile, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new EditorSettingsError(settingsFile, ErrorUtils.extractErrorMessage(error));
  }

  if (!isSettingsObject(parsed)) {
    throw new EditorSettingsError(settingsFile, 'expected a JSON object');
  }
  return parsed;
}

function isSettingsObject(value: unknown): value is EditorSettings {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
