import { vi } from 'vitest';
import { execa } from 'execa';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { pathToFileURL } from 'url';

/**
 * Gives git a committer identity and lets submodules clone over file://
 * for the duration of a test.
 */
export function stubGitEnv(): void {
  vi.stubEnv('GIT_AUTHOR_NAME', 'Test User');
  vi.stubEnv('GIT_AUTHOR_EMAIL', 'test@test.com');
  vi.stubEnv('GIT_COMMITTER_NAME', 'Test User');
  vi.stubEnv('GIT_COMMITTER_EMAIL', 'test@test.com');
  vi.stubEnv('GIT_CONFIG_COUNT', '1');
  vi.stubEnv('GIT_CONFIG_KEY_0', 'protocol.file.allow');
  vi.stubEnv('GIT_CONFIG_VALUE_0', 'always');
}

/**
 * Creates a repository at `dir` with one commit holding `files`.
 *
 * @returns Full hash of that commit
 */
export async function createRepo(dir: string, files: Record<string, string>): Promise<string> {
  mkdirSync(dir, { recursive: true });
  await execa('git', ['init'], { cwd: dir });
  for (const [path, content] of Object.entries(files)) {
    mkdirSync(dirname(join(dir, path)), { recursive: true });
    writeFileSync(join(dir, path), content);
  }
  await execa('git', ['add', '--all'], { cwd: dir });
  await execa('git', ['commit', '-m', 'initial'], { cwd: dir });
  const { stdout } = await execa('git', ['rev-parse', 'HEAD'], { cwd: dir });
  return stdout.trim();
}

export function fileUrl(dir: string): string {
  return pathToFileURL(dir).href;
}

/**
 * Number of commits reachable from HEAD in `cwd`.
 */
export async function commitCount(cwd: string): Promise<number> {
  return Number(await gitOutput(cwd, ['rev-list', '--count', 'HEAD']));
}

export async function gitOutput(cwd: string, args: string[]): Promise<string> {
  const { stdout } = await execa('git', args, { cwd });
  return stdout.trim();
}
