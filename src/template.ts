import type { Git } from './git.js';
import type { TemplateDescriptor } from './types.js';
import { RemoteValidator, SecurityValidator } from './utils/security.js';

/**
 * Expands a template reference into a fetchable URL.
 *
 * - Anything containing `://` is returned unchanged.
 * - `github.com/org/repo` gets an `https://` prefix.
 * - Everything else is treated as `org/repo` on GitHub.
 *
 * @example
 * ```typescript
 * resolveTemplateUrl('foo/bar');            // 'https://github.com/foo/bar'
 * resolveTemplateUrl('github.com/foo/bar'); // 'https://github.com/foo/bar'
 * resolveTemplateUrl('https://example.com/x'); // unchanged
 * ```
 */
export function resolveTemplateUrl(reference: string): string {
  if (reference.includes('://')) {
    return reference;
  }
  if (reference.startsWith('github.com/')) {
    return `https://${reference}`;
  }
  return `https://github.com/${reference}`;
}

export function templateCommitMessage(url: string, commitHash: string): string {
  return `chore: init from ${url} at ${commitHash}`;
}

export type FetchedTemplate = {
  url: string;
  /** Short hash of the fetched template head */
  sourceCommit: string;
  /** Hash of the single commit the repository now has */
  commit: string;
};

/**
 * Fetches a template into `git.root` and collapses its history into one
 * parentless commit recording where it came from.
 *
 * The repository is initialized unconditionally, and the template is always
 * fetched with depth 1. When `shallow` is set submodules are only registered,
 * otherwise they are cloned recursively.
 *
 * @throws {Error} When the branch name or resolved URL is invalid
 * @throws {ExecaError} When any git step fails; the run stops there
 */
export async function fetchTemplate(
  git: Git,
  template: TemplateDescriptor,
  options: { shallow: boolean }
): Promise<FetchedTemplate> {
  if (template.branch !== undefined) {
    SecurityValidator.validateBranchName(template.branch);
  }
  const url = resolveTemplateUrl(template.reference);
  RemoteValidator.validateRemoteUrl(url);

  await git.init();
  await git.fetch(true, url, template.branch);

  const sourceCommit = await git.commitHash(true, 'FETCH_HEAD');
  const commit = await git.commitTree('FETCH_HEAD^{tree}', templateCommitMessage(url, sourceCommit));
  await git.reset(true, commit);

  if (options.shallow) {
    await git.submoduleInit();
  } else {
    await git.submoduleUpdate({ init: true, recursive: true, noFetch: true });
  }

  return { url, sourceCommit, commit };
}
