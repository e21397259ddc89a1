/**
 * Template repository requested for template mode.
 *
 * @example
 * ```typescript
 * const template: TemplateDescriptor = {
 *   reference: 'my-org/contract-template',
 *   branch: 'v2'
 * };
 * ```
 */
export type TemplateDescriptor = {
  /** URL, `github.com/org/repo` or `org/repo` shorthand */
  reference: string;
  /** Branch to fetch instead of the remote's default */
  branch?: string;
};

/**
 * Source language of the generated skeleton.
 * `vyper` adds the interface and deployer helpers Vyper contracts need.
 */
export type Variant = 'solidity' | 'vyper';

/**
 * Everything a single initialization run needs.
 *
 * `template` is exclusive with `offline`, `force`, `vscode` and `vyper`.
 */
export type InitRequest = {
  /** Project root, created when missing */
  root: string;
  template?: TemplateDescriptor;
  /** Skip installing the standard library */
  offline: boolean;
  /** Initialize even when the root is not empty */
  force: boolean;
  /** Write `.vscode/settings.json` and `remappings.txt` */
  vscode: boolean;
  vyper: boolean;
  /** Shallow submodule and dependency fetches */
  shallow: boolean;
  /** Leave version control entirely to the caller */
  noGit: boolean;
  /** Commit the initial state */
  commit: boolean;
  /** Never prompt before re-initializing an existing repository */
  assumeYes?: boolean;
};

export type InitMode = 'template' | 'default';

export type InitResult = {
  /** Absolute project root */
  root: string;
  mode: InitMode;
};

/**
 * Compiler import alias, rendered as `alias=path`.
 *
 * @example
 * ```typescript
 * const remapping: Remapping = { alias: 'forge-std/', path: 'lib/forge-std/src/' };
 * ```
 */
export type Remapping = {
  alias: string;
  /** Relative to the project root, always ending in `/` */
  path: string;
};

/**
 * A dependency installed under `lib/<name>`.
 */
export type Dependency = {
  name: string;
  url: string;
};

/** Editor settings document; values are whatever JSON the user had. */
export type EditorSettings = Record<string, unknown>;
