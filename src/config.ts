export const DEFAULT_STD_LIB_URL = 'https://github.com/foundry-rs/forge-std';

/**
 * Runtime settings read from the environment.
 */
export type Settings = {
  /** Repository installed as `lib/forge-std` */
  stdLibUrl: string;
  /** Per-command git timeout in milliseconds; undefined means no timeout */
  gitTimeoutMs?: number;
};

/**
 * Reads settings from environment variables.
 *
 * - `CONTRACT_INIT_STD_LIB_URL` - standard library repository
 * - `CONTRACT_INIT_GIT_TIMEOUT_MS` - git command timeout, ignored unless a positive integer
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const stdLibUrl = env.CONTRACT_INIT_STD_LIB_URL?.trim() || DEFAULT_STD_LIB_URL;

  const timeout = Number(env.CONTRACT_INIT_GIT_TIMEOUT_MS);
  const gitTimeoutMs = Number.isInteger(timeout) && timeout > 0 ? timeout : undefined;

  return { stdLibUrl, gitTimeoutMs };
}
