/**
 * Git Safety Module
 *
 * Environment and per-invocation configuration applied to every git command
 * Rewind runs:
 * - No interactive prompts (credentials, editors, pagers, GPG passphrases)
 * - Untranslated git output, so messages can be recognized
 * - A fixed committer identity with signing disabled
 *
 * @module git/safety
 */

import type { CommitIdentity } from "./types.js";

/**
 * Identity used for checkpoints.
 */
export const CHECKPOINT_IDENTITY: CommitIdentity = {
  name: "Rewind",
  email: "rewind@local",
};

/**
 * Identity used for the commit sync makes when a pull fails.
 */
export const CONFLICT_RESOLVER_IDENTITY: CommitIdentity = {
  name: "Rewind Conflict Resolver",
  email: "rewind@local",
};

/**
 * Environment variables that would make git wait on a terminal the
 * interface owns.
 */
const INTERACTIVE_ENV_VARS = [
  "GIT_ASKPASS",
  "SSH_ASKPASS",
  "GPG_AGENT_INFO",
  "GPG_TTY",
  "GIT_EDITOR",
  "EDITOR",
  "VISUAL",
  "GIT_PAGER",
  "PAGER",
] as const;

/**
 * Formats an identity the way `git commit --author` takes it.
 *
 * @example
 * ```typescript
 * formatIdentity(CHECKPOINT_IDENTITY); // "Rewind <rewind@local>"
 * ```
 */
export function formatIdentity(identity: CommitIdentity): string {
  return `${identity.name} <${identity.email}>`;
}

/**
 * Returns a copy of the given environment with interactive helpers removed,
 * terminal prompts disabled and the C locale forced.
 *
 * SSH agent variables are kept: sync authenticates through them.
 */
export function getSanitizedEnv(
  source: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }

  for (const varName of INTERACTIVE_ENV_VARS) {
    delete env[varName];
  }

  env.GIT_TERMINAL_PROMPT = "0";
  env.LC_ALL = "C";
  env.LANG = "C";

  return env;
}

/**
 * Returns the `key=value` pairs passed to git with `-c` on every command.
 *
 * The committer is always the checkpoint identity; the author is chosen per
 * commit.
 */
export function getGitConfig(): string[] {
  return [
    "commit.gpgsign=false",
    "tag.gpgsign=false",
    `user.name=${CHECKPOINT_IDENTITY.name}`,
    `user.email=${CHECKPOINT_IDENTITY.email}`,
  ];
}
