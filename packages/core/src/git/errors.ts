/**
 * Repository Error Factory Functions
 *
 * Each factory names the attempted action in its message so the interface
 * can show it without further context.
 *
 * @module git/errors
 */

import { ErrorCode, RewindError } from "../errors/types.js";

function describeCause(cause: unknown): string {
  if (cause instanceof Error && cause.message.trim() !== "") {
    return `: ${cause.message.trim()}`;
  }
  return "";
}

/**
 * The working directory is missing or unreadable.
 */
export function workDirUnavailableError(workDir: string, cause?: unknown): RewindError {
  return new RewindError(
    `Cannot use working directory ${workDir}${describeCause(cause)}`,
    ErrorCode.WORKDIR_UNAVAILABLE,
    { cause, context: { workDir } }
  );
}

/**
 * Git could not be run against the repository storage.
 */
export function repoOpenFailedError(workDir: string, cause?: unknown): RewindError {
  return new RewindError(
    `Failed to open repository in ${workDir}${describeCause(cause)}`,
    ErrorCode.REPO_OPEN_FAILED,
    { cause, context: { workDir } }
  );
}

/**
 * An operation needing a repository was attempted where none exists.
 *
 * @example
 * ```typescript
 * if (!isRoot) {
 *   return Err(repoNotFoundError(workDir));
 * }
 * ```
 */
export function repoNotFoundError(workDir: string): RewindError {
  return new RewindError(
    `No repository in ${workDir}. Initialize one to start saving checkpoints.`,
    ErrorCode.REPO_NOT_FOUND,
    { context: { workDir } }
  );
}

export function repoAlreadyExistsError(workDir: string): RewindError {
  return new RewindError(
    `A repository already exists in ${workDir}`,
    ErrorCode.REPO_ALREADY_EXISTS,
    { context: { workDir } }
  );
}

export function initFailedError(workDir: string, cause?: unknown): RewindError {
  return new RewindError(
    `Failed to initialize repository${describeCause(cause)}`,
    ErrorCode.INIT_FAILED,
    { cause, context: { workDir } }
  );
}

export function statusFailedError(cause?: unknown): RewindError {
  return new RewindError(`Failed to read status${describeCause(cause)}`, ErrorCode.STATUS_FAILED, {
    cause,
  });
}

export function stageFailedError(cause?: unknown): RewindError {
  return new RewindError(`Failed to stage changes${describeCause(cause)}`, ErrorCode.STAGE_FAILED, {
    cause,
  });
}

/**
 * Committing failed.
 *
 * @param purpose - What the commit was for, e.g. "checkpoint" or "conflict resolution"
 */
export function commitFailedError(purpose: string, cause?: unknown): RewindError {
  return new RewindError(
    `Failed to commit ${purpose}${describeCause(cause)}`,
    ErrorCode.COMMIT_FAILED,
    { cause, context: { purpose } }
  );
}

export function historyFailedError(cause?: unknown): RewindError {
  return new RewindError(
    `Failed to load history${describeCause(cause)}`,
    ErrorCode.HISTORY_FAILED,
    { cause }
  );
}

export function checkpointNotFoundError(identifier: string, cause?: unknown): RewindError {
  return new RewindError(
    `Checkpoint ${identifier} does not exist`,
    ErrorCode.CHECKPOINT_NOT_FOUND,
    { cause, context: { identifier } }
  );
}

export function resetFailedError(identifier: string, cause?: unknown): RewindError {
  return new RewindError(
    `Failed to roll back to ${identifier}${describeCause(cause)}`,
    ErrorCode.RESET_FAILED,
    { cause, context: { identifier } }
  );
}

/**
 * A merge left behind by a failed pull could not be aborted.
 */
export function mergeAbortFailedError(cause?: unknown): RewindError {
  return new RewindError(
    `Failed to abort interrupted merge${describeCause(cause)}`,
    ErrorCode.MERGE_ABORT_FAILED,
    { cause }
  );
}

/**
 * The forced push was rejected. The only fatal outcome of sync.
 */
export function pushFailedError(remote: string, cause?: unknown): RewindError {
  return new RewindError(
    `Failed to push to ${remote}${describeCause(cause)}`,
    ErrorCode.PUSH_FAILED,
    { cause, context: { remote } }
  );
}
