/**
 * Sync Protocol
 *
 * Reconciles the local branch with one remote without asking the user
 * anything. Local state always wins:
 *
 * 1. No remote configured: report local-only, touch nothing.
 * 2. Pull. A failed pull is treated as a conflict: any merge it left behind
 *    is aborted, then uncommitted changes are committed under the
 *    conflict-resolver identity.
 * 3. Push. A rejected push is retried once with `--force`, replacing the
 *    remote branch and dropping any commits only the remote had.
 *
 * Only a failed forced push (or failing to record the local state before it)
 * is reported as an error.
 *
 * Any rejection other than "up to date" triggers the forced push, including
 * rejections unrelated to divergence such as a permission error.
 *
 * @module git/sync
 */

import { Err, Ok, type Result } from "@rewind/shared";
import type { RewindError } from "../errors/types.js";
import type { Logger } from "../logger/logger.js";
import { formatTimestamp } from "./format.js";
import type { TransferResult, WorkingTreeStatus } from "./operations.js";
import { CONFLICT_RESOLVER_IDENTITY } from "./safety.js";
import type { CommitIdentity, SyncOutcome } from "./types.js";

/**
 * Notice texts composed into {@link SyncOutcome.message}.
 */
export const SYNC_MESSAGES = {
  noRemote: "No remote configured. This is a local-only repository.",
  upToDate: "Already up to date",
  conflictsResolved: "Conflicts resolved automatically",
  pulled: "Pulled successfully",
  pushUpToDateSuffix: ", already up to date on push",
  forcePushedSuffix: ", force pushed successfully",
  pushedSuffix: ", pushed successfully",
  forcePushed: "Force pushed successfully",
  pushed: "Pushed successfully",
} as const;

/**
 * The repository operations sync needs. {@link GitOperations} satisfies it.
 */
export interface SyncPort {
  hasRemote(name: string): Promise<Result<boolean, RewindError>>;
  status(): Promise<Result<WorkingTreeStatus, RewindError>>;
  pull(remote: string, branch: string): Promise<Result<TransferResult, Error>>;
  abortMerge(): Promise<Result<boolean, RewindError>>;
  stageAll(): Promise<Result<void, RewindError>>;
  commit(
    message: string,
    author: CommitIdentity,
    purpose?: string
  ): Promise<Result<string, RewindError>>;
  push(
    remote: string,
    branch: string,
    options?: { force?: boolean }
  ): Promise<Result<TransferResult, RewindError>>;
}

export interface SyncOptions {
  /** Remote name, normally `origin` */
  remote: string;
  /** Clock for the conflict commit message */
  now?: () => Date;
  logger?: Logger;
}

/**
 * Message of the commit recording local state after a failed pull.
 */
export function conflictCommitMessage(at: Date): string {
  return `Auto-resolve conflicts: ${formatTimestamp(at)}`;
}

/**
 * Appends the push result to the pull notice. A pull notice of exactly
 * "Already up to date" is replaced rather than extended.
 */
function composePushNotice(pullNotice: string, push: "up-to-date" | "pushed" | "forced"): string {
  const pullWasUpToDate = pullNotice === SYNC_MESSAGES.upToDate;

  switch (push) {
    case "up-to-date":
      return pullWasUpToDate ? pullNotice : pullNotice + SYNC_MESSAGES.pushUpToDateSuffix;
    case "forced":
      return pullWasUpToDate
        ? SYNC_MESSAGES.forcePushed
        : pullNotice + SYNC_MESSAGES.forcePushedSuffix;
    case "pushed":
      return pullWasUpToDate ? SYNC_MESSAGES.pushed : pullNotice + SYNC_MESSAGES.pushedSuffix;
  }
}

/**
 * Runs one sync attempt.
 *
 * @example
 * ```typescript
 * const result = await runSync(ops, { remote: "origin" });
 * if (result.ok) {
 *   console.log(result.value.message); // "Pulled successfully, pushed successfully"
 * }
 * ```
 */
export async function runSync(
  port: SyncPort,
  options: SyncOptions
): Promise<Result<SyncOutcome, RewindError>> {
  const { remote, logger } = options;
  const now = options.now ?? (() => new Date());

  const remoteExists = await port.hasRemote(remote);
  if (!remoteExists.ok) {
    return remoteExists;
  }
  if (!remoteExists.value) {
    logger?.debug("Sync skipped: no remote", { remote });
    return Ok({
      success: true,
      pulled: false,
      pushed: false,
      conflictAutoResolved: false,
      forcePushed: false,
      localOnly: true,
      message: SYNC_MESSAGES.noRemote,
    });
  }

  const before = await port.status();
  if (!before.ok) {
    return before;
  }
  const branch = before.value.branch;

  // Pull
  let pulled = false;
  let conflictAutoResolved = false;
  let notice: string;

  logger?.debug("Pulling", { remote, branch });
  const pull = await port.pull(remote, branch);

  if (pull.ok) {
    pulled = pull.value === "transferred";
    notice = pulled ? SYNC_MESSAGES.pulled : SYNC_MESSAGES.upToDate;
    logger?.debug("Pull finished", { pulled });
  } else {
    logger?.warn("Pull failed, keeping local state", { remote, error: pull.error.message });

    const aborted = await port.abortMerge();
    if (!aborted.ok) {
      return aborted;
    }

    const current = await port.status();
    if (!current.ok) {
      return current;
    }

    if (!current.value.isClean) {
      const staged = await port.stageAll();
      if (!staged.ok) {
        return staged;
      }
      const committed = await port.commit(
        conflictCommitMessage(now()),
        CONFLICT_RESOLVER_IDENTITY,
        "conflict resolution"
      );
      if (!committed.ok) {
        return committed;
      }
      logger?.info("Recorded local state after failed pull", { commit: committed.value });
    }

    conflictAutoResolved = true;
    notice = SYNC_MESSAGES.conflictsResolved;
  }

  // Push
  let pushed = false;
  let forcePushed = false;

  logger?.debug("Pushing", { remote, branch });
  const push = await port.push(remote, branch);

  if (push.ok) {
    pushed = push.value === "transferred";
    notice = composePushNotice(notice, pushed ? "pushed" : "up-to-date");
  } else {
    logger?.warn("Push rejected, forcing", { remote, error: push.error.message });

    const forced = await port.push(remote, branch, { force: true });
    if (!forced.ok) {
      logger?.error("Forced push failed", { remote, error: forced.error.message });
      return Err(forced.error);
    }

    pushed = true;
    forcePushed = true;
    notice = composePushNotice(notice, "forced");
  }

  logger?.info("Sync finished", { pulled, pushed, conflictAutoResolved, forcePushed });

  return Ok({
    success: true,
    pulled,
    pushed,
    conflictAutoResolved,
    forcePushed,
    localOnly: false,
    message: notice,
  });
}
