/**
 * Repository Types
 *
 * Values exchanged between the repository gateway and its callers.
 * All of them are plain immutable data; none hold a handle to the repository.
 *
 * @module git/types
 */

import type { Result } from "@rewind/shared";
import type { RewindError } from "../errors/types.js";

// =============================================================================
// Status
// =============================================================================

/**
 * Snapshot of the working tree and branch at load time.
 */
export interface RepositoryStatus {
  /** Current branch name (`master` when the repository has no commits yet) */
  readonly branch: string;
  /** Whether the working tree has no uncommitted differences */
  readonly isClean: boolean;
  /** Files with changes in the index */
  readonly staged: readonly string[];
  /** Tracked files changed in the working tree */
  readonly modified: readonly string[];
  /** Files git does not track yet */
  readonly untracked: readonly string[];
  /** Commits on the local branch that the upstream lacks */
  readonly ahead: number;
  /** Commits on the upstream that the local branch lacks */
  readonly behind: number;
  /** `"<subject> <short hash>"` of HEAD, or undefined when there are no commits */
  readonly lastCheckpoint?: string;
  /** False for a freshly initialized repository */
  readonly hasCommits: boolean;
}

/**
 * Outcome of loading status: either no repository exists at the working
 * directory, or one does and this is its status.
 */
export type RepositoryState =
  | { readonly initialized: false; readonly workDir: string }
  | { readonly initialized: true; readonly status: RepositoryStatus };

// =============================================================================
// Checkpoints
// =============================================================================

/**
 * A commit as shown in history. Built in bulk by a history load, never mutated.
 */
export interface Checkpoint {
  /** Full commit hash */
  readonly hash: string;
  /** Subject line of the commit message */
  readonly message: string;
  readonly author: string;
  readonly date: Date;
  /** True iff this commit was HEAD when history was loaded */
  readonly isCurrent: boolean;
}

/**
 * Result of creating a checkpoint.
 */
export interface CheckpointCreated {
  readonly hash: string;
  /** Human-readable summary, e.g. `Checkpoint saved: a1b2c3d` */
  readonly summary: string;
}

/**
 * Fixed identity used as author of commits the tool creates.
 */
export interface CommitIdentity {
  readonly name: string;
  readonly email: string;
}

// =============================================================================
// Sync
// =============================================================================

/**
 * Result of one synchronization attempt. Consumed immediately, never stored.
 */
export interface SyncOutcome {
  /** True unless the forced push failed (that case is reported as an error instead) */
  readonly success: true;
  /** Remote commits were integrated */
  readonly pulled: boolean;
  /** Local commits reached the remote (plain or forced) */
  readonly pushed: boolean;
  /** The pull failed and local state was committed to win over the remote */
  readonly conflictAutoResolved: boolean;
  /** A forced push replaced the remote branch */
  readonly forcePushed: boolean;
  /** No remote is configured; no network I/O was attempted */
  readonly localOnly: boolean;
  /** Combined human-readable notice */
  readonly message: string;
}

// =============================================================================
// Gateway
// =============================================================================

/**
 * The operations Rewind performs against a repository.
 *
 * Every method resolves to a Result and never rejects.
 */
export interface RepositoryGateway {
  /** Loads status, or reports that no repository exists at the working directory. */
  loadStatus(): Promise<Result<RepositoryState, RewindError>>;

  /** Stages every change and commits it with the given message. */
  createCheckpoint(message: string): Promise<Result<CheckpointCreated, RewindError>>;

  /** Lists commits reachable from HEAD, newest first. Empty when there are no commits. */
  loadHistory(): Promise<Result<Checkpoint[], RewindError>>;

  /**
   * Resets index, working tree and branch to the given commit.
   *
   * Destructive: uncommitted changes are discarded and commits after the
   * target become unreachable from the branch.
   */
  rollback(identifier: string): Promise<Result<string, RewindError>>;

  /**
   * Reconciles with the configured remote. Local state wins: on a failed pull
   * the working tree is committed and, if a plain push is rejected, force pushed.
   * Remote-only commits are lost in that case.
   */
  sync(): Promise<Result<SyncOutcome, RewindError>>;

  /** Creates an empty repository at the working directory. */
  initRepository(): Promise<Result<void, RewindError>>;
}
