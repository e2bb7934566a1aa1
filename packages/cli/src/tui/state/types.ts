/**
 * Application State
 *
 * The single snapshot of interface state. Only the reducer produces new
 * values; everything here is readonly.
 *
 * @module tui/state/types
 */

import type { Checkpoint, RepositoryStatus } from "@rewind/core";
import type { ErrorCategory } from "@rewind/shared";

/**
 * Active screen. Exactly one at a time.
 */
export type AppMode = "main" | "description" | "history";

/**
 * What is known about the repository at the working directory.
 *
 * - unknown: status has not been loaded yet
 * - unavailable: the first status load failed; only a reload is offered
 * - absent: no repository; only initialization is offered
 * - empty: a repository with no checkpoints yet
 * - ready: a repository with history
 */
export type RepositoryPresence = "unknown" | "unavailable" | "absent" | "empty" | "ready";

/**
 * Why history was opened. Both lead to rollback on confirm; only the
 * heading differs.
 */
export type HistoryPurpose = "browse" | "rollback";

/**
 * An error as shown to the user.
 */
export interface ErrorNotice {
  readonly message: string;
  readonly category: ErrorCategory;
}

export interface AppState {
  readonly mode: AppMode;
  /** While true, only a force quit is accepted */
  readonly loading: boolean;
  /** Progress label shown while loading */
  readonly loadingLabel: string;
  readonly repository: RepositoryPresence;
  /** Latest status, null before the first load or without a repository */
  readonly status: RepositoryStatus | null;
  /** Loaded history, null outside history mode; an empty list is a valid result */
  readonly checkpoints: readonly Checkpoint[] | null;
  readonly historyPurpose: HistoryPurpose;
  readonly menuIndex: number;
  readonly historyIndex: number;
  readonly draft: string;
  readonly suggestions: readonly string[];
  /** Success message from the last operation, cleared by the next key */
  readonly notice: string | null;
  /** Error from the last operation, cleared by the next key */
  readonly error: ErrorNotice | null;
  readonly quitting: boolean;
}
