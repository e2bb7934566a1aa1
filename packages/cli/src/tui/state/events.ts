/**
 * Events and Commands
 *
 * Events enter the reducer; commands leave it. Every command the executor
 * runs answers with exactly one event.
 *
 * @module tui/state/events
 */

import type {
  Checkpoint,
  CheckpointCreated,
  RepositoryState,
  RewindError,
  SyncOutcome,
} from "@rewind/core";
import type { HistoryPurpose } from "./types.js";
import type { Key } from "./keys.js";

// =============================================================================
// Events (Discriminated Union)
// =============================================================================

/**
 * A key was pressed
 */
export interface KeyPressedEvent {
  readonly type: "KEY_PRESSED";
  readonly key: Key;
}

/**
 * Status finished loading, with or without a repository
 */
export interface StatusLoadedEvent {
  readonly type: "STATUS_LOADED";
  readonly state: RepositoryState;
}

/**
 * Suggestions are ready; description entry can open
 */
export interface DescriptionReadyEvent {
  readonly type: "DESCRIPTION_READY";
  readonly suggestions: readonly string[];
}

export interface CheckpointCreatedEvent {
  readonly type: "CHECKPOINT_CREATED";
  readonly result: CheckpointCreated;
}

export interface HistoryLoadedEvent {
  readonly type: "HISTORY_LOADED";
  readonly checkpoints: readonly Checkpoint[];
  readonly purpose: HistoryPurpose;
}

export interface RolledBackEvent {
  readonly type: "ROLLED_BACK";
  readonly summary: string;
}

export interface SyncCompletedEvent {
  readonly type: "SYNC_COMPLETED";
  readonly outcome: SyncOutcome;
}

export interface RepositoryInitializedEvent {
  readonly type: "REPOSITORY_INITIALIZED";
}

/**
 * A command failed. Carries the command type for logging.
 */
export interface OperationFailedEvent {
  readonly type: "OPERATION_FAILED";
  readonly operation: Command["type"];
  readonly error: RewindError;
}

export type AppEvent =
  | KeyPressedEvent
  | StatusLoadedEvent
  | DescriptionReadyEvent
  | CheckpointCreatedEvent
  | HistoryLoadedEvent
  | RolledBackEvent
  | SyncCompletedEvent
  | RepositoryInitializedEvent
  | OperationFailedEvent;

// =============================================================================
// Commands (Discriminated Union)
// =============================================================================

export type Command =
  | { readonly type: "LOAD_STATUS" }
  | { readonly type: "PREPARE_DESCRIPTION" }
  | { readonly type: "CREATE_CHECKPOINT"; readonly message: string }
  | { readonly type: "LOAD_HISTORY"; readonly purpose: HistoryPurpose }
  | { readonly type: "ROLLBACK"; readonly hash: string }
  | { readonly type: "SYNC" }
  | { readonly type: "INIT_REPOSITORY" }
  | { readonly type: "QUIT" };

/**
 * Reducer output: the next state and at most one command to run.
 */
export interface Transition<S> {
  readonly state: S;
  readonly command?: Command;
}
