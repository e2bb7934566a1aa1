/**
 * Test Fixtures
 *
 * Builders for repository values and an in-memory gateway for driving the
 * executor and controller without git.
 *
 * @module cli/test/fixtures
 */

import type {
  Checkpoint,
  CheckpointCreated,
  RepositoryGateway,
  RepositoryState,
  RepositoryStatus,
  RewindError,
  SyncOutcome,
} from "@rewind/core";
import { Ok, type Result } from "@rewind/shared";

export function makeStatus(overrides: Partial<RepositoryStatus> = {}): RepositoryStatus {
  return {
    branch: "main",
    isClean: true,
    staged: [],
    modified: [],
    untracked: [],
    ahead: 0,
    behind: 0,
    lastCheckpoint: "Initial a1b2c3d",
    hasCommits: true,
    ...overrides,
  };
}

export function makeCheckpoint(
  hash: string,
  message: string,
  overrides: Partial<Checkpoint> = {}
): Checkpoint {
  return {
    hash,
    message,
    author: "Rewind",
    date: new Date(2024, 4, 6, 7, 8, 9),
    isCurrent: false,
    ...overrides,
  };
}

export function makeSyncOutcome(overrides: Partial<SyncOutcome> = {}): SyncOutcome {
  return {
    success: true,
    pulled: false,
    pushed: true,
    conflictAutoResolved: false,
    forcePushed: false,
    localOnly: false,
    message: "Already up to date, pushed successfully",
    ...overrides,
  };
}

type Answer<T> = Result<T, RewindError> | (() => Promise<Result<T, RewindError>>);

async function answer<T>(value: Answer<T>): Promise<Result<T, RewindError>> {
  return typeof value === "function" ? value() : value;
}

/**
 * Gateway answering every call from preset results. Calls are recorded as
 * `"<method>"` or `"<method>:<argument>"`.
 */
export class FakeGateway implements RepositoryGateway {
  readonly calls: string[] = [];

  status: Answer<RepositoryState> = Ok<RepositoryState>({ initialized: true, status: makeStatus() });
  checkpoint: Answer<CheckpointCreated> = Ok({
    hash: "a1b2c3d4e5f60718293a4b5c6d7e8f9012345678",
    summary: "Checkpoint saved: a1b2c3d",
  });
  history: Answer<Checkpoint[]> = Ok([]);
  rolledBack: Answer<string> = Ok("Rolled back to a1b2c3d");
  synced: Answer<SyncOutcome> = Ok(makeSyncOutcome());
  initialized: Answer<void> = Ok(undefined);

  loadStatus(): Promise<Result<RepositoryState, RewindError>> {
    this.calls.push("loadStatus");
    return answer(this.status);
  }

  createCheckpoint(message: string): Promise<Result<CheckpointCreated, RewindError>> {
    this.calls.push(`createCheckpoint:${message}`);
    return answer(this.checkpoint);
  }

  loadHistory(): Promise<Result<Checkpoint[], RewindError>> {
    this.calls.push("loadHistory");
    return answer(this.history);
  }

  rollback(identifier: string): Promise<Result<string, RewindError>> {
    this.calls.push(`rollback:${identifier}`);
    return answer(this.rolledBack);
  }

  sync(): Promise<Result<SyncOutcome, RewindError>> {
    this.calls.push("sync");
    return answer(this.synced);
  }

  initRepository(): Promise<Result<void, RewindError>> {
    this.calls.push("initRepository");
    return answer(this.initialized);
  }
}
