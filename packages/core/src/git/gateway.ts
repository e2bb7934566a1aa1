/**
 * Git Repository Gateway
 *
 * Implements {@link RepositoryGateway} for one working directory. The
 * directory is reopened for every operation, so a repository created or
 * removed outside Rewind is picked up on the next call.
 *
 * @module git/gateway
 */

import { Err, Ok, type Result } from "@rewind/shared";
import { ErrorCode, type RewindError } from "../errors/types.js";
import type { Logger } from "../logger/logger.js";
import { repoAlreadyExistsError, repoNotFoundError } from "./errors.js";
import { firstLine, shortHash } from "./format.js";
import { GitOperations } from "./operations.js";
import { CHECKPOINT_IDENTITY } from "./safety.js";
import { runSync } from "./sync.js";
import type {
  Checkpoint,
  CheckpointCreated,
  RepositoryGateway,
  RepositoryState,
  SyncOutcome,
} from "./types.js";

/** Message used when a checkpoint is confirmed with an empty description */
export const DEFAULT_CHECKPOINT_MESSAGE = "Checkpoint without description";

export interface GitRepositoryGatewayOptions {
  /** Remote used by sync */
  remote?: string;
  logger?: Logger;
  /** Clock for conflict-resolution commit messages */
  now?: () => Date;
}

export class GitRepositoryGateway implements RepositoryGateway {
  readonly workDir: string;
  private readonly remote: string;
  private readonly logger?: Logger;
  private readonly now?: () => Date;

  constructor(workDir: string, options: GitRepositoryGatewayOptions = {}) {
    this.workDir = workDir;
    this.remote = options.remote ?? "origin";
    this.logger = options.logger?.child({ component: "gateway" });
    this.now = options.now;
  }

  async loadStatus(): Promise<Result<RepositoryState, RewindError>> {
    const opened = GitOperations.open(this.workDir);
    if (!opened.ok) {
      return opened;
    }
    const ops = opened.value;

    const isRoot = await ops.isRepositoryRoot();
    if (!isRoot.ok) {
      return isRoot;
    }
    if (!isRoot.value) {
      this.logger?.debug("No repository", { workDir: ops.workDir });
      return Ok({ initialized: false, workDir: ops.workDir });
    }

    const tree = await ops.status();
    if (!tree.ok) {
      return tree;
    }
    const head = await ops.head();
    if (!head.ok) {
      return head;
    }

    let lastCheckpoint: string | undefined;
    if (head.value !== null) {
      const latest = await ops.log(1);
      if (!latest.ok) {
        return latest;
      }
      const [entry] = latest.value;
      if (entry) {
        lastCheckpoint = `${firstLine(entry.message)} ${shortHash(entry.hash)}`;
      }
    }

    this.logger?.debug("Status loaded", {
      branch: tree.value.branch,
      clean: tree.value.isClean,
      hasCommits: head.value !== null,
    });

    return Ok({
      initialized: true,
      status: {
        ...tree.value,
        lastCheckpoint,
        hasCommits: head.value !== null,
      },
    });
  }

  async createCheckpoint(message: string): Promise<Result<CheckpointCreated, RewindError>> {
    const ops = await this.openRepository();
    if (!ops.ok) {
      return ops;
    }

    const text = message.trim() === "" ? DEFAULT_CHECKPOINT_MESSAGE : message;

    const staged = await ops.value.stageAll();
    if (!staged.ok) {
      this.logger?.warn("Staging failed", { error: staged.error.message });
      return staged;
    }

    const committed = await ops.value.commit(text, CHECKPOINT_IDENTITY);
    if (!committed.ok) {
      this.logger?.warn("Commit failed", { error: committed.error.message });
      return committed;
    }

    this.logger?.info("Checkpoint created", { hash: committed.value });
    return Ok({
      hash: committed.value,
      summary: `Checkpoint saved: ${shortHash(committed.value)}`,
    });
  }

  async loadHistory(): Promise<Result<Checkpoint[], RewindError>> {
    const ops = await this.openRepository();
    if (!ops.ok) {
      return ops;
    }

    const head = await ops.value.head();
    if (!head.ok) {
      return head;
    }
    if (head.value === null) {
      return Ok([]);
    }
    const current = head.value;

    const entries = await ops.value.log();
    if (!entries.ok) {
      return entries;
    }

    this.logger?.debug("History loaded", { count: entries.value.length });
    return Ok(
      entries.value.map((entry) => ({
        hash: entry.hash,
        message: firstLine(entry.message),
        author: entry.author,
        date: entry.date,
        isCurrent: entry.hash === current,
      }))
    );
  }

  async rollback(identifier: string): Promise<Result<string, RewindError>> {
    const ops = await this.openRepository();
    if (!ops.ok) {
      return ops;
    }

    const resolved = await ops.value.resolveCommit(identifier);
    if (!resolved.ok) {
      this.logger?.warn("Rollback target not found", { identifier });
      return resolved;
    }

    const reset = await ops.value.resetHard(resolved.value);
    if (!reset.ok) {
      this.logger?.warn("Reset failed", { identifier, error: reset.error.message });
      return reset;
    }

    this.logger?.info("Rolled back", { hash: resolved.value });
    return Ok(`Rolled back to ${shortHash(resolved.value)}`);
  }

  async sync(): Promise<Result<SyncOutcome, RewindError>> {
    const ops = await this.openRepository();
    if (!ops.ok) {
      return ops;
    }

    const timer = this.logger?.time("sync");
    const outcome = await runSync(ops.value, {
      remote: this.remote,
      now: this.now,
      logger: this.logger?.child({ component: "sync" }),
    });
    timer?.end();
    return outcome;
  }

  async initRepository(): Promise<Result<void, RewindError>> {
    const opened = GitOperations.open(this.workDir);
    if (!opened.ok) {
      return opened;
    }

    const isRoot = await opened.value.isRepositoryRoot();
    if (!isRoot.ok) {
      return isRoot;
    }
    if (isRoot.value) {
      return Err(repoAlreadyExistsError(opened.value.workDir));
    }

    const created = await opened.value.init();
    if (!created.ok) {
      this.logger?.warn("Init failed", { error: created.error.message });
      return created;
    }

    this.logger?.info("Repository initialized", { workDir: opened.value.workDir });
    return Ok(undefined);
  }

  /**
   * Opens the working directory and requires it to be a repository root.
   */
  private async openRepository(): Promise<Result<GitOperations, RewindError>> {
    const opened = GitOperations.open(this.workDir);
    if (!opened.ok) {
      return opened;
    }

    const isRoot = await opened.value.isRepositoryRoot();
    if (!isRoot.ok) {
      return isRoot;
    }
    if (!isRoot.value) {
      return Err(repoNotFoundError(opened.value.workDir));
    }
    return opened;
  }
}

/**
 * Whether an error means "no repository here" rather than a failure.
 */
export function isRepositoryMissing(error: RewindError): boolean {
  return error.code === ErrorCode.REPO_NOT_FOUND;
}
