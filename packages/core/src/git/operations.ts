/**
 * Git Operations Module
 *
 * Low-level repository operations over simple-git. Every method runs with the
 * sanitized environment and fixed `-c` configuration from the safety module,
 * and returns a Result instead of throwing.
 *
 * @module git/operations
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  CheckRepoActions,
  ResetMode,
  type SimpleGit,
  type SimpleGitOptions,
  type StatusResult,
  simpleGit,
} from "simple-git";
import { Err, Ok, type Result } from "@rewind/shared";
import type { RewindError } from "../errors/types.js";
import {
  checkpointNotFoundError,
  commitFailedError,
  historyFailedError,
  initFailedError,
  mergeAbortFailedError,
  pushFailedError,
  repoOpenFailedError,
  resetFailedError,
  stageFailedError,
  statusFailedError,
  workDirUnavailableError,
} from "./errors.js";
import { formatIdentity, getGitConfig, getSanitizedEnv } from "./safety.js";
import type { CommitIdentity } from "./types.js";

/**
 * Messages git prints when HEAD does not point at a commit yet.
 */
const UNBORN_HEAD_PATTERN =
  /needed a single revision|unknown revision|ambiguous argument|does not have any commits/i;

/**
 * Working-tree status as read from git, before the last checkpoint is attached.
 */
export interface WorkingTreeStatus {
  readonly branch: string;
  readonly isClean: boolean;
  readonly staged: readonly string[];
  readonly modified: readonly string[];
  readonly untracked: readonly string[];
  readonly ahead: number;
  readonly behind: number;
}

/**
 * One commit from `git log`.
 */
export interface CommitEntry {
  readonly hash: string;
  readonly message: string;
  readonly author: string;
  readonly date: Date;
}

/**
 * Result of a pull or push: nothing transferred, or something did.
 */
export type TransferResult = "up-to-date" | "transferred";

/**
 * Maps a simple-git status into the lists Rewind shows.
 *
 * A file appears in `staged` when its index column is set and in `modified`
 * when its working-tree column is set; it may appear in both.
 */
export function toWorkingTreeStatus(result: StatusResult): WorkingTreeStatus {
  const staged: string[] = [];
  const modified: string[] = [];
  const untracked: string[] = [];

  for (const file of result.files) {
    if (file.index === "?" && file.working_dir === "?") {
      untracked.push(file.path);
      continue;
    }
    if (file.index !== " " && file.index !== "") {
      staged.push(file.path);
    }
    if (file.working_dir !== " " && file.working_dir !== "") {
      modified.push(file.path);
    }
  }

  return {
    branch: result.current ?? "HEAD",
    isClean: result.isClean(),
    staged,
    modified,
    untracked,
    ahead: result.ahead,
    behind: result.behind,
  };
}

/**
 * Low-level git operations bound to one working directory.
 *
 * @example
 * ```typescript
 * const opened = GitOperations.open("/path/to/project");
 * if (opened.ok) {
 *   const status = await opened.value.status();
 * }
 * ```
 */
export class GitOperations {
  private readonly git: SimpleGit;

  /** Absolute path of the working directory */
  readonly workDir: string;

  private constructor(workDir: string, git: SimpleGit) {
    this.workDir = workDir;
    this.git = git;
  }

  /**
   * Binds operations to a working directory. Fails with WORKDIR_UNAVAILABLE
   * when the directory does not exist; a missing repository is not an error
   * at this point.
   */
  static open(workDir: string): Result<GitOperations, RewindError> {
    const resolved = path.resolve(workDir);

    try {
      if (!fs.statSync(resolved).isDirectory()) {
        return Err(workDirUnavailableError(resolved, new Error("Not a directory")));
      }
    } catch (error) {
      return Err(workDirUnavailableError(resolved, error));
    }

    const options: Partial<SimpleGitOptions> = {
      baseDir: resolved,
      binary: "git",
      maxConcurrentProcesses: 1,
      trimmed: true,
      config: getGitConfig(),
    };

    try {
      return Ok(new GitOperations(resolved, simpleGit(options).env(getSanitizedEnv())));
    } catch (error) {
      return Err(workDirUnavailableError(resolved, error));
    }
  }

  /**
   * Whether the working directory is the top level of a repository.
   * A subdirectory of some other repository does not count.
   */
  async isRepositoryRoot(): Promise<Result<boolean, RewindError>> {
    try {
      return Ok(await this.git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT));
    } catch (error) {
      return Err(repoOpenFailedError(this.workDir, error));
    }
  }

  /**
   * Runs `git init` in the working directory.
   */
  async init(): Promise<Result<void, RewindError>> {
    try {
      await this.git.init();
      return Ok(undefined);
    } catch (error) {
      return Err(initFailedError(this.workDir, error));
    }
  }

  async status(): Promise<Result<WorkingTreeStatus, RewindError>> {
    try {
      return Ok(toWorkingTreeStatus(await this.git.status()));
    } catch (error) {
      return Err(statusFailedError(error));
    }
  }

  /**
   * Full hash of HEAD, or null while the current branch has no commits.
   */
  async head(): Promise<Result<string | null, RewindError>> {
    try {
      return Ok(await this.git.revparse(["--verify", "HEAD"]));
    } catch (error) {
      if (error instanceof Error && UNBORN_HEAD_PATTERN.test(error.message)) {
        return Ok(null);
      }
      return Err(statusFailedError(error));
    }
  }

  /**
   * Commits reachable from HEAD, newest first.
   *
   * @param maxCount - Limit on the number of entries
   */
  async log(maxCount?: number): Promise<Result<CommitEntry[], RewindError>> {
    try {
      const result = await this.git.log(
        maxCount === undefined ? { strictDate: true } : { strictDate: true, maxCount }
      );
      return Ok(
        result.all.map((entry) => ({
          hash: entry.hash,
          message: entry.message,
          author: entry.author_name,
          date: new Date(entry.date),
        }))
      );
    } catch (error) {
      return Err(historyFailedError(error));
    }
  }

  /**
   * Stages additions, modifications and deletions across the working tree.
   */
  async stageAll(): Promise<Result<void, RewindError>> {
    try {
      await this.git.add(["-A"]);
      return Ok(undefined);
    } catch (error) {
      return Err(stageFailedError(error));
    }
  }

  /**
   * Commits the index and returns the full hash of the new commit.
   * Empty commits are allowed.
   *
   * @param purpose - Named in the error message on failure
   */
  async commit(
    message: string,
    author: CommitIdentity,
    purpose = "checkpoint"
  ): Promise<Result<string, RewindError>> {
    try {
      await this.git.commit(message, undefined, {
        "--allow-empty": null,
        "--author": formatIdentity(author),
      });
      return Ok(await this.git.revparse(["--verify", "HEAD"]));
    } catch (error) {
      return Err(commitFailedError(purpose, error));
    }
  }

  /**
   * Resolves an identifier (full or abbreviated hash, ref name) to the full
   * hash of a commit.
   */
  async resolveCommit(identifier: string): Promise<Result<string, RewindError>> {
    if (identifier.trim() === "" || identifier.startsWith("-")) {
      return Err(checkpointNotFoundError(identifier));
    }
    try {
      return Ok(await this.git.revparse(["--verify", `${identifier}^{commit}`]));
    } catch (error) {
      return Err(checkpointNotFoundError(identifier, error));
    }
  }

  /**
   * `git reset --hard <hash>`. Discards uncommitted changes.
   */
  async resetHard(hash: string): Promise<Result<void, RewindError>> {
    try {
      await this.git.reset(ResetMode.HARD, [hash]);
      return Ok(undefined);
    } catch (error) {
      return Err(resetFailedError(hash, error));
    }
  }

  async hasRemote(name: string): Promise<Result<boolean, RewindError>> {
    try {
      const remotes = await this.git.getRemotes();
      return Ok(remotes.some((remote) => remote.name === name));
    } catch (error) {
      return Err(repoOpenFailedError(this.workDir, error));
    }
  }

  /**
   * Fetches and merges `remote/branch` into the current branch.
   *
   * Fails on conflicts, divergent histories and network errors alike. A pull
   * counts as transferred when HEAD moved, even if no file changed (empty
   * checkpoints).
   */
  async pull(remote: string, branch: string): Promise<Result<TransferResult, Error>> {
    const before = await this.head();
    if (!before.ok) {
      return before;
    }

    try {
      const result = await this.git.pull(remote, branch, {
        "--no-rebase": null,
        "--no-edit": null,
      });
      const after = await this.head();
      if (!after.ok) {
        return after;
      }
      const changedFiles = result.files.length > 0 || result.summary.changes > 0;
      return Ok(changedFiles || after.value !== before.value ? "transferred" : "up-to-date");
    } catch (error) {
      return Err(error instanceof Error ? error : new Error(String(error)));
    }
  }

  /**
   * Aborts a merge a failed pull left in progress, restoring the pre-pull
   * state. Resolves to false when no merge was in progress.
   */
  async abortMerge(): Promise<Result<boolean, RewindError>> {
    try {
      const gitDir = await this.git.revparse(["--absolute-git-dir"]);
      if (!fs.existsSync(path.join(gitDir, "MERGE_HEAD"))) {
        return Ok(false);
      }
      await this.git.raw(["merge", "--abort"]);
      return Ok(true);
    } catch (error) {
      return Err(mergeAbortFailedError(error));
    }
  }

  /**
   * Pushes the current branch to `remote/branch`, optionally with `--force`.
   */
  async push(
    remote: string,
    branch: string,
    options: { force?: boolean } = {}
  ): Promise<Result<TransferResult, RewindError>> {
    try {
      const result = await this.git.push(remote, branch, options.force ? ["--force"] : []);
      const upToDate =
        result.pushed.length > 0 && result.pushed.every((item) => item.alreadyUpdated);
      return Ok(upToDate ? "up-to-date" : "transferred");
    } catch (error) {
      return Err(pushFailedError(remote, error));
    }
  }
}
