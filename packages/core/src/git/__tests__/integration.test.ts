/**
 * Integration tests for GitRepositoryGateway with REAL git operations.
 *
 * Each test works in a fresh temporary directory with a local bare
 * repository as the remote. Skipped when no git binary is available.
 *
 * @see packages/core/src/git/gateway.ts
 * @see packages/core/src/git/sync.ts
 */

import { spawnSync } from "node:child_process";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { type SimpleGit, simpleGit } from "simple-git";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ErrorCode } from "../../errors/types.js";
import { GitRepositoryGateway } from "../gateway.js";
import { getGitConfig } from "../safety.js";

// =============================================================================
// Test Helpers
// =============================================================================

const hasGit = spawnSync("git", ["--version"]).status === 0;

async function createFile(dir: string, relativePath: string, content: string): Promise<void> {
  const fullPath = path.join(dir, relativePath);
  await fs.mkdir(path.dirname(fullPath), { recursive: true });
  await fs.writeFile(fullPath, content, "utf-8");
}

async function readFile(dir: string, relativePath: string): Promise<string> {
  return await fs.readFile(path.join(dir, relativePath), "utf-8");
}

/**
 * simple-git for test-side setup, with the same identity and signing config
 * the gateway uses.
 */
function testGit(dir: string): SimpleGit {
  return simpleGit({ baseDir: dir, config: getGitConfig() });
}

async function currentBranch(dir: string): Promise<string> {
  const status = await testGit(dir).status();
  return status.current ?? "master";
}

// =============================================================================
// Integration Tests
// =============================================================================

describe.skipIf(!hasGit)("GitRepositoryGateway Integration", () => {
  let root: string;
  let workDir: string;
  let gateway: GitRepositoryGateway;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "rewind-git-test-"));
    workDir = path.join(root, "work");
    await fs.mkdir(workDir);
    gateway = new GitRepositoryGateway(workDir);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function initWithCheckpoint(message: string): Promise<void> {
    expect((await gateway.initRepository()).ok).toBe(true);
    await createFile(workDir, "notes.md", "first draft\n");
    expect((await gateway.createCheckpoint(message)).ok).toBe(true);
  }

  async function addBareRemote(): Promise<string> {
    const remoteDir = path.join(root, "remote.git");
    await fs.mkdir(remoteDir);
    await testGit(remoteDir).init(true);
    await testGit(workDir).addRemote("origin", remoteDir);
    return remoteDir;
  }

  // ===========================================================================
  // Repository lifecycle
  // ===========================================================================

  describe("repository lifecycle", () => {
    it("should report an uninitialized directory", async () => {
      const result = await gateway.loadStatus();

      expect(result).toEqual({ ok: true, value: { initialized: false, workDir } });
    });

    it("should initialize a repository without commits", async () => {
      expect((await gateway.initRepository()).ok).toBe(true);

      const status = await gateway.loadStatus();
      expect(status.ok && status.value.initialized && status.value.status.hasCommits).toBe(false);

      const history = await gateway.loadHistory();
      expect(history).toEqual({ ok: true, value: [] });

      const again = await gateway.initRepository();
      expect(!again.ok && again.error.code).toBe(ErrorCode.REPO_ALREADY_EXISTS);
    });
  });

  // ===========================================================================
  // Checkpoints and history
  // ===========================================================================

  describe("checkpoints", () => {
    it("should list a new checkpoint first and current", async () => {
      await initWithCheckpoint("Initial notes");
      await createFile(workDir, "notes.md", "second draft\n");

      const created = await gateway.createCheckpoint("Second draft");
      const history = await gateway.loadHistory();

      expect(created.ok).toBe(true);
      expect(history.ok).toBe(true);
      if (created.ok && history.ok) {
        expect(history.value).toHaveLength(2);
        expect(history.value[0]?.message).toBe("Second draft");
        expect(history.value[0]?.isCurrent).toBe(true);
        expect(history.value[0]?.hash).toBe(created.value.hash);
        expect(history.value[0]?.author).toBe("Rewind");
        expect(history.value[1]?.isCurrent).toBe(false);
      }
    });

    it("should include untracked files and leave the tree clean", async () => {
      await initWithCheckpoint("Initial notes");
      await createFile(workDir, "src/new.ts", "export {};\n");

      await gateway.createCheckpoint("Add module");
      const status = await gateway.loadStatus();

      expect(status.ok).toBe(true);
      if (status.ok && status.value.initialized) {
        expect(status.value.status.isClean).toBe(true);
        expect(status.value.status.lastCheckpoint).toMatch(/^Add module [0-9a-f]{7}$/);
      }
    });

    it("should report untracked and modified files", async () => {
      await initWithCheckpoint("Initial notes");
      await createFile(workDir, "notes.md", "changed\n");
      await createFile(workDir, "todo.md", "new\n");

      const status = await gateway.loadStatus();

      expect(status.ok).toBe(true);
      if (status.ok && status.value.initialized) {
        expect(status.value.status.isClean).toBe(false);
        expect(status.value.status.modified).toEqual(["notes.md"]);
        expect(status.value.status.untracked).toEqual(["todo.md"]);
      }
    });
  });

  // ===========================================================================
  // Rollback
  // ===========================================================================

  describe("rollback", () => {
    it("should restore files and discard uncommitted changes", async () => {
      await initWithCheckpoint("Initial notes");
      const history = await gateway.loadHistory();
      const target = history.ok ? history.value[0]?.hash : undefined;
      await createFile(workDir, "notes.md", "second draft\n");
      await gateway.createCheckpoint("Second draft");
      await createFile(workDir, "notes.md", "uncommitted\n");

      expect(target).toBeDefined();
      const result = await gateway.rollback(target ?? "");

      expect(result.ok).toBe(true);
      expect(await readFile(workDir, "notes.md")).toBe("first draft\n");
      const after = await gateway.loadHistory();
      expect(after.ok && after.value.length).toBe(1);
    });

    it("should leave head and tree unchanged for an unknown checkpoint", async () => {
      await initWithCheckpoint("Initial notes");
      await createFile(workDir, "notes.md", "uncommitted\n");
      const before = await gateway.loadHistory();

      const result = await gateway.rollback("0000000000000000000000000000000000000000");

      expect(!result.ok && result.error.code).toBe(ErrorCode.CHECKPOINT_NOT_FOUND);
      expect(await readFile(workDir, "notes.md")).toBe("uncommitted\n");
      expect(await gateway.loadHistory()).toEqual(before);
    });
  });

  // ===========================================================================
  // Sync
  // ===========================================================================

  describe("sync", () => {
    it("should stay local without a remote", async () => {
      await initWithCheckpoint("Initial notes");

      const result = await gateway.sync();

      expect(result.ok && result.value.message).toBe(
        "No remote configured. This is a local-only repository."
      );
    });

    it("should publish to an empty remote and then be up to date", async () => {
      await initWithCheckpoint("Initial notes");
      const remoteDir = await addBareRemote();
      const branch = await currentBranch(workDir);

      const first = await gateway.sync();

      // The remote has no branch yet, so the pull fails and the tree is clean.
      expect(first.ok).toBe(true);
      if (first.ok) {
        expect(first.value.conflictAutoResolved).toBe(true);
        expect(first.value.pushed).toBe(true);
        expect(first.value.message).toBe("Conflicts resolved automatically, pushed successfully");
      }
      const localHead = await testGit(workDir).revparse(["HEAD"]);
      expect(await testGit(remoteDir).revparse([branch])).toBe(localHead);

      const second = await gateway.sync();

      expect(second.ok).toBe(true);
      if (second.ok) {
        expect(second.value.pulled).toBe(false);
        expect(second.value.pushed).toBe(false);
        expect(second.value.message).toBe("Already up to date");
      }
    });

    it("should count a pulled empty checkpoint as pulled", async () => {
      await initWithCheckpoint("Initial notes");
      const remoteDir = await addBareRemote();
      expect((await gateway.sync()).ok).toBe(true);

      // Another clone publishes a checkpoint that changes no files.
      const otherDir = path.join(root, "other");
      await testGit(root).clone(remoteDir, otherDir);
      const other = new GitRepositoryGateway(otherDir);
      expect((await other.createCheckpoint("Nothing changed")).ok).toBe(true);
      const published = await other.sync();
      expect(published.ok && published.value.message).toBe("Pushed successfully");
      const otherHead = await testGit(otherDir).revparse(["HEAD"]);

      const result = await gateway.sync();

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.pulled).toBe(true);
        expect(result.value.pushed).toBe(false);
        expect(result.value.message).toBe("Pulled successfully, already up to date on push");
      }
      expect(await testGit(workDir).revparse(["HEAD"])).toBe(otherHead);
    });

    it("should let local state win over conflicting remote commits", async () => {
      await initWithCheckpoint("Initial notes");
      const remoteDir = await addBareRemote();
      const branch = await currentBranch(workDir);
      expect((await gateway.sync()).ok).toBe(true);

      // Another clone pushes a conflicting change.
      const otherDir = path.join(root, "other");
      await testGit(root).clone(remoteDir, otherDir);
      await createFile(otherDir, "notes.md", "remote edit\n");
      await testGit(otherDir).add(["-A"]);
      await testGit(otherDir).commit("Remote edit");
      await testGit(otherDir).push("origin", branch);

      // Local commits a different change and leaves more work uncommitted.
      await createFile(workDir, "notes.md", "local edit\n");
      await gateway.createCheckpoint("Local edit");
      await createFile(workDir, "scratch.md", "unsaved\n");

      const result = await gateway.sync();

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.conflictAutoResolved).toBe(true);
        expect(result.value.forcePushed).toBe(true);
        expect(result.value.message).toBe(
          "Conflicts resolved automatically, force pushed successfully"
        );
      }

      expect(await readFile(workDir, "notes.md")).toBe("local edit\n");
      const history = await gateway.loadHistory();
      expect(history.ok).toBe(true);
      if (history.ok) {
        expect(history.value[0]?.message).toMatch(
          /^Auto-resolve conflicts: \d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/
        );
        expect(history.value[0]?.author).toBe("Rewind Conflict Resolver");
        expect(history.value.map((entry) => entry.message)).not.toContain("Remote edit");
      }

      const localHead = await testGit(workDir).revparse(["HEAD"]);
      expect(await testGit(remoteDir).revparse([branch])).toBe(localHead);
    });
  });
});
