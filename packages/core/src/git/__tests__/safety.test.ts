/**
 * Unit tests for the git safety module
 *
 * @see packages/core/src/git/safety.ts
 */

import { describe, expect, it } from "vitest";
import {
  CHECKPOINT_IDENTITY,
  CONFLICT_RESOLVER_IDENTITY,
  formatIdentity,
  getGitConfig,
  getSanitizedEnv,
} from "../safety.js";

describe("Safety Module", () => {
  describe("getSanitizedEnv()", () => {
    it("should remove interactive helpers", () => {
      const env = getSanitizedEnv({
        GIT_ASKPASS: "/usr/bin/askpass",
        SSH_ASKPASS: "/usr/bin/ssh-askpass",
        GIT_EDITOR: "vim",
        EDITOR: "nano",
        PAGER: "less",
        GPG_TTY: "/dev/pts/1",
      });

      expect(env.GIT_ASKPASS).toBeUndefined();
      expect(env.SSH_ASKPASS).toBeUndefined();
      expect(env.GIT_EDITOR).toBeUndefined();
      expect(env.EDITOR).toBeUndefined();
      expect(env.PAGER).toBeUndefined();
      expect(env.GPG_TTY).toBeUndefined();
    });

    it("should keep the SSH agent and unrelated variables", () => {
      const env = getSanitizedEnv({
        SSH_AUTH_SOCK: "/tmp/agent.sock",
        HOME: "/home/test",
        PATH: "/usr/bin",
      });

      expect(env.SSH_AUTH_SOCK).toBe("/tmp/agent.sock");
      expect(env.HOME).toBe("/home/test");
      expect(env.PATH).toBe("/usr/bin");
    });

    it("should disable terminal prompts and force the C locale", () => {
      const env = getSanitizedEnv({ GIT_TERMINAL_PROMPT: "1", LANG: "de_DE.UTF-8" });

      expect(env.GIT_TERMINAL_PROMPT).toBe("0");
      expect(env.LC_ALL).toBe("C");
      expect(env.LANG).toBe("C");
    });

    it("should drop undefined values", () => {
      const env = getSanitizedEnv({ EMPTY: undefined });

      expect(Object.hasOwn(env, "EMPTY")).toBe(false);
    });

    it("should not modify the source environment", () => {
      const source = { GIT_ASKPASS: "/usr/bin/askpass" };

      getSanitizedEnv(source);

      expect(source.GIT_ASKPASS).toBe("/usr/bin/askpass");
    });
  });

  describe("getGitConfig()", () => {
    it("should disable signing and set the checkpoint identity", () => {
      expect(getGitConfig()).toEqual([
        "commit.gpgsign=false",
        "tag.gpgsign=false",
        "user.name=Rewind",
        "user.email=rewind@local",
      ]);
    });
  });

  describe("formatIdentity()", () => {
    it("should format identities for --author", () => {
      expect(formatIdentity(CHECKPOINT_IDENTITY)).toBe("Rewind <rewind@local>");
      expect(formatIdentity(CONFLICT_RESOLVER_IDENTITY)).toBe(
        "Rewind Conflict Resolver <rewind@local>"
      );
    });
  });
});
