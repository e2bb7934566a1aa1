import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { deepMerge, findProjectConfig, loadConfig, parseEnvConfig } from "../loader.js";

describe("findProjectConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "rewind-config-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("finds rewind.toml in the start directory", () => {
    const configPath = path.join(tempDir, "rewind.toml");
    fs.writeFileSync(configPath, "debug = true\n");

    expect(findProjectConfig(tempDir)).toBe(configPath);
  });

  it("prefers rewind.toml over .rewind.toml", () => {
    const primaryPath = path.join(tempDir, "rewind.toml");
    fs.writeFileSync(primaryPath, "debug = true\n");
    fs.writeFileSync(path.join(tempDir, ".rewind.toml"), "debug = false\n");

    expect(findProjectConfig(tempDir)).toBe(primaryPath);
  });

  it("walks up directories to find config", () => {
    const childDir = path.join(tempDir, "parent", "child");
    fs.mkdirSync(childDir, { recursive: true });
    const configPath = path.join(tempDir, "parent", ".rewind.toml");
    fs.writeFileSync(configPath, 'remote = "upstream"\n');

    expect(findProjectConfig(childDir)).toBe(configPath);
  });

  it("ignores a directory with the config file name", () => {
    fs.mkdirSync(path.join(tempDir, "rewind.toml"));
    const found = findProjectConfig(tempDir);
    expect(found).not.toBe(path.join(tempDir, "rewind.toml"));
  });
});

describe("parseEnvConfig", () => {
  it("returns an empty object when nothing is set", () => {
    expect(parseEnvConfig({})).toEqual({});
  });

  it("enables debug logging for DEBUG=1 and DEBUG=true", () => {
    expect(parseEnvConfig({ DEBUG: "1" })).toEqual({ debug: true });
    expect(parseEnvConfig({ DEBUG: "true" })).toEqual({ debug: true });
  });

  it("keeps debug logging off for DEBUG=0 and DEBUG=false", () => {
    expect(parseEnvConfig({ DEBUG: "0" })).toEqual({ debug: false });
    expect(parseEnvConfig({ DEBUG: "false" })).toEqual({ debug: false });
  });

  it("lets REWIND_DEBUG override DEBUG", () => {
    expect(parseEnvConfig({ DEBUG: "1", REWIND_DEBUG: "false" })).toEqual({ debug: false });
  });

  it("reads log level and remote", () => {
    expect(parseEnvConfig({ REWIND_LOG_LEVEL: "warn", REWIND_REMOTE: "backup" })).toEqual({
      logLevel: "warn",
      remote: "backup",
    });
  });

  it("ignores an unknown log level", () => {
    expect(parseEnvConfig({ REWIND_LOG_LEVEL: "verbose" })).toEqual({});
  });
});

describe("deepMerge", () => {
  it("lets later sources win and skips undefined", () => {
    expect(deepMerge({ debug: false, remote: "origin" }, { debug: true, remote: undefined })).toEqual(
      { debug: true, remote: "origin" }
    );
  });

  it("replaces arrays instead of concatenating", () => {
    expect(deepMerge({ suggestions: ["a", "b"] }, { suggestions: ["c"] })).toEqual({
      suggestions: ["c"],
    });
  });

  it("merges nested objects", () => {
    expect(deepMerge({ ui: { color: true } }, { ui: { compact: true } })).toEqual({
      ui: { color: true, compact: true },
    });
  });
});

describe("loadConfig", () => {
  let tempDir: string;
  let globalConfigPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "rewind-config-test-"));
    globalConfigPath = path.join(tempDir, "global", "config.toml");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("applies schema defaults when no source sets anything", () => {
    const result = loadConfig({ cwd: tempDir, globalConfigPath, skipProjectFile: true });

    expect(result).toEqual({
      ok: true,
      value: { debug: false, logLevel: "info", logFile: "debug.log", remote: "origin" },
    });
  });

  it("layers global, project, env and overrides in that order", () => {
    fs.mkdirSync(path.dirname(globalConfigPath), { recursive: true });
    fs.writeFileSync(globalConfigPath, 'remote = "global-remote"\nlogLevel = "error"\n');
    fs.writeFileSync(
      path.join(tempDir, "rewind.toml"),
      'remote = "project-remote"\nsuggestions = ["Fixed the build"]\n'
    );
    process.env.REWIND_LOG_LEVEL = "warn";

    const result = loadConfig({ cwd: tempDir, globalConfigPath, overrides: { debug: true } });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual({
        debug: true,
        logLevel: "warn",
        logFile: "debug.log",
        remote: "project-remote",
        suggestions: ["Fixed the build"],
      });
    }
  });

  it("ignores environment variables when skipEnv is set", () => {
    process.env.DEBUG = "1";

    const result = loadConfig({ cwd: tempDir, globalConfigPath, skipEnv: true, skipProjectFile: true });

    expect(result.ok && result.value.debug).toBe(false);
  });

  it("fails with PARSE_ERROR for malformed TOML", () => {
    const projectPath = path.join(tempDir, "rewind.toml");
    fs.writeFileSync(projectPath, "debug = = true\n");

    const result = loadConfig({ cwd: tempDir, globalConfigPath });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("PARSE_ERROR");
      expect(result.error.path).toBe(projectPath);
    }
  });

  it("fails with VALIDATION_ERROR naming the offending field", () => {
    fs.writeFileSync(path.join(tempDir, "rewind.toml"), "suggestions = []\n");

    const result = loadConfig({ cwd: tempDir, globalConfigPath });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("VALIDATION_ERROR");
      expect(result.error.message).toContain("suggestions");
    }
  });
});
