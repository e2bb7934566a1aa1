import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@rewind/shared";
import { type Config, ConfigSchema, type PartialConfig } from "./schema.js";

// ============================================
// Configuration Loader
// ============================================

/**
 * Error types for configuration loading operations
 */
export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

/**
 * Configuration error with code and context
 */
export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

/**
 * Options for loadConfig function
 */
export interface LoadConfigOptions {
  /** Working directory to search for config files (default: process.cwd()) */
  cwd?: string;
  /** Config overrides (highest priority) */
  overrides?: PartialConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectFile?: boolean;
  /** Global config location (default: ~/.config/rewind/config.toml) */
  globalConfigPath?: string;
}

/** Config file names to search for in order */
const CONFIG_FILE_NAMES = ["rewind.toml", ".rewind.toml"];

/**
 * Find project configuration file by searching up from startDir to root.
 *
 * @param startDir - Directory to start search from (default: process.cwd())
 * @returns Path to found config file, or undefined if not found
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

// ============================================
// Environment
// ============================================

function parseBooleanFlag(value: string): boolean {
  return value === "true" || value === "1";
}

/**
 * Parse REWIND_* environment variables into a partial config object.
 *
 * `DEBUG` is honoured as an alias for `REWIND_DEBUG` and takes the same
 * `true`/`1` values; `REWIND_DEBUG` wins when both are set.
 *
 * @example
 * ```typescript
 * // With REWIND_REMOTE=upstream set:
 * parseEnvConfig(); // { remote: "upstream" }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const result: PartialConfig = {};

  if (env.DEBUG) {
    result.debug = parseBooleanFlag(env.DEBUG);
  }
  if (env.REWIND_DEBUG) {
    result.debug = parseBooleanFlag(env.REWIND_DEBUG);
  }

  const logLevel = env.REWIND_LOG_LEVEL;
  if (logLevel === "debug" || logLevel === "info" || logLevel === "warn" || logLevel === "error") {
    result.logLevel = logLevel;
  }

  if (env.REWIND_REMOTE) {
    result.remote = env.REWIND_REMOTE;
  }

  return result;
}

// ============================================
// Merging
// ============================================

/**
 * Check if value is a plain object (not array, null, or other type)
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

/**
 * Deep merge multiple plain objects. Later sources override earlier ones.
 * Arrays are replaced (not concatenated) and undefined values don't overwrite.
 *
 * @example
 * ```typescript
 * deepMerge({ debug: false, remote: "origin" }, { debug: true });
 * // { debug: true, remote: "origin" }
 * ```
 */
export function deepMerge(...sources: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      result[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? deepMerge(targetValue, sourceValue)
          : sourceValue;
    }
  }

  return result;
}

// ============================================
// Loading
// ============================================

/**
 * Get path to global config file (~/.config/rewind/config.toml)
 */
function getGlobalConfigPath(): string {
  return path.join(os.homedir(), ".config", "rewind", "config.toml");
}

/**
 * Read and parse a TOML config file
 */
function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigError> {
  if (!fs.existsSync(filePath)) {
    return Err({
      code: "FILE_NOT_FOUND",
      message: `Config file not found: ${filePath}`,
      path: filePath,
    });
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }

  try {
    return Ok(TOML.parse(content));
  } catch (error) {
    return Err({
      code: "PARSE_ERROR",
      message: `Failed to parse TOML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. Global config: ~/.config/rewind/config.toml
 * 3. Project config: rewind.toml or .rewind.toml, searched upward from cwd
 * 4. Environment variables (unless skipEnv)
 * 5. CLI overrides (options.overrides)
 *
 * A missing file is skipped; an unreadable or malformed one fails the load.
 *
 * @example
 * ```typescript
 * const result = loadConfig({ cwd: "/my/project", overrides: { debug: true } });
 * if (!result.ok) {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, ConfigError> {
  const { cwd, overrides, skipEnv = false, skipProjectFile = false } = options;
  const layers: Record<string, unknown>[] = [];

  const candidates = [options.globalConfigPath ?? getGlobalConfigPath()];
  if (!skipProjectFile) {
    const projectPath = findProjectConfig(cwd);
    if (projectPath) {
      candidates.push(projectPath);
    }
  }

  for (const filePath of candidates) {
    const fileResult = readTomlFile(filePath);
    if (fileResult.ok) {
      layers.push(fileResult.value);
    } else if (fileResult.error.code !== "FILE_NOT_FOUND") {
      return fileResult;
    }
  }

  if (!skipEnv) {
    layers.push(parseEnvConfig());
  }

  if (overrides) {
    layers.push(overrides);
  }

  const parseResult = ConfigSchema.safeParse(deepMerge(...layers));

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues}`,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}
