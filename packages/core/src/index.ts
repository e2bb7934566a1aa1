// ============================================
// Rewind Core
// ============================================

/**
 * @module @rewind/core
 *
 * Repository gateway, sync protocol, configuration, logging and the error
 * taxonomy used by the Rewind terminal interface.
 */

// ============================================
// Configuration
// ============================================
export {
  type Config,
  type ConfigError,
  type ConfigErrorCode,
  ConfigSchema,
  deepMerge,
  findProjectConfig,
  type LoadConfigOptions,
  type LogLevel as ConfigLogLevel,
  LogLevelSchema,
  loadConfig,
  type PartialConfig,
  parseEnvConfig,
} from "./config/index.js";

// ============================================
// Errors
// ============================================
export {
  ErrorCode,
  isRewindError,
  RewindError,
  type RewindErrorOptions,
  toError,
} from "./errors/index.js";

// ============================================
// Repository
// ============================================
export * from "./git/index.js";

// ============================================
// Logging
// ============================================
export * from "./logger/index.js";
