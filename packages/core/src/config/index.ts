export {
  type ConfigError,
  type ConfigErrorCode,
  deepMerge,
  findProjectConfig,
  type LoadConfigOptions,
  loadConfig,
  parseEnvConfig,
} from "./loader.js";
export { type Config, ConfigSchema, type LogLevel, LogLevelSchema, type PartialConfig } from "./schema.js";
