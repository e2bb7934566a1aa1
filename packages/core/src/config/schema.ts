import { z } from "zod";

// ============================================
// Log Level Schema
// ============================================

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

// ============================================
// Complete Configuration Schema
// ============================================

/**
 * Rewind configuration.
 *
 * Every field has a default, so an empty object is a valid configuration.
 */
export const ConfigSchema = z.object({
  /** Write a diagnostic log for the lifetime of the process */
  debug: z.boolean().optional().default(false),
  logLevel: LogLevelSchema.optional().default("info"),
  /** Diagnostic log location, relative to the working directory */
  logFile: z.string().min(1).optional().default("debug.log"),
  /** Remote used by sync */
  remote: z.string().min(1).optional().default("origin"),
  /** Replaces the built-in checkpoint description suggestions */
  suggestions: z.array(z.string().trim().min(1)).min(1).max(20).optional(),
  workingDir: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config type for user input (before defaults are applied)
 */
export type PartialConfig = z.input<typeof ConfigSchema>;
