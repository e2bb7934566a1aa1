// ============================================
// Rewind Shared Types
// ============================================

// Error codes
export { type ErrorCategory, ErrorCode, inferCategory } from "./errors/index.js";
export type { ErrResult, OkResult, Result } from "./types/result.js";
// Result type (shared so core and cli agree on one definition)
export { Err, Ok } from "./types/result.js";
