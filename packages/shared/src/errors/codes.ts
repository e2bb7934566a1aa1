// ============================================
// Rewind Error Codes
// ============================================

/**
 * Centralized error codes for Rewind.
 * Error code ranges:
 * - 1xxx: General/configuration errors
 * - 70xx: Repository environment errors
 * - 71xx: Repository operation errors
 * - 72xx: Synchronization errors
 */
export enum ErrorCode {
  // General Errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL_ERROR = 1001,
  CONFIG_INVALID = 1101,
  CONFIG_PARSE_ERROR = 1102,

  // Repository Environment Errors (70xx)
  WORKDIR_UNAVAILABLE = 7001,
  REPO_OPEN_FAILED = 7002,
  REPO_NOT_FOUND = 7003,
  REPO_ALREADY_EXISTS = 7004,

  // Repository Operation Errors (71xx)
  STATUS_FAILED = 7101,
  STAGE_FAILED = 7102,
  COMMIT_FAILED = 7103,
  HISTORY_FAILED = 7104,
  RESET_FAILED = 7105,
  CHECKPOINT_NOT_FOUND = 7106,
  INIT_FAILED = 7107,
  MERGE_ABORT_FAILED = 7108,

  // Synchronization Errors (72xx)
  PUSH_FAILED = 7201,
}
