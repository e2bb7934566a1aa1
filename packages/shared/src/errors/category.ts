/**
 * Error Categories
 *
 * Groups error codes by how the interface reacts to them.
 *
 * @module @rewind/shared/errors/category
 */

import { ErrorCode } from "./codes.js";

/**
 * How an error is presented to the user.
 *
 * - environment: the repository storage itself is unusable (blocking notice)
 * - absence: something expected is missing; rendered as guidance, not as a failure
 * - operation: a single action failed and was aborted; previous state is kept
 * - fatal-sync: the forced push was rejected; the local resolution commit remains
 */
export type ErrorCategory = "environment" | "absence" | "operation" | "fatal-sync";

/**
 * Infers the category for an error code.
 *
 * @param code - The error code to categorize
 * @returns The category used to present the error
 */
export function inferCategory(code: ErrorCode): ErrorCategory {
  switch (code) {
    case ErrorCode.REPO_NOT_FOUND:
      return "absence";

    case ErrorCode.WORKDIR_UNAVAILABLE:
    case ErrorCode.REPO_OPEN_FAILED:
    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_PARSE_ERROR:
      return "environment";

    case ErrorCode.PUSH_FAILED:
      return "fatal-sync";

    default:
      return "operation";
  }
}
