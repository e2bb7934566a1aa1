// ============================================
// Rewind Error Types
// ============================================

import { type ErrorCategory, ErrorCode, inferCategory } from "@rewind/shared";

export { ErrorCode };

/**
 * Options for creating a RewindError.
 */
export interface RewindErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all Rewind errors.
 *
 * Provides:
 * - Categorized error codes
 * - Category inference (environment, absence, operation, fatal-sync)
 * - Error cause chaining
 * - Additional context
 */
export class RewindError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: RewindErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "RewindError";
    this.code = code;
    this.context = options?.context;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RewindError);
    }
  }

  /**
   * How the interface presents this error, inferred from the error code.
   */
  get category(): ErrorCategory {
    return inferCategory(this.code);
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Type guard for RewindError instances.
 */
export function isRewindError(error: unknown): error is RewindError {
  return error instanceof RewindError;
}

/**
 * Normalizes anything thrown into an Error.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}
