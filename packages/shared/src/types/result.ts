/**
 * Result Type
 *
 * Discriminated union for operations that can fail without throwing.
 * Every repository operation in Rewind reports through this type so callers
 * branch on `ok` instead of wrapping calls in try/catch.
 *
 * @module @rewind/shared/types/result
 */

/** Successful branch of a Result. */
export interface OkResult<T> {
  readonly ok: true;
  readonly value: T;
}

/** Failed branch of a Result. */
export interface ErrResult<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

// =============================================================================
// Constructors
// =============================================================================

export function Ok<T>(value: T): OkResult<T> {
  return { ok: true, value };
}

export function Err<E>(error: E): ErrResult<E> {
  return { ok: false, error };
}
