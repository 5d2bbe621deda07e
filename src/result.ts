/**
 * burstgate/result (internal)
 *
 * Result primitives backing the non-throwing limiter entry points
 * (`executeResult`, `tryAttempt`).
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E, C = unknown> = { ok: false; error: E; cause?: C };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown, C = unknown> = Ok<T> | Err<E, C>;

/**
 * A Promise that resolves to a Result.
 */
export type AsyncResult<T, E = unknown, C = unknown> = Promise<Result<T, E, C>>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 */
export const err = <E, C = unknown>(
  error: E,
  options?: { cause?: C }
): Err<E, C> =>
  options?.cause !== undefined
    ? { ok: false, error, cause: options.cause }
    : { ok: false, error };

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if a Result is successful.
 */
export const isOk = <T, E, C>(r: Result<T, E, C>): r is Ok<T> => r.ok;

/**
 * Checks if a Result is a failure.
 */
export const isErr = <T, E, C>(r: Result<T, E, C>): r is Err<E, C> => !r.ok;

// =============================================================================
// Unwrapping
// =============================================================================

/**
 * Error thrown by `unwrap` when called on a failed Result.
 */
export class UnwrapError<E = unknown, C = unknown> extends Error {
  constructor(
    public readonly error: E,
    public readonly cause?: C
  ) {
    super(`Unwrap called on an error result: ${String(error)}`);
    this.name = "UnwrapError";
  }
}

/**
 * Returns the value of a successful Result, or throws `UnwrapError`.
 */
export const unwrap = <T, E, C>(r: Result<T, E, C>): T => {
  if (r.ok) return r.value;
  throw new UnwrapError<E, C>(r.error, r.cause);
};

/**
 * Returns the value of a successful Result, or the fallback.
 */
export const unwrapOr = <T, E, C>(r: Result<T, E, C>, defaultValue: T): T =>
  r.ok ? r.value : defaultValue;
