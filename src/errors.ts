/**
 * burstgate/errors
 *
 * Error types raised by the limiter and its helpers.
 *
 * @example
 * ```typescript
 * import { isRateLimitExceededError } from 'burstgate/errors';
 *
 * try {
 *   await limiter.execute(() => callApi());
 * } catch (error) {
 *   if (isRateLimitExceededError(error)) {
 *     scheduleRetry(error.retryAfterMs);
 *   }
 * }
 * ```
 */

import { TaggedError } from "./tagged-error";

/**
 * Convert seconds to whole milliseconds, rounding up.
 * `toFixed` drops float noise such as 0.3 * 1000 = 300.00000000000006.
 */
function secondsToMillis(seconds: number): number {
  return Math.max(0, Math.ceil(Number((seconds * 1000).toFixed(6))));
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Raised when a call is over budget, the limiter does not sleep, and
 * `raiseOnLimit` is enabled.
 *
 * @example
 * ```typescript
 * const error = new RateLimitExceededError({ limiterName: 'search', retryAfter: 0.5 });
 * console.log(error.message); // "RateLimitExceededError: too many calls to search, retry after 500ms"
 * ```
 */
export class RateLimitExceededError extends TaggedError<"RateLimitExceededError"> {
  /** Name of the limiter that denied the call */
  readonly limiterName: string;
  /** Seconds until the current rate window has fully elapsed */
  readonly retryAfter: number;
  /** `retryAfter` in whole milliseconds, rounded up */
  readonly retryAfterMs: number;

  constructor(props: { limiterName: string; retryAfter: number }) {
    const retryAfterMs = secondsToMillis(props.retryAfter);
    super(
      "RateLimitExceededError",
      `RateLimitExceededError: too many calls to ${props.limiterName}, retry after ${retryAfterMs}ms`
    );
    this.limiterName = props.limiterName;
    this.retryAfter = props.retryAfter;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Raised at construction when a limiter option is out of range.
 */
export class LimiterConfigError extends TaggedError<"LimiterConfigError"> {
  /** Option that failed validation */
  readonly field: string;
  /** Why the value was refused */
  readonly reason: string;

  constructor(props: { field: string; reason: string }) {
    super(
      "LimiterConfigError",
      `LimiterConfigError: invalid ${props.field} - ${props.reason}`
    );
    this.field = props.field;
    this.reason = props.reason;
  }
}

/**
 * Raised by `retryOnRateLimit` when every attempt was denied.
 *
 * @example
 * ```typescript
 * const error = new RetryExhaustedError({ operation: 'fetchFeed', attempts: 3 });
 * console.log(error.message); // "RetryExhaustedError: fetchFeed failed after 3 attempts"
 * ```
 */
export class RetryExhaustedError extends TaggedError<"RetryExhaustedError"> {
  /** Name of the operation that was retried */
  readonly operation?: string;
  /** Total number of attempts made */
  readonly attempts: number;
  /** The denial that ended the last attempt */
  readonly lastError?: RateLimitExceededError;

  constructor(props: {
    operation?: string;
    attempts: number;
    lastError?: RateLimitExceededError;
  }) {
    super(
      "RetryExhaustedError",
      props.operation
        ? `RetryExhaustedError: ${props.operation} failed after ${props.attempts} attempts`
        : `RetryExhaustedError: Operation failed after ${props.attempts} attempts`,
      { cause: props.lastError }
    );
    this.operation = props.operation;
    this.attempts = props.attempts;
    this.lastError = props.lastError;
  }
}

/**
 * Union of every error the library raises.
 */
export type BurstgateError =
  | RateLimitExceededError
  | LimiterConfigError
  | RetryExhaustedError;

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a RateLimitExceededError.
 */
export function isRateLimitExceededError(
  error: unknown
): error is RateLimitExceededError {
  return (
    TaggedError.isTaggedError(error) && error._tag === "RateLimitExceededError"
  );
}

/**
 * Check if an error is a LimiterConfigError.
 */
export function isLimiterConfigError(
  error: unknown
): error is LimiterConfigError {
  return TaggedError.isTaggedError(error) && error._tag === "LimiterConfigError";
}

/**
 * Check if an error is a RetryExhaustedError.
 */
export function isRetryExhaustedError(
  error: unknown
): error is RetryExhaustedError {
  return (
    TaggedError.isTaggedError(error) && error._tag === "RetryExhaustedError"
  );
}

/**
 * Check if an error is any BurstgateError.
 */
export function isBurstgateError(error: unknown): error is BurstgateError {
  return (
    isRateLimitExceededError(error) ||
    isLimiterConfigError(error) ||
    isRetryExhaustedError(error)
  );
}
