/**
 * Retry on rate limit
 *
 * Caller-side backoff for limiters that reject: wait out `retryAfter` and
 * call again, a bounded number of times.
 *
 * @example
 * ```typescript
 * import { retryOnRateLimit } from 'burstgate/retry';
 *
 * const feed = await retryOnRateLimit(
 *   () => limiter.execute(() => fetchFeed()),
 *   { maxAttempts: 5, operation: 'fetchFeed' }
 * );
 * ```
 */

import {
  LimiterConfigError,
  RateLimitExceededError,
  RetryExhaustedError,
  isRateLimitExceededError,
} from "../errors";
import { timerSleep } from "../rate-limiter/config";
import type { Sleep } from "../rate-limiter/types";

/**
 * Options for `retryOnRateLimit`.
 */
export interface RetryOnRateLimitOptions {
  /**
   * Total attempts, the first one included.
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Name reported in `RetryExhaustedError`.
   */
  operation?: string;

  /**
   * Wait primitive, in seconds.
   * @default timer-based delay
   */
  sleep?: Sleep;

  /**
   * Called with the denial and the attempt number before each wait.
   */
  onRetry?: (error: RateLimitExceededError, attempt: number) => void;
}

/**
 * Call `operation`, retrying after each `RateLimitExceededError` once its
 * `retryAfter` has passed. Any other failure propagates as is.
 *
 * @throws RetryExhaustedError when every attempt was denied
 * @throws LimiterConfigError when `maxAttempts` is not a positive integer
 */
export async function retryOnRateLimit<T>(
  operation: () => T | Promise<T>,
  options: RetryOnRateLimitOptions = {}
): Promise<T> {
  const { maxAttempts = 3, sleep = timerSleep, onRetry } = options;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new LimiterConfigError({
      field: "maxAttempts",
      reason: "must be a positive integer",
    });
  }

  let lastError: RateLimitExceededError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isRateLimitExceededError(error)) {
        throw error;
      }
      lastError = error;
      if (attempt === maxAttempts) {
        break;
      }
      onRetry?.(error, attempt);
      await sleep(error.retryAfter);
    }
  }

  throw new RetryExhaustedError({
    operation: options.operation,
    attempts: maxAttempts,
    lastError,
  });
}
