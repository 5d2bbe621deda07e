/**
 * burstgate
 *
 * Keep outbound calls under a remote rate limit: a burst/token limiter that
 * admits, delays or rejects each call before it runs.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createRateLimiter, isRateLimitExceededError } from 'burstgate';
 *
 * const limiter = createRateLimiter('github', { duration: 1, burstMax: 10 });
 *
 * try {
 *   const repo = await limiter.execute(() => octokit.repos.get(params));
 * } catch (error) {
 *   if (isRateLimitExceededError(error)) {
 *     console.log(`retry in ${error.retryAfterMs}ms`);
 *   }
 * }
 * ```
 *
 * ## Entry Points
 *
 * - `burstgate` - Everything below
 * - `burstgate/ratelimit` - Limiter, adapters, presets
 * - `burstgate/errors` - Error classes and type guards
 * - `burstgate/retry` - Retry-after backoff helper
 * - `burstgate/testing` - Deterministic test clock
 */

// =============================================================================
// Rate Limiter
// =============================================================================
export {
  type Admission,
  type Clock,
  type Sleep,
  type RateLimiter,
  type RateLimiterConfig,
  type RateLimiterEvent,
  type RateLimiterStats,
  createRateLimiter,
  validateRateLimiterConfig,
  monotonicClock,
  timerSleep,
  rateLimiterPresets,
  DEFAULT_DURATION,
  DEFAULT_BURST_MAX,
} from "./rate-limiter";

export {
  type RateLimitedFunction,
  guard,
  rateLimited,
} from "./rate-limiter/guard";

// =============================================================================
// Mutex
// =============================================================================
export { type Mutex, createMutex } from "./mutex";

// =============================================================================
// Errors
// =============================================================================
export { TaggedError, type TagOf, type ErrorByTag } from "./tagged-error";
export {
  type BurstgateError,
  RateLimitExceededError,
  LimiterConfigError,
  RetryExhaustedError,
  isRateLimitExceededError,
  isLimiterConfigError,
  isRetryExhaustedError,
  isBurstgateError,
} from "./errors";

// =============================================================================
// Results
// =============================================================================
export {
  type Ok,
  type Err,
  type Result,
  type AsyncResult,
  ok,
  err,
  isOk,
  isErr,
  unwrap,
  unwrapOr,
  UnwrapError,
} from "./result";

// =============================================================================
// Retry
// =============================================================================
export {
  type RetryOnRateLimitOptions,
  retryOnRateLimit,
} from "./retry";
