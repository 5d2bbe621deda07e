/**
 * burstgate/errors
 *
 * Error classes and type guards.
 */

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
