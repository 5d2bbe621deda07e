/**
 * burstgate/ratelimit
 *
 * The rate limiter and its function adapters.
 *
 * @example
 * ```typescript
 * import { createRateLimiter, guard, rateLimited } from 'burstgate/ratelimit';
 *
 * const limiter = createRateLimiter('geocoder', { duration: 1, burstMax: 5 });
 * const place = await guard(limiter, geocode, '221B Baker Street');
 *
 * // Or give the function its own limiter
 * const geocodeLimited = rateLimited(geocode, { duration: 1, sleepOnLimit: true });
 * ```
 */

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

export {
  RateLimitExceededError,
  isRateLimitExceededError,
} from "./errors";
