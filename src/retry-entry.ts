/**
 * burstgate/retry
 *
 * Wait out a rejection's `retryAfter` and try again.
 *
 * @example
 * ```typescript
 * import { retryOnRateLimit } from 'burstgate/retry';
 *
 * const user = await retryOnRateLimit(() => limiter.execute(() => getUser(id)));
 * ```
 */

export {
  type RetryOnRateLimitOptions,
  retryOnRateLimit,
} from "./retry";
