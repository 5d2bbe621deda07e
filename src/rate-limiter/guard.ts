/**
 * Function adapters over a rate limiter: wrap-and-delegate in place of
 * decorator syntax.
 */

import { createRateLimiter } from "./index";
import type { RateLimiter, RateLimiterConfig } from "./types";

/**
 * A function whose every call passes through its own limiter first.
 */
export type RateLimitedFunction<Args extends unknown[], R> = ((
  ...args: Args
) => Promise<Awaited<R>>) & {
  /** The limiter owned by this function */
  readonly limiter: RateLimiter;
};

/**
 * Pass one call through `limiter`, then invoke `fn` with `args`.
 *
 * @example
 * ```typescript
 * const user = await guard(limiter, fetchUser, 'u_42');
 * ```
 */
export async function guard<Args extends unknown[], R>(
  limiter: Pick<RateLimiter, "attempt">,
  fn: (...args: Args) => R,
  ...args: Args
): Promise<Awaited<R>> {
  await limiter.attempt();
  return await fn(...args);
}

/**
 * Build a limiter dedicated to `fn` and return the guarded function.
 * The limiter stays reachable through `.limiter`.
 *
 * @param fn - Function to protect
 * @param config - Rate limiter configuration
 * @param name - Limiter name (defaults to the function's name)
 *
 * @example
 * ```typescript
 * const postStatus = rateLimited(
 *   (text: string) => client.post('/statuses', { text }),
 *   { duration: 60, burstMax: 15, sleepOnLimit: true },
 *   'statuses'
 * );
 *
 * await postStatus('hello');
 * postStatus.limiter.getStats().availableTokens; // 14
 * ```
 */
export function rateLimited<Args extends unknown[], R>(
  fn: (...args: Args) => R,
  config?: RateLimiterConfig,
  name: string = fn.name || "anonymous"
): RateLimitedFunction<Args, R> {
  const limiter = createRateLimiter(name, config);
  return Object.assign(limiter.wrap(fn), { limiter });
}
