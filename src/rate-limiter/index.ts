/**
 * Rate Limiting
 *
 * Keep calls to a rate-limited API under its limit. Every call first passes
 * through `attempt()`, which admits it, makes it wait, or rejects it.
 *
 * @example
 * ```typescript
 * import { createRateLimiter } from 'burstgate';
 *
 * // Bursts of up to 5 calls, one token earned back every 2 seconds
 * const limiter = createRateLimiter('search-api', {
 *   duration: 2,
 *   burstMax: 5,
 *   sleepOnLimit: true,
 * });
 *
 * const results = await limiter.execute(() => searchApi(query));
 * ```
 */

import { err, ok, type AsyncResult, type Result } from "../result";
import { RateLimitExceededError, isRateLimitExceededError } from "../errors";
import { createMutex } from "../mutex";
import {
  DEFAULT_BURST_MAX,
  DEFAULT_DURATION,
  monotonicClock,
  timerSleep,
  validateRateLimiterConfig,
} from "./config";
import type {
  Admission,
  RateLimiter,
  RateLimiterConfig,
  RateLimiterEvent,
  RateLimiterStats,
} from "./types";

export type {
  Admission,
  Clock,
  RateLimiter,
  RateLimiterConfig,
  RateLimiterEvent,
  RateLimiterStats,
  Sleep,
} from "./types";
export {
  DEFAULT_BURST_MAX,
  DEFAULT_DURATION,
  monotonicClock,
  rateLimiterPresets,
  timerSleep,
  validateRateLimiterConfig,
} from "./config";

/**
 * Outcome of one pass through the critical section.
 */
type Decision =
  | { kind: "admit"; ts: number; burst: number; overBudget: boolean }
  | { kind: "wait"; ts: number; seconds: number }
  | { kind: "reject"; ts: number; retryAfter: number };

/**
 * `lastReset` before the first admission: the window always looks elapsed.
 */
const NEVER = Number.NEGATIVE_INFINITY;

/**
 * Create a rate limiter.
 *
 * Tokens are earned back at one per `duration` seconds, up to `burstMax`.
 * A call is over budget while less than one whole token is left and less
 * than `duration` has passed since the last admission.
 *
 * @param name - Name for the limiter (used in errors and events)
 * @param config - Rate limiter configuration
 * @returns A RateLimiter instance
 * @throws LimiterConfigError when an option is out of range
 *
 * @example
 * ```typescript
 * const limiter = createRateLimiter('payments', { duration: 1, burstMax: 3 });
 *
 * try {
 *   await limiter.execute(() => chargeCard(order));
 * } catch (error) {
 *   if (isRateLimitExceededError(error)) {
 *     await delay(error.retryAfterMs);
 *   }
 * }
 * ```
 */
export function createRateLimiter(
  name: string,
  config: RateLimiterConfig = {}
): RateLimiter {
  validateRateLimiterConfig(config);

  const {
    duration = DEFAULT_DURATION,
    burstMax = DEFAULT_BURST_MAX,
    sleepOnLimit = false,
    raiseOnLimit = true,
    clock = monotonicClock,
    sleep = timerSleep,
    onEvent,
  } = config;

  const lock = createMutex();

  let burst = burstMax;
  let lastReset = NEVER;
  let sleeping = 0;

  function emit(event: RateLimiterEvent): void {
    onEvent?.(event);
  }

  /**
   * Replenish, then admit, wait or reject. Runs only while holding `lock`.
   */
  function decide(): Decision {
    const now = clock();
    const elapsed = now - lastReset;
    const periodRemaining = duration - elapsed;

    // One token per `duration`, independent of `burstMax`. A clock that moved
    // backwards earns nothing.
    burst = Math.min(burstMax, burst + Math.max(0, elapsed) / duration);

    const overBudget = periodRemaining > 0 && Math.floor(burst) === 0;
    if (overBudget) {
      if (sleepOnLimit) {
        return { kind: "wait", ts: now, seconds: periodRemaining };
      }
      if (raiseOnLimit) {
        return { kind: "reject", ts: now, retryAfter: periodRemaining };
      }
    }

    burst = Math.max(0, burst - 1);
    lastReset = clock();
    return { kind: "admit", ts: lastReset, burst, overBudget };
  }

  async function attempt(): Promise<Admission> {
    let waited = 0;
    let waits = 0;

    for (;;) {
      const decision = await lock.runExclusive(decide);

      if (decision.kind === "admit") {
        emit({
          type: "limiter_admit",
          limiterName: name,
          ts: decision.ts,
          burst: decision.burst,
          overBudget: decision.overBudget,
          waited,
        });
        return {
          overBudget: decision.overBudget,
          waited,
          waits,
          burst: decision.burst,
        };
      }

      if (decision.kind === "reject") {
        emit({
          type: "limiter_reject",
          limiterName: name,
          ts: decision.ts,
          retryAfter: decision.retryAfter,
        });
        throw new RateLimitExceededError({
          limiterName: name,
          retryAfter: decision.retryAfter,
        });
      }

      waits++;
      emit({
        type: "limiter_wait",
        limiterName: name,
        ts: decision.ts,
        waitSeconds: decision.seconds,
        attempt: waits,
      });

      sleeping++;
      try {
        await sleep(decision.seconds);
      } finally {
        sleeping--;
      }
      waited += decision.seconds;
    }
  }

  async function tryAttempt(): AsyncResult<Admission, RateLimitExceededError> {
    try {
      return ok(await attempt());
    } catch (error) {
      if (isRateLimitExceededError(error)) {
        return err(error);
      }
      throw error;
    }
  }

  return {
    name,
    attempt,
    tryAttempt,

    async execute<T>(operation: () => T | Promise<T>): Promise<T> {
      await attempt();
      return operation();
    },

    async executeResult<T, E>(
      operation: () => Result<T, E> | AsyncResult<T, E>
    ): AsyncResult<T, E | RateLimitExceededError> {
      const admission = await tryAttempt();
      if (!admission.ok) {
        return admission;
      }
      return operation();
    },

    wrap<Args extends unknown[], R>(
      fn: (...args: Args) => R
    ): (...args: Args) => Promise<Awaited<R>> {
      return async (...args: Args): Promise<Awaited<R>> => {
        await attempt();
        return await fn(...args);
      };
    },

    getStats(): RateLimiterStats {
      const elapsed = clock() - lastReset;
      const projected = Math.min(
        burstMax,
        burst + Math.max(0, elapsed) / duration
      );
      return {
        name,
        burst,
        availableTokens: Math.floor(projected),
        burstMax,
        duration,
        lastReset,
        waitingCount: sleeping,
      };
    },

    reset(): void {
      burst = burstMax;
      lastReset = NEVER;
      emit({ type: "limiter_reset", limiterName: name, ts: clock() });
    },
  };
}
