/**
 * Shared types for the rate limiter.
 */

import type { AsyncResult, Result } from "../result";
import type { RateLimitExceededError } from "../errors";

// =============================================================================
// Time
// =============================================================================

/**
 * Source of the current time, in seconds.
 * Must be free of side effects; it is read inside the limiter's lock.
 */
export type Clock = () => number;

/**
 * Wait primitive used by the sleep-on-limit path, in seconds.
 */
export type Sleep = (seconds: number) => Promise<void>;

// =============================================================================
// Configuration
// =============================================================================

/**
 * Configuration for a rate limiter.
 */
export interface RateLimiterConfig {
  /**
   * Length of the rate window, in seconds. Also the time it takes to earn
   * back one token.
   * @default 1
   */
  duration?: number;

  /**
   * Maximum number of tokens available at once, and the starting balance.
   * @default 1
   */
  burstMax?: number;

  /**
   * Wait until the call can be admitted instead of deciding immediately.
   * Takes precedence over `raiseOnLimit`.
   * @default false
   */
  sleepOnLimit?: boolean;

  /**
   * When over budget and not sleeping, reject with `RateLimitExceededError`.
   * When false, over-budget calls are admitted anyway.
   * @default true
   */
  raiseOnLimit?: boolean;

  /**
   * Source of the current time in seconds.
   * @default monotonic process clock
   */
  clock?: Clock;

  /**
   * Wait primitive for `sleepOnLimit`.
   * @default timer-based delay
   */
  sleep?: Sleep;

  /**
   * Receives an event for every admission, wait, rejection and reset.
   * Called after the lock has been released.
   */
  onEvent?: (event: RateLimiterEvent) => void;
}

// =============================================================================
// Events
// =============================================================================

/**
 * Events emitted through `RateLimiterConfig.onEvent`.
 * `ts` is the injected clock's reading when the event happened.
 */
export type RateLimiterEvent =
  | {
      type: "limiter_admit";
      limiterName: string;
      ts: number;
      /** Tokens left after this admission */
      burst: number;
      /** Admitted in pass-through mode despite having no whole token */
      overBudget: boolean;
      /** Seconds spent sleeping before this admission */
      waited: number;
    }
  | {
      type: "limiter_wait";
      limiterName: string;
      ts: number;
      waitSeconds: number;
      /** 1 for the first sleep of this call, 2 for the second, ... */
      attempt: number;
    }
  | { type: "limiter_reject"; limiterName: string; ts: number; retryAfter: number }
  | { type: "limiter_reset"; limiterName: string; ts: number };

// =============================================================================
// Outcomes
// =============================================================================

/**
 * What `attempt()` resolves with once a call is admitted.
 */
export interface Admission {
  /** True when admitted in pass-through mode without a whole token */
  overBudget: boolean;
  /** Total seconds slept before admission */
  waited: number;
  /** Number of sleeps before admission */
  waits: number;
  /** Tokens left after this admission */
  burst: number;
}

/**
 * Read-only snapshot of a limiter.
 */
export interface RateLimiterStats {
  name: string;
  /** Stored token balance, as of the last attempt */
  burst: number;
  /** Whole tokens a call arriving now would find */
  availableTokens: number;
  burstMax: number;
  duration: number;
  /** Clock reading of the last admission, `-Infinity` before the first */
  lastReset: number;
  /** Callers currently sleeping in the sleep-on-limit loop */
  waitingCount: number;
}

// =============================================================================
// Rate Limiter
// =============================================================================

/**
 * Rate limiter interface.
 */
export interface RateLimiter {
  /** Name used in errors and events */
  readonly name: string;

  /**
   * Decide whether one call may proceed now.
   *
   * Resolves when the call is admitted. Rejects with `RateLimitExceededError`
   * when over budget with `raiseOnLimit` set and `sleepOnLimit` unset.
   */
  attempt(): Promise<Admission>;

  /**
   * `attempt()` with the denial returned as an `Err` instead of a rejection.
   */
  tryAttempt(): AsyncResult<Admission, RateLimitExceededError>;

  /**
   * Execute an operation with rate limiting.
   * @param operation - The operation to execute
   * @returns The operation result
   */
  execute<T>(operation: () => T | Promise<T>): Promise<T>;

  /**
   * Execute a Result-returning operation with rate limiting.
   */
  executeResult<T, E>(
    operation: () => Result<T, E> | AsyncResult<T, E>
  ): AsyncResult<T, E | RateLimitExceededError>;

  /**
   * Return a function that passes through this limiter before every call.
   */
  wrap<Args extends unknown[], R>(
    fn: (...args: Args) => R
  ): (...args: Args) => Promise<Awaited<R>>;

  /**
   * Get current statistics without changing any state.
   */
  getStats(): RateLimiterStats;

  /**
   * Restore the full burst and forget the last admission.
   */
  reset(): void;
}
