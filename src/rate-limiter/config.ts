/**
 * Rate limiter defaults, validation and presets.
 */

import { LimiterConfigError } from "../errors";
import type { Clock, RateLimiterConfig, Sleep } from "./types";

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_DURATION = 1;
export const DEFAULT_BURST_MAX = 1;

/**
 * Monotonic process clock in seconds. Unaffected by wall-clock changes.
 */
export const monotonicClock: Clock = () => performance.now() / 1000;

/**
 * Longest delay a single timer accepts (2^31 - 1 ms).
 */
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Timer-based sleep in seconds. Delays past one timer's range are chained.
 */
export const timerSleep: Sleep = (seconds) =>
  new Promise<void>((resolve) => {
    let remaining = seconds * 1000;
    const tick = () => {
      if (!(remaining > 0)) {
        resolve();
        return;
      }
      const step = Math.min(remaining, MAX_TIMER_MS);
      remaining -= step;
      setTimeout(tick, step);
    };
    tick();
  });

// =============================================================================
// Validation
// =============================================================================

function requirePositiveFinite(field: string, value: unknown): void {
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new LimiterConfigError({ field, reason: "must be a number" });
  }
  if (!Number.isFinite(value)) {
    throw new LimiterConfigError({ field, reason: "must be finite" });
  }
  if (value <= 0) {
    throw new LimiterConfigError({ field, reason: "must be greater than 0" });
  }
}

function requireOptional(
  field: string,
  value: unknown,
  kind: "boolean" | "function"
): void {
  if (value !== undefined && typeof value !== kind) {
    throw new LimiterConfigError({ field, reason: `must be a ${kind}` });
  }
}

/**
 * Check every option of a limiter config, throwing `LimiterConfigError` on
 * the first bad one. Options are checked in declaration order.
 */
export function validateRateLimiterConfig(config: RateLimiterConfig): void {
  if (config.duration !== undefined) {
    requirePositiveFinite("duration", config.duration);
  }
  if (config.burstMax !== undefined) {
    requirePositiveFinite("burstMax", config.burstMax);
  }
  requireOptional("sleepOnLimit", config.sleepOnLimit, "boolean");
  requireOptional("raiseOnLimit", config.raiseOnLimit, "boolean");
  requireOptional("clock", config.clock, "function");
  requireOptional("sleep", config.sleep, "function");
  requireOptional("onEvent", config.onEvent, "function");
}

// =============================================================================
// Presets
// =============================================================================

/**
 * Preset configurations for common remote limits.
 *
 * Tokens come back at one per `duration` whatever `burstMax` is, so a preset
 * for "N calls per window W" uses `duration = W / N`.
 */
export const rateLimiterPresets = {
  /**
   * One call per second, rejecting anything faster.
   */
  strict: {
    duration: 1,
    burstMax: 1,
    raiseOnLimit: true,
  } satisfies RateLimiterConfig,

  /**
   * One call per minute, waiting rather than failing.
   */
  perMinute: {
    duration: 60,
    burstMax: 1,
    sleepOnLimit: true,
  } satisfies RateLimiterConfig,

  /**
   * 15 calls per 15 minutes with the whole allowance usable as a burst.
   */
  quarterHourWindow: {
    duration: 60,
    burstMax: 15,
    sleepOnLimit: true,
  } satisfies RateLimiterConfig,
} as const;
