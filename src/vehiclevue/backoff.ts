import type { CycleOutcome } from "./types";

export interface BackoffOptions {
  /**
   * Configured interval between cycles, in ms.
   */
  interval: number;
  /**
   * Ceiling for the backed-off interval, in ms.
   */
  maxInterval: number;
}

/**
 * Interval until the next cycle.
 *
 * Rate limits are account wide, so a rate-limited cycle doubles the wait (or
 * waits as long as the vendor asked, if longer) up to `maxInterval`. Only a
 * fully successful cycle resets to the configured interval.
 */
export function nextInterval(
  current: number,
  outcome: CycleOutcome,
  { interval, maxInterval }: BackoffOptions,
  retryAfter?: number
): number {
  switch (outcome) {
    case "rate_limited":
      return Math.min(Math.max(current * 2, retryAfter ?? 0), maxInterval);
    case "ok":
      return interval;
    default:
      return current;
  }
}
