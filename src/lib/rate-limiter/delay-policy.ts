/**
 * Percentage-based proactive delay.
 *
 * Below the throttle start threshold operations dispatch immediately. Between
 * the two thresholds the delay grows linearly up to one "fair share" slot
 * (window / max operations), spreading requests out before the hard limit is
 * reached. At or above the full throttle threshold the caller must wait until
 * enough in-window operations expire.
 */

import type { LimitSnapshot } from "./limit-state";
import type { WindowSnapshot } from "./window-counter";

export type DelayMode = "none" | "soft" | "hard";

export interface DelayDecision {
  delayMs: number;
  mode: DelayMode;
  /** Load the decision was based on */
  load: number;
}

export const DEFAULT_JITTER_FACTOR = 0.1;

/**
 * Operation counts at which throttling starts and becomes full.
 */
export const getThresholdCounts = (
  limits: LimitSnapshot,
): { throttleStartCount: number; fullThrottleCount: number } => ({
  throttleStartCount: Math.ceil(limits.maxOperationsInWindow * limits.throttleStartPercentage),
  fullThrottleCount: Math.ceil(limits.maxOperationsInWindow * limits.fullThrottlePercentage),
});

/**
 * Provider-reported usage, if it is still inside its window.
 */
const freshReportedUsage = (limits: LimitSnapshot, now: number): number => {
  const { reportedUsage } = limits;
  if (!reportedUsage || reportedUsage.observedAt + limits.rateLimitWindowMs <= now) {
    return 0;
  }
  return reportedUsage.used;
};

/**
 * Time until enough timestamps leave the window to bring the ratio back
 * below the full throttle threshold.
 */
const hardStopDelayMs = (window: WindowSnapshot, limits: LimitSnapshot, now: number): number => {
  const { timestamps } = window;
  if (timestamps.length === 0) {
    return 0;
  }
  const mustExpire = Math.floor(
    window.load - limits.fullThrottlePercentage * limits.maxOperationsInWindow,
  ) + 1;
  const index = Math.min(Math.max(mustExpire, 1), timestamps.length) - 1;
  return Math.max(0, timestamps[index] + limits.rateLimitWindowMs - now);
};

/**
 * Computes the wait before the next operation may dispatch.
 *
 * @param window - Pruned window snapshot
 * @param limits - Current limit state
 * @param now - Current time (ms)
 * @param random - Random source in [0, 1)
 * @param jitterFactor - Relative jitter applied to non-zero delays
 *
 * @example
 * ```typescript
 * // 8 of 10 operations used, start 0.75, full 0.9, 10s window:
 * // ratio 0.8 is one third of the way through the throttle range,
 * // so the delay is ~1000ms / 3 before jitter.
 * getDelay(counter.snapshot(), limits.get(), Date.now());
 * ```
 */
export const getDelay = (
  window: WindowSnapshot,
  limits: LimitSnapshot,
  now: number,
  random: () => number = Math.random,
  jitterFactor: number = DEFAULT_JITTER_FACTOR,
): DelayDecision => {
  const reported = freshReportedUsage(limits, now);
  const load = Math.max(window.load, reported);
  const ratio = load / limits.maxOperationsInWindow;
  const { throttleStartPercentage: start, fullThrottlePercentage: full } = limits;

  if (ratio < start) {
    return { delayMs: 0, mode: "none", load };
  }

  if (ratio < full) {
    const ceilingMs = limits.rateLimitWindowMs / limits.maxOperationsInWindow;
    const baseMs = ceilingMs * ((ratio - start) / (full - start));
    // Symmetric jitter desynchronizes concurrent callers
    const jitteredMs = baseMs * (1 + (random() * 2 - 1) * jitterFactor);
    return { delayMs: Math.max(0, jitteredMs), mode: "soft", load };
  }

  let baseMs: number;
  if (reported > window.load && limits.reportedUsage) {
    // No local timestamps back the reported load: wait out the report's window
    baseMs = Math.max(0, limits.reportedUsage.observedAt + limits.rateLimitWindowMs - now);
  } else {
    baseMs = hardStopDelayMs(window, limits, now);
  }

  // Upward-only jitter keeps the hard stop bound intact
  return { delayMs: baseMs * (1 + random() * jitterFactor), mode: "hard", load };
};
