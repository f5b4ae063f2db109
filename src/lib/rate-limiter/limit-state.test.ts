import { ValiError } from "valibot";
import { describe, expect, it } from "vitest";

import { type LimitParameters, createLimitState, parseLimitParameters } from "./limit-state";

const LIMITS: LimitParameters = {
  maxOperationsInWindow: 10,
  rateLimitWindowMs: 10_000,
  throttleStartPercentage: 0.75,
  fullThrottlePercentage: 0.9,
};

describe("parseLimitParameters", () => {
  it("should accept valid limits", () => {
    expect(parseLimitParameters(LIMITS)).toEqual(LIMITS);
  });

  it("should reject a non-positive operation count", () => {
    expect(() => parseLimitParameters({ ...LIMITS, maxOperationsInWindow: 0 })).toThrow(ValiError);
  });

  it("should reject a non-integer operation count", () => {
    expect(() => parseLimitParameters({ ...LIMITS, maxOperationsInWindow: 2.5 })).toThrow(
      ValiError,
    );
  });

  it("should reject a start threshold at or above the full threshold", () => {
    expect(() => parseLimitParameters({ ...LIMITS, throttleStartPercentage: 0.9 })).toThrow(
      "throttleStartPercentage must be lower than fullThrottlePercentage",
    );
  });

  it("should allow full throttle at 100%", () => {
    const limits = parseLimitParameters({ ...LIMITS, fullThrottlePercentage: 1 });
    expect(limits.fullThrottlePercentage).toBe(1);
  });
});

describe("createLimitState", () => {
  it("should throw on invalid initial limits", () => {
    expect(() => createLimitState({ ...LIMITS, rateLimitWindowMs: 0 })).toThrow(ValiError);
  });

  it("should merge a valid patch", () => {
    const state = createLimitState(LIMITS);

    const result = state.update({ maxOperationsInWindow: 50, rateLimitWindowMs: 5000 });

    expect(result).toEqual({
      applied: true,
      limits: { ...LIMITS, maxOperationsInWindow: 50, rateLimitWindowMs: 5000 },
    });
    expect(state.getWindowMs()).toBe(5000);
  });

  it("should reject a patch that breaks the threshold ordering and keep the old limits", () => {
    const state = createLimitState(LIMITS);

    const result = state.update({ throttleStartPercentage: 0.95 });

    expect(result).toEqual({
      applied: false,
      reason: "throttleStartPercentage must be lower than fullThrottlePercentage",
    });
    expect(state.get()).toEqual(LIMITS);
  });

  it("should reject the whole patch when reported usage is invalid", () => {
    const state = createLimitState(LIMITS);

    const result = state.update({
      maxOperationsInWindow: 20,
      reportedUsage: { used: -1, observedAt: 1000 },
    });

    expect(result.applied).toBe(false);
    expect(state.get().maxOperationsInWindow).toBe(10);
  });

  it("should be idempotent for a repeated patch", () => {
    const state = createLimitState(LIMITS);
    const patch = { maxOperationsInWindow: 100, reportedUsage: { used: 60, observedAt: 5000 } };

    state.update(patch);
    const first = state.get();
    state.update(patch);

    expect(state.get()).toEqual(first);
    expect(first.reportedUsage).toEqual({ used: 60, observedAt: 5000 });
  });

  it("should keep reported usage when a later patch omits it", () => {
    const state = createLimitState(LIMITS);
    state.update({ reportedUsage: { used: 3, observedAt: 1000 } });

    state.update({ maxOperationsInWindow: 20 });

    expect(state.get().reportedUsage).toEqual({ used: 3, observedAt: 1000 });
  });

  it("should return copies", () => {
    const state = createLimitState(LIMITS);
    state.update({ reportedUsage: { used: 3, observedAt: 1000 } });

    const snapshot = state.get();
    snapshot.maxOperationsInWindow = 99;
    if (snapshot.reportedUsage) {
      snapshot.reportedUsage.used = 99;
    }

    expect(state.get().maxOperationsInWindow).toBe(10);
    expect(state.get().reportedUsage?.used).toBe(3);
  });
});
