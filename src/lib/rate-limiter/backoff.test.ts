import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_BACKOFF_CONFIG,
  createBackoffState,
  getBackoffCeilingMs,
  isRetryableError,
  isRetryableStatusCode,
  nextBackoff,
  parseRetryAfterMs,
} from "./backoff";
import { TransientError } from "./errors";

describe("getBackoffCeilingMs", () => {
  it("should grow exponentially from the base delay", () => {
    const config = { baseDelayMs: 1000, multiplier: 2, maxDelayMs: 60000 };

    expect(getBackoffCeilingMs(0, config)).toBe(1000); // 1000 * 2^0
    expect(getBackoffCeilingMs(1, config)).toBe(2000); // 1000 * 2^1
    expect(getBackoffCeilingMs(2, config)).toBe(4000); // 1000 * 2^2
    expect(getBackoffCeilingMs(3, config)).toBe(8000); // 1000 * 2^3
  });

  it("should cap at maxDelay", () => {
    const config = { baseDelayMs: 1000, multiplier: 2, maxDelayMs: 5000 };

    expect(getBackoffCeilingMs(2, config)).toBe(4000);
    expect(getBackoffCeilingMs(3, config)).toBe(5000); // Capped
    expect(getBackoffCeilingMs(10, config)).toBe(5000); // Still capped
  });

  it("should use default config when not provided", () => {
    // Default: 2s base, 2x multiplier, 1h cap
    expect(getBackoffCeilingMs(0)).toBe(2000);
    expect(getBackoffCeilingMs(20)).toBe(3_600_000);
  });
});

describe("nextBackoff", () => {
  beforeEach(() => {
    // Mock Math.random for deterministic tests
    vi.spyOn(Math, "random").mockReturnValue(0.5);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should sample full jitter below each ceiling", () => {
    let state = createBackoffState(1000);
    const delays: number[] = [];

    for (let i = 0; i < 3; i++) {
      const step = nextBackoff(state, DEFAULT_BACKOFF_CONFIG);
      delays.push(step.delayMs);
      state = step.state;
    }

    // 0.5 * 1000, 0.5 * 2000, 0.5 * 4000
    expect(delays).toEqual([500, 1000, 2000]);
    expect(state.attempt).toBe(3);
  });

  it("should stay within [0, ceiling) for any random value", () => {
    const state = createBackoffState(1000);

    expect(nextBackoff(state, DEFAULT_BACKOFF_CONFIG, { random: () => 0 }).delayMs).toBe(0);
    expect(nextBackoff(state, DEFAULT_BACKOFF_CONFIG, { random: () => 0.9999 }).delayMs).toBe(999);
  });

  it("should not mutate the previous state", () => {
    const state = createBackoffState(1000);
    nextBackoff(state);

    expect(state).toEqual({ attempt: 0, baseDelayMs: 1000 });
  });

  it("should use the override delay and still advance the attempt", () => {
    const state = createBackoffState(1000);

    const step = nextBackoff(state, DEFAULT_BACKOFF_CONFIG, { overrideDelayMs: 7000 });

    expect(step.delayMs).toBe(7000);
    expect(step.state.attempt).toBe(1);
    // Next computed delay uses attempt 1: 0.5 * 2000
    expect(nextBackoff(step.state).delayMs).toBe(1000);
  });

  it("should clamp a negative override to zero", () => {
    const step = nextBackoff(createBackoffState(1000), DEFAULT_BACKOFF_CONFIG, {
      overrideDelayMs: -50,
    });

    expect(step.delayMs).toBe(0);
  });
});

describe("parseRetryAfterMs", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should parse integer seconds", () => {
    expect(parseRetryAfterMs("30")).toBe(30000);
    expect(parseRetryAfterMs("0")).toBe(0);
    expect(parseRetryAfterMs(" 120 ")).toBe(120000);
  });

  it("should return null for invalid input", () => {
    expect(parseRetryAfterMs(null)).toBeNull();
    expect(parseRetryAfterMs(undefined)).toBeNull();
    expect(parseRetryAfterMs("")).toBeNull();
    expect(parseRetryAfterMs("invalid")).toBeNull();
  });

  it("should parse HTTP dates", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));

    expect(parseRetryAfterMs("Thu, 01 Jan 2026 00:00:30 GMT")).toBe(30000);
  });

  it("should return 0 for past dates", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));

    expect(parseRetryAfterMs("Wed, 31 Dec 2025 23:59:00 GMT")).toBe(0);
  });
});

describe("isRetryableStatusCode", () => {
  it("should return true for retryable codes", () => {
    expect(isRetryableStatusCode(408)).toBe(true);
    expect(isRetryableStatusCode(429)).toBe(true);
    expect(isRetryableStatusCode(500)).toBe(true);
    expect(isRetryableStatusCode(501)).toBe(true);
    expect(isRetryableStatusCode(503)).toBe(true);
  });

  it("should return false for non-retryable codes", () => {
    expect(isRetryableStatusCode(200)).toBe(false);
    expect(isRetryableStatusCode(400)).toBe(false);
    expect(isRetryableStatusCode(401)).toBe(false);
    expect(isRetryableStatusCode(403)).toBe(false);
    expect(isRetryableStatusCode(404)).toBe(false);
  });
});

describe("isRetryableError", () => {
  it("should return true for TransientError", () => {
    expect(isRetryableError(new TransientError("try again"))).toBe(true);
  });

  describe("HTTP status codes", () => {
    it("should return true for retryable status codes", () => {
      expect(isRetryableError({ status: 429 })).toBe(true);
      expect(isRetryableError({ status: 503 })).toBe(true);
      expect(isRetryableError({ statusCode: 500 })).toBe(true);
    });

    it("should return false for non-retryable status codes", () => {
      expect(isRetryableError({ status: 401 })).toBe(false);
      expect(isRetryableError({ status: 404 })).toBe(false);
      expect(isRetryableError({ statusCode: 400 })).toBe(false);
    });
  });

  describe("network errors", () => {
    it("should return true for network error codes", () => {
      expect(isRetryableError({ code: "ECONNRESET" })).toBe(true);
      expect(isRetryableError({ code: "ETIMEDOUT" })).toBe(true);
      expect(isRetryableError({ code: "UND_ERR_SOCKET" })).toBe(true);
    });

    it("should return false for unknown error codes", () => {
      expect(isRetryableError({ code: "UNKNOWN_ERROR" })).toBe(false);
    });

    it("should look through the error cause", () => {
      const error = new Error("fetch failed", { cause: { code: "ECONNRESET" } });
      expect(isRetryableError(error)).toBe(true);
    });

    it("should return true for timeout errors", () => {
      expect(isRetryableError({ name: "TimeoutError" })).toBe(true);
    });
  });

  describe("edge cases", () => {
    it("should return false for null/undefined", () => {
      expect(isRetryableError(null)).toBe(false);
      expect(isRetryableError(undefined)).toBe(false);
    });

    it("should return false for primitive values", () => {
      expect(isRetryableError("error")).toBe(false);
      expect(isRetryableError(123)).toBe(false);
    });

    it("should return false for plain Error instances", () => {
      expect(isRetryableError(new Error("Something went wrong"))).toBe(false);
    });
  });
});
