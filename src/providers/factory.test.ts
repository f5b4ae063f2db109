/**
 * Tests for the provider throttler factory.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { HttpProviderThrottler, ProviderThrottler } from "./types";

import { AIRTABLE_RATE_LIMITS } from "./airtable";
import { ASANA_RATE_LIMITS } from "./asana";
import { parseProviderConfig } from "./config";
import { createProviderThrottler } from "./factory";
import { HUBSPOT_RATE_LIMITS } from "./hubspot";
import { OPERATION_RATE_LIMITS } from "./operation";

const asHttp = (throttler: ProviderThrottler): HttpProviderThrottler => {
  if (throttler.provider === "operation") {
    throw new Error("expected an HTTP provider");
  }
  return throttler;
};

const headerOf = (init: RequestInit | undefined, name: string): string | null =>
  new Headers(init?.headers).get(name);

describe("createProviderThrottler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    vi.spyOn(Math, "random").mockReturnValue(0.5);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("should create a HubSpot throttler with its preset limits", async () => {
    const throttler = createProviderThrottler(
      parseProviderConfig({ provider: "hubspot", apiKey: "hubspot-a" }),
    );

    expect(throttler.provider).toBe("hubspot");
    expect(await throttler.executor.getLimitState()).toEqual(HUBSPOT_RATE_LIMITS);
  });

  it("should merge limit overrides over the preset", async () => {
    const throttler = createProviderThrottler(
      parseProviderConfig({
        provider: "asana",
        apiKey: "asana-key",
        limits: { maxOperationsInWindow: 150 },
      }),
    );

    expect(await throttler.executor.getLimitState()).toEqual({
      ...ASANA_RATE_LIMITS,
      maxOperationsInWindow: 150,
    });
  });

  it("should send HubSpot requests with bearer auth to the API base URL", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response("{}"));
    const { http } = asHttp(
      createProviderThrottler(parseProviderConfig({ provider: "hubspot", apiKey: "hubspot-a" }), {
        fetch: fetchMock,
      }),
    );

    await http.get("crm/v3/objects/contacts", { params: { limit: 10 } });

    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe("https://api.hubapi.com/crm/v3/objects/contacts?limit=10");
    expect(headerOf(init, "authorization")).toBe("Bearer hubspot-a");
  });

  it("should rotate HubSpot keys on 429 and learn limits from headers", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async (_input, init) =>
      headerOf(init, "authorization") === "Bearer hubspot-a"
        ? new Response(null, { status: 429 })
        : new Response("{}", {
            headers: {
              "X-HubSpot-RateLimit-Max": "100",
              "X-HubSpot-RateLimit-Remaining": "90",
              "X-HubSpot-RateLimit-Interval-Milliseconds": "10000",
            },
          }),
    );
    const { executor, http } = asHttp(
      createProviderThrottler(
        parseProviderConfig({
          provider: "hubspot",
          apiKey: "hubspot-a",
          backupApiKeys: ["hubspot-b"],
        }),
        { fetch: fetchMock },
      ),
    );

    const response = await http.get("crm/v3/objects/deals");

    expect(response.status).toBe(200);
    expect(executor.getActiveCredential()).toBe("hubspot-b");
    expect(await executor.getLimitState()).toEqual({
      ...HUBSPOT_RATE_LIMITS,
      maxOperationsInWindow: 100,
      rateLimitWindowMs: 10_000,
      reportedUsage: { used: 10, observedAt: Date.now() },
    });
  });

  it("should wait out the Airtable penalty after a 429 without Retry-After", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response(null, { status: 429 }))
      .mockResolvedValueOnce(new Response("{}"));
    const { executor, http } = asHttp(
      createProviderThrottler(
        parseProviderConfig({ provider: "airtable", apiKey: "airtable-key" }),
        { fetch: fetchMock },
      ),
    );

    const result = http.get("appBase/Table");
    await vi.advanceTimersByTimeAsync(29_999);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);

    expect((await result).status).toBe(200);
    expect(String(fetchMock.mock.calls[1][0])).toBe("https://api.airtable.com/v0/appBase/Table");
    expect(await executor.getLimitState()).toEqual(AIRTABLE_RATE_LIMITS);
  });

  it("should create an operation throttler with a runner", async () => {
    const throttler = createProviderThrottler(parseProviderConfig({ provider: "operation" }));
    if (throttler.provider !== "operation") {
      throw new Error("expected the operation provider");
    }

    const greeting = await throttler.runner.execute((name: string) => `hello ${name}`, "sheet");

    expect(greeting).toBe("hello sheet");
    expect(await throttler.executor.getLimitState()).toEqual(OPERATION_RATE_LIMITS);
  });

  it("should back off operation failures from a 10 second base", async () => {
    const throttler = createProviderThrottler(parseProviderConfig({ provider: "operation" }));
    if (throttler.provider !== "operation") {
      throw new Error("expected the operation provider");
    }
    const call = vi
      .fn()
      .mockRejectedValueOnce(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }))
      .mockResolvedValueOnce("done");

    const result = throttler.runner.execute(call);
    await vi.advanceTimersByTimeAsync(4999);
    expect(call).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);

    await expect(result).resolves.toBe("done");
  });

  it("should retry SDK errors the caller marks as transient", async () => {
    class QuotaError extends Error {}
    const throttler = createProviderThrottler(parseProviderConfig({ provider: "operation" }), {
      isTransient: (error) => error instanceof QuotaError,
    });
    if (throttler.provider !== "operation") {
      throw new Error("expected the operation provider");
    }
    const call = vi
      .fn()
      .mockRejectedValueOnce(new QuotaError("quota"))
      .mockResolvedValueOnce("done");

    const result = throttler.runner.execute(call);
    await vi.advanceTimersByTimeAsync(5000);

    await expect(result).resolves.toBe("done");
    expect(call).toHaveBeenCalledTimes(2);
  });

  it("should not retry errors the caller's predicate rejects", async () => {
    const throttler = createProviderThrottler(parseProviderConfig({ provider: "operation" }), {
      isTransient: () => false,
    });
    if (throttler.provider !== "operation") {
      throw new Error("expected the operation provider");
    }
    const failure = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    const call = vi.fn().mockRejectedValue(failure);

    await expect(throttler.runner.execute(call)).rejects.toBe(failure);
    expect(call).toHaveBeenCalledTimes(1);
  });

  it("should pass the logger to the executor", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const throttler = createProviderThrottler(
      parseProviderConfig({ provider: "slack", botToken: "slack-token" }),
      {
        logger,
        fetch: vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 404 })),
      },
    );

    await expect(asHttp(throttler).http.post("chat.postMessage")).rejects.toThrow(
      "slack: operation returned a non-retryable result",
    );
    expect(throttler.executor.getMetrics().failedRuns).toBe(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });
});
