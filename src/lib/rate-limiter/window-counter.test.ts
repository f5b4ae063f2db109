import { describe, expect, it } from "vitest";

import { createWindowCounter } from "./window-counter";

describe("createWindowCounter", () => {
  it("should keep timestamps sorted regardless of insertion order", () => {
    const counter = createWindowCounter(() => 1000);

    counter.record(100);
    counter.record(50);
    counter.record(200);

    expect(counter.snapshot(500)).toEqual({ load: 3, timestamps: [50, 100, 200] });
  });

  it("should prune timestamps at or before now - window", () => {
    const counter = createWindowCounter(() => 1000);
    counter.record(50);
    counter.record(100);
    counter.record(200);

    expect(counter.load(1050)).toBe(2); // 50 is exactly one window old
    expect(counter.load(1200)).toBe(0);
  });

  it("should read the window length on every prune", () => {
    let windowMs = 1000;
    const counter = createWindowCounter(() => windowMs);
    counter.record(0);
    counter.record(500);

    expect(counter.load(600)).toBe(2);

    windowMs = 400;
    expect(counter.load(600)).toBe(1);
  });

  it("should count reservations in the future", () => {
    const counter = createWindowCounter(() => 1000);
    counter.record(2000);

    expect(counter.load(100)).toBe(1);
    expect(counter.snapshot(100).timestamps).toEqual([2000]);
  });

  it("should release a recorded timestamp once", () => {
    const counter = createWindowCounter(() => 1000);
    counter.record(100);
    counter.record(100);

    expect(counter.release(100)).toBe(true);
    expect(counter.load(150)).toBe(1);
    expect(counter.release(999)).toBe(false);
  });

  it("should return a snapshot detached from the counter", () => {
    const counter = createWindowCounter(() => 1000);
    counter.record(100);

    const snapshot = counter.snapshot(150);
    counter.record(120);

    expect(snapshot.timestamps).toEqual([100]);
  });

  it("should clear every timestamp", () => {
    const counter = createWindowCounter(() => 1000);
    counter.record(100);
    counter.record(200);

    counter.clear();

    expect(counter.load(300)).toBe(0);
  });
});
