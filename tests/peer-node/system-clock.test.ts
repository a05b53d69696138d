import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { SystemClock } from "../../packages/peer-node/src/adapters/SystemClock.js";

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(new Date("2024-01-01T00:00:00Z"));
});

afterEach(() => {
  vi.useRealTimers();
});

describe("SystemClock", () => {
  it("reads the wall clock", () => {
    expect(new SystemClock().now()).toBe(Date.parse("2024-01-01T00:00:00Z"));
  });

  it("resolves a sleep once the duration has passed", async () => {
    const clock = new SystemClock();
    let woke = false;
    const sleeping = clock.sleep(1_000).then(() => {
      woke = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(woke).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await sleeping;
    expect(woke).toBe(true);
  });

  it("rejects a sleep with the abort reason", async () => {
    const clock = new SystemClock();
    const controller = new AbortController();
    const sleeping = clock.sleep(1_000, controller.signal);

    controller.abort(new Error("stopped"));

    await expect(sleeping).rejects.toThrow("stopped");
  });

  it("rejects an already aborted signal without waiting", async () => {
    const controller = new AbortController();
    controller.abort(new Error("gone"));

    await expect(new SystemClock().sleep(10, controller.signal)).rejects.toThrow("gone");
  });

  it("rejects negative durations", async () => {
    await expect(new SystemClock().sleep(-1)).rejects.toBeInstanceOf(RangeError);
  });
});
