/**
 * http-interactions — tests/scheduler/loop.test.ts
 * WHAT: Tests for the background Loop: counting, stop/cancel, retries and error hooks.
 * HOW: Fake timers drive the sleeps between iterations.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: loggerMock,
}));

import { Loop } from "../../src/scheduler/loop.js";

function networkError(): Error {
  return Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
}

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(new Date("2024-01-01T00:00:00.000Z"));
});

describe("Loop options", () => {
  it("rejects non-positive intervals and counts", () => {
    expect(() => new Loop(vi.fn(), { intervalMs: 0 })).toThrow("intervalMs must be greater than 0");
    expect(() => new Loop(vi.fn(), { intervalMs: 10, count: 0 })).toThrow(
      "count must be a positive integer or unset"
    );
    expect(() => new Loop(vi.fn(), { intervalMs: 10 }).changeInterval(-1)).toThrow(
      "intervalMs must be greater than 0"
    );
  });

  it("takes its name from the callback", () => {
    async function refreshCache(): Promise<void> {}
    expect(new Loop(refreshCache, { intervalMs: 10 }).name).toBe("refreshCache");
    expect(new Loop(refreshCache, { intervalMs: 10, name: "cache" }).name).toBe("cache");
  });
});

describe("Loop", () => {
  it("runs count iterations, one interval apart, between the hooks", async () => {
    const calls: number[] = [];
    const before = vi.fn();
    const after = vi.fn();
    const loop = new Loop(() => {
      calls.push(Date.now());
    }, { intervalMs: 1000, count: 3 })
      .beforeLoop(before)
      .afterLoop(after);

    const done = loop.start();
    expect(loop.isRunning()).toBe(true);
    await vi.advanceTimersByTimeAsync(2000);
    await done;

    const start = Date.parse("2024-01-01T00:00:00.000Z");
    expect(calls).toEqual([start, start + 1000, start + 2000]);
    expect(before).toHaveBeenCalledTimes(1);
    expect(after).toHaveBeenCalledTimes(1);
    expect(loop.isRunning()).toBe(false);
    expect(loop.nextIteration).toBeNull();
    expect(loop.failed).toBe(false);
  });

  it("refuses to start twice", async () => {
    const loop = new Loop(vi.fn(), { intervalMs: 1000, count: 1, name: "once" });
    const done = loop.start();

    expect(() => loop.start()).toThrow("The loop once is already running");
    await done;
  });

  it("finishes the current iteration after stop()", async () => {
    let calls = 0;
    const loop: Loop = new Loop(() => {
      calls += 1;
      if (calls === 2) loop.stop();
    }, { intervalMs: 1000 });

    const done = loop.start();
    await vi.advanceTimersByTimeAsync(1000);
    await done;

    expect(calls).toBe(2);
    expect(loop.isRunning()).toBe(false);
  });

  it("ends at the next sleep after cancel()", async () => {
    const callback = vi.fn();
    const after = vi.fn();
    const onError = vi.fn();
    const loop = new Loop(callback, { intervalMs: 1000 }).afterLoop(after).onError(onError);

    const done = loop.start();
    loop.cancel();
    await done;

    expect(callback).toHaveBeenCalledTimes(1);
    expect(after).toHaveBeenCalledTimes(1);
    expect(onError).not.toHaveBeenCalled();
  });

  it("stops waiting on beforeLoop when cancelled", async () => {
    const callback = vi.fn();
    const after = vi.fn();
    const onError = vi.fn();
    const before = vi.fn((_signal: AbortSignal) => new Promise<void>(() => {}));
    const loop = new Loop(callback, { intervalMs: 1000 }).beforeLoop(before).afterLoop(after).onError(onError);

    const done = loop.start();
    loop.cancel();
    await done;

    expect(before.mock.calls[0]?.[0].aborted).toBe(true);
    expect(callback).not.toHaveBeenCalled();
    expect(after).toHaveBeenCalledTimes(1);
    expect(onError).not.toHaveBeenCalled();
    expect(loop.isRunning()).toBe(false);
  });

  it("aborts the running callback's signal on cancel()", async () => {
    let markStarted = (): void => {};
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    const onError = vi.fn();
    const loop = new Loop(
      (signal) =>
        new Promise<void>((_, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")));
          markStarted();
        }),
      { intervalMs: 1000 }
    ).onError(onError);

    const done = loop.start();
    await started;
    loop.cancel();
    await done;

    expect(onError).not.toHaveBeenCalled();
    expect(loop.failed).toBe(false);
  });

  it("retries recoverable failures after retryDelayMs", async () => {
    const callback = vi.fn().mockRejectedValueOnce(networkError()).mockResolvedValueOnce(undefined);
    const loop = new Loop(callback, { intervalMs: 1000, count: 1, retryDelayMs: 100, name: "sync" });

    const done = loop.start();
    await vi.advanceTimersByTimeAsync(100);
    await done;

    expect(callback).toHaveBeenCalledTimes(2);
    expect(loggerMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "loop_retry", loop: "sync" }),
      "Loop sync failed, retrying"
    );
    expect(loop.failed).toBe(false);
  });

  it("hands recoverable failures to onError when reconnect is off", async () => {
    const err = networkError();
    const onError = vi.fn();
    const loop = new Loop(() => Promise.reject(err), { intervalMs: 1000, reconnect: false }).onError(onError);

    await loop.start();

    expect(onError).toHaveBeenCalledWith(err);
    expect(loop.failed).toBe(true);
  });

  it("logs other failures by default", async () => {
    const err = new Error("boom");
    const loop = new Loop(() => Promise.reject(err), { intervalMs: 1000, name: "prune" });

    await loop.start();

    expect(loggerMock.error).toHaveBeenCalledWith(
      { evt: "loop_error", loop: "prune", err },
      "Unhandled exception in background loop prune"
    );
    expect(loop.failed).toBe(true);
  });

  it("logs a failing error handler", async () => {
    const loop = new Loop(() => Promise.reject(new Error("boom")), { intervalMs: 1000, name: "prune" }).onError(() => {
      throw new Error("hook");
    });

    await loop.start();

    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "loop_error_hook_failed", loop: "prune" }),
      "onError of prune failed"
    );
  });

  it("uses a changed interval from the next sleep", async () => {
    const calls: number[] = [];
    const loop = new Loop(() => {
      calls.push(Date.now());
    }, { intervalMs: 1000, count: 2 });
    loop.changeInterval(250);

    const done = loop.start();
    await vi.advanceTimersByTimeAsync(250);
    await done;

    const start = Date.parse("2024-01-01T00:00:00.000Z");
    expect(calls).toEqual([start, start + 250]);
  });
});
