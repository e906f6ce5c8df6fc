/**
 * http-interactions — tests/lib/reqctx.test.ts
 * WHAT: Tests for the async-local request context.
 * WHY: Log lines from nested helpers must carry the trace id of the interaction that caused them.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { ctx, newTraceId, runWithCtx } from "../../src/lib/reqctx.js";

describe("newTraceId", () => {
  it("returns 11 base62 characters", () => {
    expect(newTraceId()).toMatch(/^[0-9A-Za-z]{11}$/);
  });

  it("does not repeat across calls", () => {
    const ids = new Set(Array.from({ length: 100 }, () => newTraceId()));
    expect(ids.size).toBe(100);
  });
});

describe("runWithCtx", () => {
  it("returns an empty context outside of a run", () => {
    expect(ctx()).toEqual({});
  });

  it("exposes the given fields inside the run", () => {
    const seen = runWithCtx({ traceId: "trace-1", cmd: "ping", kind: "slash", userId: "u1" }, () => ctx());
    expect(seen).toEqual({
      traceId: "trace-1",
      cmd: "ping",
      kind: "slash",
      userId: "u1",
      guildId: null,
      channelId: null,
    });
  });

  it("generates a trace id when none is given", () => {
    const seen = runWithCtx({ cmd: "ping" }, () => ctx());
    expect(seen.traceId).toMatch(/^[0-9A-Za-z]{11}$/);
  });

  it("inherits from the parent and lets children override", () => {
    const seen = runWithCtx({ traceId: "outer", cmd: "ping", guildId: "g1" }, () =>
      runWithCtx({ cmd: "button" }, () => ctx())
    );
    expect(seen).toMatchObject({ traceId: "outer", cmd: "button", guildId: "g1" });
  });

  it("survives awaits", async () => {
    const seen = await runWithCtx({ traceId: "async-trace" }, async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return ctx().traceId;
    });
    expect(seen).toBe("async-trace");
  });
});
