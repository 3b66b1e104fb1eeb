/**
 * Mangodia Bot — tests/lib/reqctx.test.ts
 * WHAT: Unit tests for request context and async local storage.
 * WHY: Verify trace ID generation and context propagation across awaits.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { newTraceId, runWithCtx, ctx } from "../../src/lib/reqctx.js";

describe("reqctx", () => {
  describe("newTraceId", () => {
    it("generates an 11-character base64url string", () => {
      const id = newTraceId();
      expect(id).toHaveLength(11);
      expect(id).toMatch(/^[\w-]+$/);
    });

    it("generates unique IDs", () => {
      const ids = new Set<string>();
      for (let i = 0; i < 100; i++) {
        ids.add(newTraceId());
      }
      expect(ids.size).toBe(100);
    });
  });

  describe("ctx", () => {
    it("returns empty object when no context set", () => {
      expect(ctx()).toEqual({});
    });
  });

  describe("runWithCtx", () => {
    it("exposes the context inside the callback", () => {
      const seen = runWithCtx({ traceId: "trace-1", cmd: "setup", userId: "u1" }, () => ctx());

      expect(seen).toEqual({
        traceId: "trace-1",
        cmd: "setup",
        userId: "u1",
      });
      expect(ctx()).toEqual({});
    });

    it("generates a trace id when none is given", () => {
      const traceId = runWithCtx({ cmd: "setup" }, () => ctx().traceId);
      expect(traceId).toMatch(/^[\w-]{11}$/);
    });

    it("replaces the outer context inside a nested run", () => {
      const inner = runWithCtx({ traceId: "outer", guildId: "g1" }, () =>
        runWithCtx({ traceId: "inner", cmd: "setup" }, () => ctx())
      );

      expect(inner).toEqual({ traceId: "inner", cmd: "setup" });
    });

    it("survives awaits", async () => {
      const traceId = await runWithCtx({ traceId: "async-trace" }, async () => {
        await new Promise((resolve) => setTimeout(resolve, 1));
        return ctx().traceId;
      });

      expect(traceId).toBe("async-trace");
    });

    it("keeps concurrent contexts apart", async () => {
      const read = (id: string, delay: number) =>
        runWithCtx({ traceId: id }, async () => {
          await new Promise((resolve) => setTimeout(resolve, delay));
          return ctx().traceId;
        });

      await expect(Promise.all([read("a", 5), read("b", 1)])).resolves.toEqual(["a", "b"]);
    });
  });
});
