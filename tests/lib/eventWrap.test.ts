/**
 * Mangodia Bot — tests/lib/eventWrap.test.ts
 * WHAT: Unit tests for event handler wrapper.
 * WHY: Verify error protection, timeouts, and context extraction.
 *      Sentry reporting through the real logger lives in eventWrap.reporting.test.ts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: loggerMock,
}));

import { wrapEvent, extractEventContext } from "../../src/lib/eventWrap.js";
import { createDiscordAPIError } from "../utils/discordMocks.js";

describe("eventWrap", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("extractEventContext", () => {
    it("extracts guild, channel, user, and entity ids", () => {
      const result = extractEventContext([
        { id: "ix-1", guildId: "guild-123", channelId: "chan-9", user: { id: "user-7" } },
      ]);
      expect(result).toEqual({
        guildId: "guild-123",
        channelId: "chan-9",
        userId: "user-7",
        entityId: "ix-1",
      });
    });

    it("keeps the first entity id", () => {
      expect(extractEventContext([{ id: "first" }, { id: "second" }]).entityId).toBe("first");
    });

    it("ignores primitives and unknown shapes", () => {
      expect(extractEventContext([null, 42, "text", { guildId: 5 }])).toEqual({});
    });
  });

  describe("wrapEvent", () => {
    it("passes arguments through to the handler", async () => {
      const handler = vi.fn(async (_a: string, _b: number) => undefined);
      const wrapped = wrapEvent("test", handler, 1000);

      await wrapped("x", 2);

      expect(handler).toHaveBeenCalledWith("x", 2);
      expect(loggerMock.error).not.toHaveBeenCalled();
    });

    it("logs handler errors without rethrowing", async () => {
      const wrapped = wrapEvent(
        "interactionCreate",
        async (_ix: { guildId: string }) => {
          throw new Error("handler blew up");
        },
        1000
      );

      await expect(wrapped({ guildId: "guild-1" })).resolves.toBeUndefined();

      expect(loggerMock.error).toHaveBeenCalledWith(
        expect.objectContaining({
          evt: "event_error",
          event: "interactionCreate",
          errorKind: "unknown",
          guildId: "guild-1",
        }),
        "[interactionCreate] event handler failed: handler blew up"
      );
    });

    it("logs Discord API errors with their code", async () => {
      const wrapped = wrapEvent(
        "interactionCreate",
        async () => {
          throw createDiscordAPIError(10062, "Unknown interaction", 404);
        },
        1000
      );

      await wrapped();

      expect(loggerMock.error).toHaveBeenCalledTimes(1);
      expect(loggerMock.error).toHaveBeenCalledWith(
        expect.objectContaining({ errorKind: "discord_api", discordCode: 10062, httpStatus: 404 }),
        "[interactionCreate] event handler failed: Unknown interaction"
      );
    });

    it("logs non-Error rejections", async () => {
      const wrapped = wrapEvent(
        "ready",
        async () => {
          throw "string failure";
        },
        1000
      );

      await wrapped();

      expect(loggerMock.error).toHaveBeenCalledWith(
        expect.objectContaining({ evt: "event_error", event: "ready", errorKind: "unknown", err: "string failure" }),
        "[ready] event handler failed: string failure"
      );
    });

    describe("timeouts", () => {
      beforeEach(() => {
        vi.useFakeTimers();
      });

      afterEach(() => {
        vi.useRealTimers();
      });

      it("gives up on handlers that outlive the timeout", async () => {
        const wrapped = wrapEvent("ready", () => new Promise<void>(() => undefined), 500);

        const pending = wrapped();
        await vi.advanceTimersByTimeAsync(500);
        await pending;

        expect(loggerMock.error).toHaveBeenCalledWith(
          expect.objectContaining({ evt: "event_error", event: "ready" }),
          "[ready] event handler failed: ready handler exceeded 500ms"
        );
      });

      it("clears the timer once the handler settles", async () => {
        const wrapped = wrapEvent("ready", async () => undefined, 500);

        await wrapped();

        expect(vi.getTimerCount()).toBe(0);
      });
    });
  });
});
