/**
 * WHAT: Proves interaction routing and the startup token guard.
 * HOW: Imports the entrypoint under Vitest (no login, no process handlers) and drives
 *      handleInteraction/main with fakes.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MessageFlags, type Interaction } from "discord.js";

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../src/lib/logger.js", () => ({
  logger: loggerMock,
  redact: (value: string) => value,
}));

import { client, commands, handleInteraction, main } from "../src/index.js";
import { ctx } from "../src/lib/reqctx.js";
import { createMockInteraction } from "./utils/discordMocks.js";

beforeEach(() => {
  vi.clearAllMocks();
});

describe("handleInteraction", () => {
  it("registers /setup", () => {
    expect([...commands.keys()]).toEqual(["setup"]);
  });

  it("ignores anything that isn't a slash command", async () => {
    const reply = vi.fn();
    const button = { isChatInputCommand: () => false, reply } as unknown as Interaction;

    await handleInteraction(button);

    expect(reply).not.toHaveBeenCalled();
    expect(loggerMock.info).not.toHaveBeenCalled();
  });

  it("answers unknown commands ephemerally", async () => {
    const { asInteraction, state } = createMockInteraction({ commandName: "retired" });

    await handleInteraction(asInteraction());

    expect(state.reply).toHaveBeenCalledWith({
      content: "Unknown command.",
      flags: MessageFlags.Ephemeral,
    });
  });

  it("logs instead of throwing when the unknown-command reply fails", async () => {
    const { asInteraction, state } = createMockInteraction({ commandName: "retired" });
    state.reply.mockRejectedValueOnce(new Error("expired"));

    await expect(handleInteraction(asInteraction())).resolves.toBeUndefined();
    expect(loggerMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ traceId: expect.any(String) }),
      "Failed to reply with unknown command message"
    );
  });

  it("runs the command inside a request context", async () => {
    const original = commands.get("setup");
    const seen: Array<ReturnType<typeof ctx>> = [];
    commands.set("setup", async () => {
      seen.push(ctx());
    });

    try {
      const { asInteraction } = createMockInteraction({ userId: "user-9", guildId: "guild-9" });
      await handleInteraction(asInteraction());
    } finally {
      if (original) commands.set("setup", original);
    }

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({
      cmd: "setup",
      userId: "user-9",
      guildId: "guild-9",
      channelId: "channel-123",
    });
    expect(seen[0]?.traceId).toMatch(/^[\w-]{11}$/);
    expect(loggerMock.info).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "ix_enter", cmd: "setup", userId: "user-9" }),
      "interaction enter"
    );
  });
});

describe("main", () => {
  const savedToken = process.env.DISCORD_TOKEN;

  afterEach(() => {
    process.env.DISCORD_TOKEN = savedToken;
    vi.restoreAllMocks();
  });

  it("exits before login when DISCORD_TOKEN is missing", async () => {
    const login = vi.spyOn(client, "login").mockResolvedValue("test-token");
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    delete process.env.DISCORD_TOKEN;

    await expect(main()).rejects.toThrow("process.exit(1)");
    expect(login).not.toHaveBeenCalled();
  });

  it("logs in with the configured token", async () => {
    const login = vi.spyOn(client, "login").mockResolvedValue("test-token");

    await main();

    expect(login).toHaveBeenCalledWith("test-token");
  });
});
