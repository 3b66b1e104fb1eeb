/**
 * WHAT: Proves syncCommands bulk-overwrites /setup in the right scope and never throws.
 * HOW: Fake Client<true> whose application.commands.set is a mock.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Client } from "discord.js";

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: loggerMock,
}));

import { syncCommands } from "../../src/lib/commandSync.js";
import { createDiscordAPIError } from "../utils/discordMocks.js";

function createClient(set: ReturnType<typeof vi.fn>): Client<true> {
  return { application: { commands: { set } } } as unknown as Client<true>;
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe("syncCommands", () => {
  it("registers globally without a guild id", async () => {
    const set = vi.fn().mockResolvedValue(new Map([["1", { name: "setup" }]]));

    await expect(syncCommands(createClient(set))).resolves.toBe(1);

    expect(set).toHaveBeenCalledTimes(1);
    expect(set.mock.calls[0]).toHaveLength(1);
    expect(set.mock.calls[0]?.[0]).toEqual([expect.objectContaining({ name: "setup" })]);
    expect(loggerMock.info).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "commands_synced", scope: "global", count: 1, names: ["setup"] }),
      "[commands] Synced 1 command(s) (global)"
    );
  });

  it("scopes registration to a guild when given one", async () => {
    const set = vi.fn().mockResolvedValue(new Map([["1", { name: "setup" }]]));

    await syncCommands(createClient(set), "guild-42");

    expect(set).toHaveBeenCalledWith([expect.objectContaining({ name: "setup" })], "guild-42");
  });

  it("logs and returns null when Discord rejects the overwrite", async () => {
    const set = vi.fn().mockRejectedValue(createDiscordAPIError(50001, "Missing Access", 403));

    await expect(syncCommands(createClient(set), "guild-42")).resolves.toBeNull();

    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "commands_sync_fail", scope: "guild:guild-42", errorKind: "permission" }),
      "[commands] Failed to sync commands (guild:guild-42)"
    );
  });
});
