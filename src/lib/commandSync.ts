/**
 * Mangodia Bot — src/lib/commandSync.ts
 * WHAT: Bulk-overwrites the application's slash commands from buildCommands().
 * WHY: Keeps Discord's copy of /setup in step with the code on every start.
 * FLOWS: ready → syncCommands(client, GUILD_ID?) → commands.set(body[, guildId])
 * DOCS:
 *  - Bulk overwrite guild commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client } from "discord.js";
import { buildCommands } from "../commands/buildCommands.js";
import { logger } from "./logger.js";
import { classifyError, errorContext } from "./errors.js";

/**
 * Registers every command, scoped to one guild when guildId is given (instant)
 * or globally (up to an hour to show up).
 *
 * @returns Number of commands Discord now holds for that scope, or null on failure.
 */
export async function syncCommands(client: Client<true>, guildId?: string): Promise<number | null> {
  const body = buildCommands();
  const scope = guildId ? `guild:${guildId}` : "global";

  try {
    const registered = guildId
      ? await client.application.commands.set(body, guildId)
      : await client.application.commands.set(body);

    logger.info(
      { evt: "commands_synced", scope, count: registered.size, names: body.map((c) => c.name) },
      `[commands] Synced ${registered.size} command(s) (${scope})`
    );
    return registered.size;
  } catch (err) {
    const classified = classifyError(err);
    logger.error(
      { evt: "commands_sync_fail", scope, ...errorContext(classified), err },
      `[commands] Failed to sync commands (${scope})`
    );
    return null;
  }
}
