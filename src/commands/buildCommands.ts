// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Aggregates every slash command definition for bulk registration with Discord.
// buildCommands() returns the JSON payloads that get PUT to Discord's API.
//
// GOTCHA: Discord caches slash commands. Global commands can take up to an hour to
// propagate; guild commands update instantly, so set GUILD_ID during development.

import type { RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import { data as setupData } from "./setup.js";

export function buildCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return [setupData.toJSON()];
}
