/**
 * Mangodia Bot — scripts/deploy-commands.ts
 * WHAT: CLI helper to bulk overwrite the bot's slash commands without starting the bot.
 * WHY: Faster iteration on guild-scoped commands; global registration for release.
 * FLOWS: build commands → resolve application id → REST PUT (guild or global) → print summary
 * USAGE:
 *  npm run deploy:cmds -- --guild <id>
 *  npm run deploy:cmds -- --global
 * DOCS:
 *  - REST client / Routes: https://discord.js.org/#/docs/rest/main/class/REST
 *  - Bulk overwrite guild commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
// GOTCHA: env.ts loads .env and validates DISCORD_TOKEN on import; keep it first.
import { env } from "../src/lib/env.js";
import { pathToFileURL } from "node:url";
import { REST, Routes } from "discord.js";
import { z } from "zod";
import { buildCommands } from "../src/commands/buildCommands.js";

const applicationSchema = z.object({ id: z.string().min(1) });
const registeredSchema = z.array(z.object({ name: z.string() }));

export type DeployTarget = { scope: "global" } | { scope: "guild"; guildId: string };

/**
 * Parses CLI flags. `--guild` without a value falls back to GUILD_ID.
 * @returns null when the flags don't name a target
 */
export function parseDeployArgs(args: string[], fallbackGuildId?: string): DeployTarget | null {
  if (args.includes("--global")) {
    return { scope: "global" };
  }
  const guildFlag = args.indexOf("--guild");
  if (guildFlag !== -1) {
    const next = args[guildFlag + 1];
    const guildId = next && !next.startsWith("--") ? next : fallbackGuildId;
    return guildId ? { scope: "guild", guildId } : null;
  }
  return null;
}

export async function deployCommands(token: string, target: DeployTarget): Promise<string[]> {
  /**
   * deployCommands
   * WHAT: PUTs buildCommands() to the target scope.
   * RETURNS: Names Discord reports as registered.
   * PITFALLS: Requires the applications.commands scope; otherwise expect 403/50001.
   */
  const rest = new REST({ version: "10" }).setToken(token);
  const app = applicationSchema.parse(await rest.get(Routes.currentApplication()));
  const route =
    target.scope === "guild"
      ? Routes.applicationGuildCommands(app.id, target.guildId)
      : Routes.applicationCommands(app.id);

  const registered = registeredSchema.parse(await rest.put(route, { body: buildCommands() }));
  return registered.map((cmd) => cmd.name);
}

/*
 * CLI entry point: only run when executed directly, not when imported.
 */
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  const target = parseDeployArgs(process.argv.slice(2), env.GUILD_ID);
  if (!target) {
    console.error("Usage: tsx scripts/deploy-commands.ts --guild <id> | --global");
    process.exit(1);
  }

  try {
    const names = await deployCommands(env.DISCORD_TOKEN, target);
    const scope = target.scope === "guild" ? `guild ${target.guildId}` : "global";
    console.log(`[deploy] registered ${names.length} command(s) (${scope}): ${names.join(", ")}`);
  } catch (err) {
    console.error("[deploy] failed:", err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}
