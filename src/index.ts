/**
 * Mangodia Bot — src/index.ts
 * WHAT: Process entrypoint: Discord client, interaction routing, command sync on ready, shutdown.
 * FLOWS:
 *  - ready → syncCommands (guild-scoped when GUILD_ID is set)
 *  - interactionCreate → runWithCtx → wrapCommand("setup") → execute
 *  - SIGINT/SIGTERM → destroy client → flush Sentry → exit
 * DOCS:
 *  - Client events: https://discord.js.org/#/docs/discord.js/main/class/Client
 *  - process events: https://nodejs.org/api/process.html#process-events
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, flushSentry } from "./lib/sentry.js";
import { SHUTDOWN_FLUSH_TIMEOUT_MS, UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
initializeSentry();

import {
  Client,
  GatewayIntentBits,
  Collection,
  MessageFlags,
  Events,
  type ChatInputCommandInteraction,
  type Interaction,
} from "discord.js";
import { logger } from "./lib/logger.js";
import { env } from "./lib/env.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { wrapCommand } from "./lib/cmdWrap.js";
import { newTraceId, runWithCtx } from "./lib/reqctx.js";
import { syncCommands } from "./lib/commandSync.js";
import { requireEnv } from "./util/ensureEnv.js";
import * as setup from "./commands/setup.js";

// /setup posts where it is run; member and message intents are not needed.
export const client = new Client({ intents: [GatewayIntentBits.Guilds] });

export const commands = new Collection<string, (interaction: ChatInputCommandInteraction) => Promise<void>>();
commands.set(setup.data.name, wrapCommand(setup.data.name, setup.execute));

export async function handleInteraction(interaction: Interaction): Promise<void> {
  if (!interaction.isChatInputCommand()) return;

  const meta = {
    traceId: newTraceId(),
    cmd: interaction.commandName,
    userId: interaction.user.id,
    guildId: interaction.guildId ?? null,
    channelId: interaction.channelId ?? null,
  };

  await runWithCtx(meta, async () => {
    logger.info({ evt: "ix_enter", ...meta }, "interaction enter");

    const run = commands.get(meta.cmd);
    if (run) {
      await run(interaction);
      return;
    }

    // Discord can still show a command this build no longer registers
    await interaction
      .reply({ content: "Unknown command.", flags: MessageFlags.Ephemeral })
      .catch((err: unknown) =>
        logger.warn({ err, traceId: meta.traceId }, "Failed to reply with unknown command message")
      );
  });
}

client.once(
  Events.ClientReady,
  wrapEvent(
    "ready",
    async (readyClient: Client<true>) => {
      logger.info({ tag: readyClient.user.tag, id: readyClient.user.id }, "Bot ready");
      if (!env.GUILD_ID) {
        logger.warn("[startup] GUILD_ID unset; registering commands globally");
      }
      await syncCommands(readyClient, env.GUILD_ID);
    },
    30_000
  )
);

client.on(Events.InteractionCreate, wrapEvent("interactionCreate", handleInteraction));

client.on(Events.Error, (err) => {
  logger.error({ evt: "client_error", err }, "[client] Discord client error");
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "[shutdown] stopping");

  try {
    client.removeAllListeners();
    await client.destroy();
    await flushSentry(SHUTDOWN_FLUSH_TIMEOUT_MS);
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "[shutdown] failed to stop cleanly");
    process.exit(1);
  }
}

/** Error logs reach Sentry through the logger, so these handlers only log. */
export function installProcessHandlers(): void {
  process.on("unhandledRejection", (reason) => {
    const err = reason instanceof Error ? reason : new Error(String(reason));
    logger.error({ evt: "unhandled_rejection", err }, "[process] Unhandled promise rejection");
  });

  process.on("uncaughtException", (err, origin) => {
    logger.error({ evt: "uncaught_exception", err, origin }, "[process] Uncaught exception; exiting");
    // time for the Sentry event to leave
    setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }
}

export async function main(): Promise<void> {
  // Exits before login when the token is missing
  const token = requireEnv("DISCORD_TOKEN");
  await client.login(token);
}

if (!process.env.VITEST_WORKER_ID) {
  installProcessHandlers();
  main().catch((err: unknown) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
