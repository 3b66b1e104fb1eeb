/**
 * Mangodia Bot — src/lib/errorCard.ts
 * WHAT: The ephemeral "Command Error" embed shown when /setup fails partway.
 * WHY: The invoker sees which phase broke, the Discord code, a hint, and a trace id to hand to staff.
 * DOCS:
 *  - Discord JSON error codes: https://discord.com/developers/docs/topics/opcodes-and-status-codes#json
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, MessageFlags, type ChatInputCommandInteraction } from "discord.js";
import { logger, redact } from "./logger.js";
import { replyOrEdit } from "./cmdWrap.js";
import { COLORS } from "./constants.js";

type ErrorLike = { name?: string; code?: unknown; message?: string };

const DISCORD_HINTS: Record<number, string> = {
  10003: "Channel not found. It may have been deleted or the bot lacks visibility.",
  10062: "The interaction expired before the bot answered. Run /setup again.",
  40060: "This interaction was already answered.",
  50001: "Bot lacks access to this channel. Check channel visibility and role permissions.",
  50013: "Missing Discord permission in this channel. The bot needs Send Messages and Embed Links.",
  50035: "Discord rejected the message format. Report this to staff with the trace ID.",
};

const NETWORK_HINT = "Network hiccup talking to Discord. Try again in a moment.";
const FALLBACK_HINT = "Unexpected error. Try again or contact staff.";

export function hintFor(err: ErrorLike | null | undefined): string {
  const code = err?.code;
  if (typeof code === "number" && code in DISCORD_HINTS) {
    return DISCORD_HINTS[code] ?? FALLBACK_HINT;
  }
  if (err?.name === "TimeoutError" || code === "ETIMEDOUT" || code === "ECONNRESET") {
    return NETWORK_HINT;
  }
  return FALLBACK_HINT;
}

const MESSAGE_MAX = 200;

export type ErrorCardDetails = {
  traceId: string;
  cmd: string;
  phase: string;
  err: ErrorLike;
};

/** Resolves even when the card can't be delivered; that failure is only logged. */
export async function postErrorCard(
  interaction: ChatInputCommandInteraction,
  details: ErrorCardDetails
): Promise<void> {
  const { err } = details;
  const code =
    typeof err.code === "string" || typeof err.code === "number" ? String(err.code) : (err.name ?? "unknown");
  const safeMessage = err.message ? redact(err.message) : "No message provided";
  const message = safeMessage.length > MESSAGE_MAX ? `${safeMessage.slice(0, MESSAGE_MAX)}...` : safeMessage;

  const embed = new EmbedBuilder()
    .setTitle("Command Error")
    .setColor(COLORS.error)
    .addFields(
      { name: "Command", value: `/${details.cmd}`, inline: true },
      { name: "Phase", value: details.phase || "unknown", inline: true },
      { name: "Code", value: code, inline: true },
      { name: "Message", value: message },
      { name: "Trace", value: details.traceId, inline: true },
      { name: "Hint", value: hintFor(err) }
    )
    .setFooter({ text: new Date().toISOString() });

  try {
    await replyOrEdit(interaction, { embeds: [embed], flags: MessageFlags.Ephemeral });
  } catch (deliveryErr) {
    logger.error(
      { evt: "error_card_fail", traceId: details.traceId, err: deliveryErr },
      "failed to deliver error card"
    );
  }
}
