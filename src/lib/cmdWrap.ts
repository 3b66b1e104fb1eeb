/**
 * Mangodia Bot — src/lib/cmdWrap.ts
 * WHAT: wrapCommand() gives a slash command a trace id, phase logging, and an error card on failure;
 *       replyOrEdit() answers an interaction with whichever method its state allows.
 * FLOWS: cmd_start → step(phase)… → cmd_ok | cmd_error + postErrorCard
 * DOCS:
 *  - Responding to interactions: https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  type ChatInputCommandInteraction,
  type InteractionReplyOptions,
} from "discord.js";
import { logger } from "./logger.js";
import { ctx as reqCtx, newTraceId } from "./reqctx.js";
import { classifyError, errorContext } from "./errors.js";
import { postErrorCard } from "./errorCard.js";

export type CommandContext = {
  interaction: ChatInputCommandInteraction;
  readonly traceId: string;
  /** Names the work that follows, e.g. "send_rules"; the error card reports the last one. */
  step: (phase: string) => void;
};

export type CommandExecutor = (ctx: CommandContext) => Promise<void>;

function codeOf(value: unknown): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, "code") : undefined;
}

/**
 * The returned handler never rejects. A throw from `run` is logged as
 * cmd_error (which is also the Sentry path) and shown to the invoker as an
 * ephemeral error card.
 */
export function wrapCommand(name: string, run: CommandExecutor) {
  return async (interaction: ChatInputCommandInteraction): Promise<void> => {
    const traceId = reqCtx().traceId ?? newTraceId();
    const startedAt = Date.now();
    let phase = "enter";

    const commandCtx: CommandContext = {
      interaction,
      traceId,
      step: (next) => {
        phase = next;
        logger.info({ evt: "cmd_step", traceId, cmd: name, phase });
      },
    };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: name,
        userId: interaction.user.id,
        guildId: interaction.guildId ?? "dm",
        channelId: interaction.channelId,
      },
      "command start"
    );

    try {
      await run(commandCtx);
      logger.info({ evt: "cmd_ok", traceId, cmd: name, ms: Date.now() - startedAt }, "command ok");
    } catch (thrown) {
      const err = thrown instanceof Error ? thrown : new Error(String(thrown));
      const classified = classifyError(thrown);
      logger.error(
        { evt: "cmd_error", traceId, cmd: name, phase, ...errorContext(classified), err },
        `command error: ${classified.message}`
      );
      await postErrorCard(interaction, {
        traceId,
        cmd: name,
        phase,
        err: { name: err.name, code: codeOf(thrown), message: err.message },
      });
    }
  };
}

/**
 * reply() on a fresh interaction, followUp() after a reply, editReply() after
 * a defer. Ephemeral unless the payload sets flags; an edit keeps whatever
 * visibility the defer chose, so flags are dropped there.
 *
 * 10062 (expired) and 40060 (already acknowledged) leave nothing to answer
 * and are logged as warnings; other failures are rethrown unlogged, for the
 * caller's own error log.
 */
export async function replyOrEdit(
  interaction: ChatInputCommandInteraction,
  payload: InteractionReplyOptions
): Promise<void> {
  const { flags = MessageFlags.Ephemeral, ...body } = payload;
  try {
    if (interaction.deferred) {
      await interaction.editReply(body);
    } else if (interaction.replied) {
      await interaction.followUp({ ...body, flags });
    } else {
      await interaction.reply({ ...body, flags });
    }
  } catch (err) {
    const code = codeOf(err);
    if (code !== 10062 && code !== 40060) throw err;
    logger.warn(
      { evt: "cmd_reply_fail", traceId: reqCtx().traceId, code, err },
      "reply skipped; interaction expired or already acknowledged"
    );
  }
}
