/**
 * Mangodia Bot — src/commands/setup.ts
 * WHAT: /setup posts the server rules and the FAQ (with a random GIF) in the current channel.
 * WHY: Staff run it once per rules channel instead of hand-writing the posts.
 * FLOWS:
 *  - /setup → permission/channel checks → defer (ephemeral) → rules embed → GIF lookup
 *    → FAQ embed → reactions → "Setup Complete" ephemerally
 *  - A failed send throws to wrapCommand, which shows the error card. No retry.
 * DOCS:
 *  - SlashCommandBuilder: https://discord.js.org/#/docs/builders/main/class/SlashCommandBuilder
 *  - Embeds: https://discord.js.org/#/docs/discord.js/main/class/EmbedBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  SlashCommandBuilder,
  PermissionFlagsBits,
  InteractionContextType,
  MessageFlags,
  type Message,
} from "discord.js";
import { replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { FAQ_REACTION, RULES_REACTION, SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";
import { logger } from "../lib/logger.js";
import { buildFaqEmbed, buildRulesEmbed } from "../ui/serverInfo.js";
import { findGif } from "../features/gifs/index.js";

export const NO_PERMISSION_MESSAGE = "❌ You need 'Manage Messages' permission to use this command.";
export const UNSENDABLE_CHANNEL_MESSAGE = "❌ I can't post in this channel. Run /setup in a server text channel.";
export const SETUP_COMPLETE_MESSAGE = "✅ **Setup Complete!**";

/**
 * Default permission: ManageMessages. Server admins can widen or narrow it in
 * Integrations settings, so execute() checks again.
 */
export const data = new SlashCommandBuilder()
  .setName("setup")
  .setDescription("Posts the server rules and FAQ embeds in the current channel.")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageMessages)
  .setContexts(InteractionContextType.Guild);

/**
 * Reactions are decoration; a missing Add Reactions permission shouldn't turn
 * a successful post into an error card.
 */
async function addReaction(message: Message, emoji: string, traceId: string): Promise<void> {
  try {
    await message.react(emoji);
  } catch (err) {
    logger.warn(
      { evt: "setup_react_fail", traceId, messageId: message.id, emoji, err },
      "[setup] Failed to add reaction"
    );
  }
}

export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction } = ctx;

  ctx.step("validate");
  if (!interaction.memberPermissions?.has(PermissionFlagsBits.ManageMessages)) {
    await replyOrEdit(interaction, { content: NO_PERMISSION_MESSAGE });
    return;
  }

  const channel = interaction.channel;
  if (!channel?.isSendable()) {
    await replyOrEdit(interaction, { content: UNSENDABLE_CHANNEL_MESSAGE });
    return;
  }

  // GIF lookup can outlast the 3s acknowledgement window
  ctx.step("defer");
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  ctx.step("send_rules");
  const rulesMessage = await channel.send({ embeds: [buildRulesEmbed()], allowedMentions: SAFE_ALLOWED_MENTIONS });

  // findGif never throws; null means the FAQ goes out without an image.
  ctx.step("gif_lookup");
  const gifUrl = await findGif();

  ctx.step("send_faq");
  const faqMessage = await channel.send({ embeds: [buildFaqEmbed(gifUrl)], allowedMentions: SAFE_ALLOWED_MENTIONS });

  ctx.step("react");
  await addReaction(rulesMessage, RULES_REACTION, ctx.traceId);
  await addReaction(faqMessage, FAQ_REACTION, ctx.traceId);

  ctx.step("reply");
  await replyOrEdit(interaction, { content: SETUP_COMPLETE_MESSAGE });

  logger.info(
    {
      evt: "setup_posted",
      traceId: ctx.traceId,
      channelId: interaction.channelId,
      rulesMessageId: rulesMessage.id,
      faqMessageId: faqMessage.id,
      hasGif: gifUrl !== null,
    },
    "[setup] Rules and FAQ posted"
  );
}
