/**
 * Mangodia Bot — src/ui/serverInfo.ts
 * WHAT: Renders the rules and FAQ constants into embeds for /setup.
 * DOCS:
 *  - Embed limits: https://discord.com/developers/docs/resources/message#embed-object-embed-limits
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder } from "discord.js";
import { COLORS } from "../lib/constants.js";
import {
  FAQ,
  FAQ_DESCRIPTION,
  FAQ_FOOTER,
  FAQ_GIF_BLURB,
  FAQ_TITLE,
  RULES,
  RULES_DESCRIPTION,
  RULES_FOOTER,
  RULES_TITLE,
  type InfoEntry,
} from "../constants/serverInfo.js";

function entryField(entry: InfoEntry, label: string) {
  return { name: `${entry.emoji} **${label}**`, value: entry.body, inline: false };
}

/**
 * Rules embed. Deterministic: same input constants, same embed, every call.
 * An embed rather than message content because the rules text runs past the
 * 2000-character limit of a plain message.
 */
export function buildRulesEmbed(): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(RULES_TITLE)
    .setDescription(RULES_DESCRIPTION)
    .setColor(COLORS.rules)
    .addFields(RULES.map((rule, i) => entryField(rule, `${i + 1}. ${rule.title}`)))
    .setFooter({ text: RULES_FOOTER });
}

/**
 * FAQ embed with the GIF as its image. A null URL (lookup failed or came back
 * empty) leaves the image off; the rest of the embed is unchanged.
 */
export function buildFaqEmbed(gifUrl: string | null): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(FAQ_TITLE)
    .setDescription(`${FAQ_GIF_BLURB}\n\n${FAQ_DESCRIPTION}`)
    .setColor(COLORS.faq)
    .addFields(FAQ.map((entry) => entryField(entry, entry.title)))
    .setFooter({ text: FAQ_FOOTER });

  if (gifUrl) {
    embed.setImage(gifUrl);
  }

  return embed;
}
