/**
 * Mangodia Bot — src/constants/serverInfo.ts
 * WHAT: Static text for the rules and FAQ posts.
 * WHY: Kept apart from the embed builders so staff can edit wording without touching layout.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export type InfoEntry = {
  emoji: string;
  title: string;
  body: string;
};

export const RULES_TITLE = "📜 **MANGODIA RULES**";
export const RULES_DESCRIPTION =
  "Please read and adhere to the following rules. Failure to do so will result in disciplinary action.";
export const RULES_FOOTER = "Thank you for your cooperation. • Mangodia Staff Team";

// Order matters: titles are numbered by position.
export const RULES: readonly InfoEntry[] = [
  {
    emoji: "💬",
    title: "Keep the Discussion Cordial",
    body: "Discrimination is not tolerated. This includes racism, sexism, homophobia, transphobia, ableism, etc. There's a fine line between edgy humour and actual discrimination. Keep it just witty banter, but nothing more. Millions must love.",
  },
  {
    emoji: "🚫",
    title: "NO EXTREMIST SYMBOLISM OR IDEOLOGY",
    body: "Discord does not bloody tolerate overt extremism of any kind, and they do not care if it's an edgy joke. Nazi or fascist adjacent symbolism will be immediately removed and you will be muted. This is not brain surgery; it's very simple.",
  },
  {
    emoji: "🔴",
    title: "NO PAEDOPHILIA",
    body: "Permaban.",
  },
  {
    emoji: "📢",
    title: "No raiding or spamming",
    body: "Raiding or spamming is grounds for a permaban at the discretion of a staff member. It's just Discord, it's not that serious. Don't ruin the server for other people.",
  },
  {
    emoji: "🔒",
    title: "No ban or mute evasion",
    body: "Staff will review ban and mute appeals with a degree of frequency. There is no reason to evade, this is grounds for a permaban. Staff members that abuse their permission will be reprimanded.",
  },
  {
    emoji: "🏷️",
    title: "Do not tag staff unless it is an emergency",
    body: "You aren't funny, you are just a bellend.",
  },
  {
    emoji: "🔞",
    title: "No NSFW/NSFL content",
    body: "All content must be Safe For Work. No explicit or NSFW material should be shared on this server. It's disturbing, and you should seek help instead of posting on Discord.",
  },
  {
    emoji: "🎭",
    title: "No Impersonation",
    body: "Do not impersonate other users, staff, or public figures. This includes using similar usernames, profile pictures, or pretending to be someone else in chat. Your impersonation slop account is not hilarious. Staff will not be laughing when you get kicked.",
  },
  {
    emoji: "📺",
    title: "No Self-Promotion or Advertising",
    body: "Don't advertise or promote your content, Discord servers, or other platforms without permission from mods. If you want to partner, do it through the appropriate avenues.",
  },
  {
    emoji: "🇬🇧",
    title: "ENGLISH ONLY",
    body: "There are ESL channels for non-English speakers. Otherwise, you must speak the King's English to keep discussion in general channels readable.",
  },
  {
    emoji: "📍",
    title: "Try to use the appropriate channel",
    body: "Try to keep content in the relevant channel to avoid cluttering channels.",
  },
  {
    emoji: "🔐",
    title: "Do not dox, threaten to dox, or share personal details",
    body: "Any malicious actors who threaten to dox any member of the server. You will be lucky if you only get banned. Discord should never be this serious, and we take the well-being of members of Mangodia seriously.",
  },
  {
    emoji: "⚖️",
    title: "Follow Discord TOS",
    body: "I know that none of you have read it, but everyone must comply with the Discord TOS regardless. If you do not comply with Discord TOS in any way then you will be banned.",
  },
];

export const FAQ_TITLE = "❓ **FREQUENTLY ASKED QUESTIONS**";

/** Lead-in shown above the GIF; the FAQ text follows it in the same embed. */
export const FAQ_GIF_BLURB =
  "🏃‍♂️ *The average attention span in this server is approximately that of a goldfish so we expect to still be countlessly asked these questions. Here's some Subway Surfers gameplay to keep your attention while you read the FAQ below!*";

export const FAQ_DESCRIPTION =
  "We expect to still be asked these questions countlessly despite this FAQ existing.";

export const FAQ_FOOTER = "Still have questions? Don't hesitate to ask in the general chat! 💬";

export const FAQ: readonly InfoEntry[] = [
  {
    emoji: "🖼️",
    title: "How do I get pic perms?",
    body: "Members who want image perms need to invite five members to the server. Invitations are tracked, and image perms are automatically given when a member invites five members to the server. This helps with growth and helps not to pollute the server with unfunny shitposts.",
  },
  {
    emoji: "🛡️",
    title: "How do I become a mod?",
    body: "We do not accept mod applications. Members will be given mod if Mango or anyone else with role perms likes them. If you aren't annoying and are semi-active, there's a very decent chance you will get mod.",
  },
  {
    emoji: "📋",
    title: "How do I appeal?",
    body: "There is a ticket system where people can send tickets with what punishment they received and a short explanation as to why it was not justified. Mods that repeatedly issue unfair infractions will be reprimanded and could be removed from the mod team.",
  },
];
