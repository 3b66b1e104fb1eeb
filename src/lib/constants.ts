/**
 * Mangodia Bot — src/lib/constants.ts
 * WHAT: Centralized application constants for colors, delays, and limits
 * WHY: Single source of truth for magic numbers
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/**
 * Suppresses all @mentions in messages (users, roles, everyone/here).
 * The rules text names staff roles in prose; posting it must not ping anyone.
 */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

// ===== Embed Colors =====

export const COLORS = {
  rules: 0xff6b6b,
  faq: 0x45b7d1,
  error: 0xed4245,
} as const;

// ===== Reactions =====

/** Added under the posted rules message */
export const RULES_REACTION = "📜";

/** Added under the posted FAQ message */
export const FAQ_REACTION = "❓";

// ===== Timeouts & Delays =====

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

/** Sentry flush budget during graceful shutdown */
export const SHUTDOWN_FLUSH_TIMEOUT_MS = 2000;

// ===== Limits =====

/** Tenor and Giphy both cap a search page at 50 results */
export const GIF_SEARCH_MAX_LIMIT = 50;
