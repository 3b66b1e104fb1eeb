/**
 * Mangodia Bot — tests/setup.ts
 * WHAT: Global Vitest setup for deterministic tests.
 * WHY: src/lib/env.ts validates process.env on import, so placeholders must exist first.
 *
 * This file runs before EVERY test file via the setupFiles config in vitest.config.ts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { afterEach, vi } from "vitest";

// Top level, not beforeAll: test files import env.ts before any hook runs.
process.env.DISCORD_TOKEN = "test-token";
process.env.GIF_PROVIDER = "tenor";
process.env.TENOR_API_KEY = "test-secret";
process.env.GIF_SEARCH_TERM = "subway surfers";
process.env.GIF_SEARCH_ATTEMPTS = "2";
process.env.LOG_LEVEL = "silent";
delete process.env.GUILD_ID;
delete process.env.SENTRY_DSN;

afterEach(() => {
  // A test using vi.useFakeTimers() must not leak into the next one.
  vi.clearAllTimers();
  vi.useRealTimers();
});
