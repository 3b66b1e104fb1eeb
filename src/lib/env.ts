/**
 * Mangodia Bot — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on a missing token; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";
import { GIF_SEARCH_MAX_LIMIT } from "./constants.js";

// override: false in tests lets test env vars set before imports win over a local .env
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

const optionalString = z.string().optional();

export const envSchema = z.object({
  // The only hard requirement. Without it the client can't log in.
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  GUILD_ID: optionalString,
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: optionalString,

  SENTRY_DSN: optionalString,
  SENTRY_ENVIRONMENT: optionalString,
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  GIF_PROVIDER: z.enum(["tenor", "giphy"]).default("tenor"),
  TENOR_API_KEY: optionalString,
  TENOR_CLIENT_KEY: z.string().min(1).default("mangodia-bot"),
  GIPHY_API_KEY: optionalString,
  GIF_SEARCH_TERM: z.string().min(1).default("subway surfers"),
  GIF_SEARCH_LIMIT: z.coerce.number().int().min(1).max(GIF_SEARCH_MAX_LIMIT).default(20),
  GIF_SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  GIF_SEARCH_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),

  EVENT_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
});

export type Env = z.infer<typeof envSchema>;

export type EnvParseResult = { ok: true; env: Env } | { ok: false; issues: string[] };

/**
 * Validates a raw environment record. Values are trimmed, and a blank value
 * counts as unset so its default applies: `.env.example` ships every key
 * blank. safeParse reports all issues at once.
 */
export function parseEnv(source: Record<string, string | undefined>): EnvParseResult {
  const raw: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = source[key]?.trim();
    raw[key] = value ? value : undefined;
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`),
    };
  }
  return { ok: true, env: parsed.data };
}

function loadEnv(): Env {
  const result = parseEnv(process.env);
  if (!result.ok) {
    console.error(`Environment validation failed:\n${result.issues.join("\n")}`);
    process.exit(1);
  }
  return result.env;
}

export const env = loadEnv();
