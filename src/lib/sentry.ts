/**
 * Mangodia Bot — src/lib/sentry.ts
 * WHAT: Sentry bootstrap plus the two calls the bot makes: capture and flush.
 * WHY: Only logger.ts captures (after shouldReportToSentry); index.ts flushes on shutdown.
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import { env } from "./env.js";
import { logger } from "./logger.js";

const SECRET_ENV_KEYS = ["DISCORD_TOKEN", "SENTRY_DSN", "TENOR_API_KEY", "GIPHY_API_KEY"];
const TOKEN_RE = /[\w-]{24}\.[\w-]{6}\.[\w-]{27}/g;

let enabled = false;

/** https://<key>@<host>/<project>; anything else leaves Sentry off. */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const url = new URL(dsn);
    return /^https?:$/.test(url.protocol) && url.username !== "" && url.pathname.length > 1;
  } catch {
    return false;
  }
}

/**
 * Init options. No ignoreErrors list: shouldReportToSentry in the logger hook
 * is the only filter, so a Discord error that passes it is kept.
 */
export function buildSentryOptions(dsn: string): Sentry.NodeOptions {
  return {
    dsn,
    environment: env.SENTRY_ENVIRONMENT ?? env.NODE_ENV,
    release: `mangodia-bot@${process.env.npm_package_version ?? "dev"}`,
    tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
    beforeSend(event) {
      if (event.message) {
        event.message = event.message.replace(TOKEN_RE, "[redacted_token]");
      }
      const runtimeEnv = event.contexts?.runtime?.env;
      if (runtimeEnv && typeof runtimeEnv === "object") {
        for (const key of SECRET_ENV_KEYS) {
          if (key in runtimeEnv) Reflect.set(runtimeEnv, key, "[redacted]");
        }
      }
      return event;
    },
  };
}

/** No-op under Vitest and without a usable SENTRY_DSN. */
export function initializeSentry(): void {
  if (process.env.VITEST_WORKER_ID) return;
  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.info("[sentry] SENTRY_DSN unset or malformed; error tracking off");
    return;
  }

  const options = buildSentryOptions(env.SENTRY_DSN);
  Sentry.init(options);
  enabled = true;
  logger.info({ environment: options.environment }, "[sentry] error tracking on");
}

export function isSentryEnabled(): boolean {
  return enabled;
}

/** Event id, or null while disabled. `context` lands under the "log" context. */
export function captureException(error: Error, context: Record<string, unknown> = {}): string | null {
  if (!enabled) return null;
  return Sentry.captureException(error, { contexts: { log: context } });
}

/** Drains queued events before exit; true when there was nothing to drain. */
export async function flushSentry(timeoutMs: number): Promise<boolean> {
  if (!enabled) return true;
  return Sentry.close(timeoutMs);
}
