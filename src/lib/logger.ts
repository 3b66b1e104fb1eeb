/**
 * Mangodia Bot — src/lib/logger.ts
 * WHAT: The pino logger, string redaction, and the single path from error logs to Sentry.
 * FLOWS: logger.error({ err, ...fields }, msg) → logMethod hook → shouldReportToSentry → captureException
 * DOCS:
 *  - pino hooks: https://getpino.io/#/docs/api?id=hooks-object
 *  - pino-pretty: https://github.com/pinojs/pino-pretty
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { pino, levels, type LoggerOptions } from "pino";
import { classifyError, shouldReportToSentry } from "./errors.js";

// Discord bot token: three dot-separated base64url segments
const DISCORD_TOKEN_RE = /[\w-]{24}\.[\w-]{6}\.[\w-]{27}/g;
// Password part of a URL's userinfo (Sentry DSNs, proxy URLs)
const URL_SECRET_RE = /(https?:\/\/[^:@/\s]+):[^@/\s]+@/gi;
const MASS_MENTION_RE = /@(everyone|here)/gi;
const REDACT_MAX = 300;

/**
 * For text that came from Discord or a GIF API before it reaches a log line or
 * an error card: one line, no secrets, no pings, at most 300 chars.
 */
export function redact(value: string): string {
  if (!value) return "";
  const cleaned = value
    .replace(/\s+/g, " ")
    .trim()
    .replace(DISCORD_TOKEN_RE, "[redacted_token]")
    .replace(URL_SECRET_RE, "$1:[redacted]@")
    .replace(MASS_MENTION_RE, "@redacted");
  return cleaned.length > REDACT_MAX ? `${cleaned.slice(0, REDACT_MAX)}...` : cleaned;
}

/**
 * `err` serializer. discord.js errors hold the request body and client
 * references; only these four fields get logged.
 */
export function serializeErr(e: unknown): Record<string, unknown> {
  if (typeof e !== "object" || e === null) {
    return { message: String(e) };
  }
  return {
    name: Reflect.get(e, "name"),
    code: Reflect.get(e, "code"),
    message: Reflect.get(e, "message"),
    ...(e instanceof Error ? { stack: e.stack } : {}),
  };
}

let sentryLoadFailed = false;

/**
 * Sends the Error attached to an error-level record to Sentry when its
 * classification is reportable. The record's other fields ride along as context.
 * Callers never call captureException next to logger.error.
 */
function forwardToSentry(record: unknown, msg: string | undefined): void {
  let err: unknown = record;
  let fields: Record<string, unknown> = {};
  if (!(record instanceof Error) && typeof record === "object" && record !== null && "err" in record) {
    err = record.err;
    fields = Object.fromEntries(Object.entries(record).filter(([key]) => key !== "err"));
  }
  if (!(err instanceof Error) || !shouldReportToSentry(classifyError(err))) return;

  const error = err;
  // sentry.ts imports this module, hence the dynamic import
  import("./sentry.js")
    .then(({ captureException }) => captureException(error, { ...fields, msg }))
    .catch((importErr: unknown) => {
      if (sentryLoadFailed) return;
      sentryLoadFailed = true;
      console.warn("[logger] could not load Sentry:", String(importErr));
    });
}

const pretty = process.env.LOG_PRETTY === "true" && process.stdout.isTTY;
const logFile = process.env.LOG_FILE;

const transport: LoggerOptions["transport"] = pretty
  ? { target: "pino-pretty", options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" } }
  : logFile
    ? { target: "pino/file", options: { destination: logFile, mkdir: true } }
    : undefined;

export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  base: undefined,
  transport,
  serializers: { err: serializeErr },
  hooks: {
    logMethod(args, method, level) {
      if (level >= levels.values.error) {
        forwardToSentry(args[0], typeof args[1] === "string" ? args[1] : undefined);
      }
      return method.apply(this, args);
    },
  },
});
