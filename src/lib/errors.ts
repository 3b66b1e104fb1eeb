/**
 * Mangodia Bot — src/lib/errors.ts
 * WHAT: Sorts anything thrown during /setup or a GIF search into a small tagged union.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError
 *  - isRecoverable() decides GIF search retries; shouldReportToSentry() gates Sentry
 *  - errorContext() flattens a classification into log fields
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

type Base = { message: string; cause?: Error };

export type ClassifiedError =
  /** Discord REST failure that isn't about permissions, e.g. 10003 Unknown Channel */
  | (Base & { kind: "discord_api"; code: number; httpStatus?: number })
  /** 50013 (can't act) or 50001 (can't see) */
  | (Base & { kind: "permission"; code: 50001 | 50013 })
  /** Non-2xx from a GIF provider */
  | (Base & { kind: "http"; status: number; url: string })
  /** GIF provider body that failed schema validation */
  | (Base & { kind: "validation"; field: string })
  /** Request never completed: socket errors and fetch timeouts */
  | (Base & { kind: "network"; code: string; host?: string })
  | (Base & { kind: "unknown" });

export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, message = `HTTP ${status}`) {
    super(message);
    this.name = "HttpStatusError";
    this.status = status;
    this.url = url;
  }
}

export class ResponseShapeError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "ResponseShapeError";
    this.field = field;
  }
}

const SOCKET_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"]);

/** Property read that tolerates primitives and foreign objects. */
function prop(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * undici rejects with TypeError("fetch failed") and hides the socket error on
 * `cause`, so both levels are checked.
 */
function socketError(err: unknown): { code: string; host?: string } | null {
  for (const candidate of [err, prop(err, "cause")]) {
    const code = str(prop(candidate, "code"));
    if (code && SOCKET_CODES.has(code)) {
      return { code, host: str(prop(candidate, "hostname")) ?? str(prop(candidate, "host")) };
    }
  }
  return null;
}

export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const message = str(prop(err, "message")) ?? String(err);
  const cause = err instanceof Error ? err : undefined;

  if (err instanceof HttpStatusError) {
    return { kind: "http", status: err.status, url: err.url, message, cause };
  }
  if (err instanceof ResponseShapeError) {
    return { kind: "validation", field: err.field, message, cause };
  }

  const code = prop(err, "code");
  if (code === 50001 || code === 50013) {
    return { kind: "permission", code, message, cause };
  }
  if (typeof code === "number" && str(prop(err, "name"))?.startsWith("DiscordAPIError")) {
    const status = prop(err, "status") ?? prop(err, "httpStatus");
    return {
      kind: "discord_api",
      code,
      httpStatus: typeof status === "number" ? status : undefined,
      message,
      cause,
    };
  }

  // AbortSignal.timeout() rejects fetch with a TimeoutError DOMException
  const name = str(prop(err, "name"));
  if (name === "TimeoutError" || name === "AbortError") {
    return { kind: "network", code: "ETIMEDOUT", message, cause };
  }

  const socket = socketError(err);
  if (socket) {
    return { kind: "network", ...socket, message, cause };
  }

  return { kind: "unknown", message, cause };
}

/** GIF search retries: sockets, timeouts, 429 and 5xx. Discord 429s are retried by discord.js itself. */
export function isRecoverable(err: ClassifiedError): boolean {
  if (err.kind === "network") return true;
  if (err.kind === "http") return err.status === 429 || err.status >= 500;
  if (err.kind === "discord_api") return (err.httpStatus ?? 0) >= 500;
  return false;
}

// Expired/double-acked interactions and vanished channels or messages
const QUIET_DISCORD_CODES = new Set([10003, 10008, 10062, 40060]);

/**
 * Only bugs and misconfiguration go to Sentry. A 4xx other than 429 from a
 * GIF provider means the key or request is wrong; outages are left to the logs.
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api":
      return !QUIET_DISCORD_CODES.has(err.code);
    case "http":
      return err.status >= 400 && err.status < 500 && err.status !== 429;
    case "unknown":
      return true;
    default:
      return false;
  }
}

export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = { errorKind: err.kind, errorMessage: err.message, ...extra };

  switch (err.kind) {
    case "discord_api":
      return { ...base, discordCode: err.code, httpStatus: err.httpStatus };
    case "permission":
      return { ...base, discordCode: err.code };
    case "http":
      return { ...base, httpStatus: err.status, url: err.url };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "validation":
      return { ...base, field: err.field };
    default:
      return base;
  }
}
