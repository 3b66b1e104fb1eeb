/**
 * Mangodia Bot — src/lib/reqctx.ts
 * WHAT: Per-interaction context (trace id, command, ids) carried across awaits.
 * WHY: Log lines deep inside findGif or replyOrEdit can name the /setup run they belong to.
 * DOCS:
 *  - AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export type ReqContext = {
  traceId: string;
  cmd?: string;
  userId?: string;
  guildId?: string | null;
  channelId?: string | null;
};

const als = new AsyncLocalStorage<ReqContext>();

/** 8 random bytes as base64url: 11 chars, short enough to read out of an error card. */
export function newTraceId(): string {
  return randomBytes(8).toString("base64url");
}

/** Runs fn with `meta` as the current context; a trace id is minted if meta has none. */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  return als.run({ ...meta, traceId: meta.traceId ?? newTraceId() }, fn);
}

/** Current context, or {} outside of one. */
export function ctx(): Partial<ReqContext> {
  return als.getStore() ?? {};
}
