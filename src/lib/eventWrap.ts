/**
 * Mangodia Bot — src/lib/eventWrap.ts
 * WHAT: wrapEvent() turns a gateway listener into one that can't reject or hang.
 * WHY: A listener that rejects becomes an unhandledRejection; one that hangs blocks nothing but is never noticed.
 * FLOWS: handler(...args) raced against a timer → event_error log (Sentry via the logger hook)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { env } from "./env.js";
import { classifyError, errorContext } from "./errors.js";

type Listener<T extends unknown[]> = (...args: T) => Promise<void> | void;

export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: Listener<T>,
  timeoutMs: number = env.EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`${eventName} handler exceeded ${timeoutMs}ms`)), timeoutMs);
    });

    try {
      await Promise.race([handler(...args), deadline]);
    } catch (err) {
      const classified = classifyError(err);
      logger.error(
        { evt: "event_error", event: eventName, ...errorContext(classified, extractEventContext(args)), err },
        `[${eventName}] event handler failed: ${classified.message}`
      );
    } finally {
      clearTimeout(timer);
    }
  };
}

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

function idOf(value: unknown, key: string): string | undefined {
  const found = field(value, key);
  return typeof found === "string" ? found : undefined;
}

/** guildId, channelId, userId and the first payload's own id, where present. */
export function extractEventContext(args: unknown[]): Record<string, string> {
  const ids: Record<string, string> = {};
  for (const arg of args) {
    const guildId = idOf(arg, "guildId");
    const channelId = idOf(arg, "channelId");
    const userId = idOf(field(arg, "user"), "id");
    const entityId = idOf(arg, "id");
    if (guildId) ids.guildId = guildId;
    if (channelId) ids.channelId = channelId;
    if (userId) ids.userId = userId;
    if (entityId && !ids.entityId) ids.entityId = entityId;
  }
  return ids;
}
