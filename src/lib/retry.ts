/**
 * Mangodia Bot — src/lib/retry.ts
 * WHAT: Retries a GIF search on transient failures (sockets, timeouts, 429, 5xx).
 * USAGE:
 *  const urls = await withRetry(() => provider.search(q, 20), { attempts: 2, label: "gif_search" });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "./logger.js";
import { classifyError, isRecoverable } from "./errors.js";

export type RetryPolicy = {
  attempts: number;
  label: string;
  /** Wait before the second attempt; doubles after each failure. Default 250ms. */
  baseDelayMs?: number;
};

/**
 * Runs fn up to `attempts` times. Permanent failures (401, bad body, ...)
 * are rethrown at once; the last transient one is rethrown when attempts run out.
 */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  const { attempts, label, baseDelayMs = 250 } = policy;
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new RangeError(`withRetry(${label}): attempts must be a positive integer, got ${attempts}`);
  }

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const classified = classifyError(err);
      if (attempt >= attempts || !isRecoverable(classified)) {
        throw err;
      }

      const delayMs = baseDelayMs * 2 ** (attempt - 1);
      logger.debug(
        { evt: "retry_wait", label, attempt, delayMs, errorKind: classified.kind },
        `[retry] ${label} attempt ${attempt}/${attempts} failed; retrying in ${delayMs}ms`
      );
      await sleep(delayMs);
    }
  }
}
