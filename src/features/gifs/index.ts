/**
 * Mangodia Bot — src/features/gifs/index.ts
 * WHAT: Picks one GIF for the FAQ embed from the configured search provider.
 * WHY: The FAQ post is useless if it waits on, or dies with, a third-party API.
 * FLOWS:
 *  - createGifProvider(): env → Tenor/Giphy provider, or null when unconfigured
 *  - findGif(): provider.search() under withRetry → pickRandom() → URL or null
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { env, type Env } from "../../lib/env.js";
import { withRetry } from "../../lib/retry.js";
import { classifyError, errorContext } from "../../lib/errors.js";
import { createTenorProvider } from "./tenor.js";
import { createGiphyProvider } from "./giphy.js";
import type { GifProvider } from "./types.js";

export type { GifProvider, GifProviderName } from "./types.js";

type GifConfig = Pick<
  Env,
  | "GIF_PROVIDER"
  | "TENOR_API_KEY"
  | "TENOR_CLIENT_KEY"
  | "GIPHY_API_KEY"
  | "GIF_SEARCH_TIMEOUT_MS"
>;

/**
 * Builds the provider GIF_PROVIDER names. A provider without its API key is
 * unavailable; the caller then posts the FAQ without an image.
 */
export function createGifProvider(config: GifConfig): GifProvider | null {
  switch (config.GIF_PROVIDER) {
    case "tenor":
      return config.TENOR_API_KEY
        ? createTenorProvider({
            apiKey: config.TENOR_API_KEY,
            clientKey: config.TENOR_CLIENT_KEY,
            timeoutMs: config.GIF_SEARCH_TIMEOUT_MS,
          })
        : null;
    case "giphy":
      return config.GIPHY_API_KEY
        ? createGiphyProvider({
            apiKey: config.GIPHY_API_KEY,
            timeoutMs: config.GIF_SEARCH_TIMEOUT_MS,
          })
        : null;
  }
}

/**
 * Uniform pick. `random` must return [0, 1) like Math.random; the index is
 * clamped anyway so a stub returning 1 can't fall off the end.
 */
export function pickRandom<T>(items: readonly T[], random: () => number = Math.random): T | null {
  if (items.length === 0) return null;
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index] ?? null;
}

export type FindGifDeps = {
  /** null means "no provider configured"; omitted means "build one from env" */
  provider?: GifProvider | null;
  random?: () => number;
  limit?: number;
  attempts?: number;
};

let defaultProvider: GifProvider | null | undefined;

function providerFromEnv(): GifProvider | null {
  if (defaultProvider === undefined) {
    defaultProvider = createGifProvider(env);
  }
  return defaultProvider;
}

/**
 * findGif
 * WHAT: One GIF URL for `query`, chosen at random from a fresh search.
 * RETURNS: The URL, or null when the provider is missing, the search fails
 *          after retries, or nothing matched.
 * THROWS: Never.
 */
export async function findGif(
  query: string = env.GIF_SEARCH_TERM,
  deps: FindGifDeps = {}
): Promise<string | null> {
  const provider = deps.provider === undefined ? providerFromEnv() : deps.provider;
  const limit = deps.limit ?? env.GIF_SEARCH_LIMIT;

  if (!provider) {
    logger.warn(
      { evt: "gif_lookup_skipped", gifProvider: env.GIF_PROVIDER },
      "[gifs] No GIF provider configured; posting without an image"
    );
    return null;
  }

  try {
    const urls = await withRetry(() => provider.search(query, limit), {
      attempts: deps.attempts ?? env.GIF_SEARCH_ATTEMPTS,
      label: "gif_search",
    });

    const picked = pickRandom(urls, deps.random);
    if (!picked) {
      logger.warn(
        { evt: "gif_lookup_empty", gifProvider: provider.name, query },
        "[gifs] Search returned no GIFs"
      );
      return null;
    }

    logger.debug(
      { evt: "gif_lookup_ok", gifProvider: provider.name, query, candidates: urls.length },
      "[gifs] Picked GIF"
    );
    return picked;
  } catch (err) {
    const classified = classifyError(err);
    logger.warn(
      { evt: "gif_lookup_fail", gifProvider: provider.name, query, ...errorContext(classified) },
      `[gifs] GIF search failed: ${classified.message}`
    );
    return null;
  }
}
