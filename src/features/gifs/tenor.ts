/**
 * Mangodia Bot — src/features/gifs/tenor.ts
 * WHAT: Tenor v2 search integration.
 * WHY: Default GIF source for the FAQ embed.
 * DOCS: https://developers.google.com/tenor/guides/endpoints#search
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { HttpStatusError, ResponseShapeError } from "../../lib/errors.js";
import type { GifProvider, ProviderRequestOptions } from "./types.js";

export const TENOR_SEARCH_URL = "https://tenor.googleapis.com/v2/search";

/*
 * Only the fields we read. media_formats holds one entry per requested
 * format; with media_filter=gif that is just "gif", but Tenor may omit it
 * for some results, so it stays optional and those results are dropped.
 */
const tenorSearchSchema = z.object({
  results: z.array(
    z.object({
      media_formats: z.object({
        gif: z.object({ url: z.string().optional() }).optional(),
      }),
    })
  ),
});

export type TenorOptions = ProviderRequestOptions & {
  /** Identifies this integration to Tenor; not a secret */
  clientKey: string;
};

export function createTenorProvider(opts: TenorOptions): GifProvider {
  return {
    name: "tenor",
    async search(query, limit) {
      const url = new URL(TENOR_SEARCH_URL);
      url.searchParams.set("q", query);
      url.searchParams.set("key", opts.apiKey);
      url.searchParams.set("client_key", opts.clientKey);
      url.searchParams.set("limit", String(limit));
      url.searchParams.set("media_filter", "gif");
      url.searchParams.set("contentfilter", "medium");

      const response = await fetch(url, { signal: AbortSignal.timeout(opts.timeoutMs) });

      // The key rides in the query string, so errors carry the bare endpoint.
      if (!response.ok) {
        throw new HttpStatusError(response.status, TENOR_SEARCH_URL);
      }

      const parsed = tenorSearchSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ResponseShapeError("results", "Tenor response did not match the expected shape");
      }

      return parsed.data.results
        .map((result) => result.media_formats.gif?.url)
        .filter((gifUrl): gifUrl is string => !!gifUrl);
    },
  };
}
