/**
 * Mangodia Bot — src/features/gifs/giphy.ts
 * WHAT: Giphy search integration.
 * WHY: Alternative GIF source when GIF_PROVIDER=giphy.
 * DOCS: https://developers.giphy.com/docs/api/endpoint#search
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { HttpStatusError, ResponseShapeError } from "../../lib/errors.js";
import type { GifProvider, ProviderRequestOptions } from "./types.js";

export const GIPHY_SEARCH_URL = "https://api.giphy.com/v1/gifs/search";

const giphySearchSchema = z.object({
  data: z.array(
    z.object({
      images: z.object({
        original: z.object({ url: z.string().optional() }).optional(),
      }),
    })
  ),
});

export function createGiphyProvider(opts: ProviderRequestOptions): GifProvider {
  return {
    name: "giphy",
    async search(query, limit) {
      const url = new URL(GIPHY_SEARCH_URL);
      url.searchParams.set("api_key", opts.apiKey);
      url.searchParams.set("q", query);
      url.searchParams.set("limit", String(limit));
      url.searchParams.set("rating", "pg-13");

      const response = await fetch(url, { signal: AbortSignal.timeout(opts.timeoutMs) });

      if (!response.ok) {
        throw new HttpStatusError(response.status, GIPHY_SEARCH_URL);
      }

      const parsed = giphySearchSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ResponseShapeError("data", "Giphy response did not match the expected shape");
      }

      return parsed.data.data
        .map((gif) => gif.images.original?.url)
        .filter((gifUrl): gifUrl is string => !!gifUrl);
    },
  };
}
