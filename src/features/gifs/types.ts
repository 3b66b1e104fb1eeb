/**
 * Mangodia Bot — src/features/gifs/types.ts
 * WHAT: Type definitions for GIF search.
 * WHY: Shared between the orchestrator and the provider integrations.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** Supported GIF search services */
export type GifProviderName = "tenor" | "giphy";

/**
 * A GIF search backend. search() resolves to direct GIF URLs, possibly none,
 * and rejects on HTTP, network or response-shape failures.
 */
export interface GifProvider {
  readonly name: GifProviderName;
  search(query: string, limit: number): Promise<string[]>;
}

/** Per-request settings shared by every provider */
export type ProviderRequestOptions = {
  apiKey: string;
  timeoutMs: number;
};
