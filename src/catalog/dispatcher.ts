// src/catalog/dispatcher.ts — Sequential, rate-paced catalog resolution

import { toPartRecord } from "./client.js";
import type { CatalogPart, PartFetcher, PartLookup } from "../types.js";

export interface ResolveProgress {
  index: number;
  total: number;
  code: string;
  part: CatalogPart | undefined;
}

export interface ResolveOptions {
  delayMs: number;
  onProgress?: (progress: ResolveProgress) => void;
}

/**
 * Fetch `codes` one at a time in the given order, waiting `delayMs` between
 * consecutive requests. Codes that fail to resolve are absent from the result.
 */
export async function resolveParts(
  codes: readonly string[],
  fetcher: PartFetcher,
  options: ResolveOptions,
): Promise<Map<string, CatalogPart>> {
  const parts = new Map<string, CatalogPart>();

  for (let i = 0; i < codes.length; i++) {
    const code = codes[i];
    const part = await fetcher(code);
    if (part) parts.set(code, part);
    options.onProgress?.({ index: i + 1, total: codes.length, code, part });

    if (i < codes.length - 1 && options.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, options.delayMs));
    }
  }

  return parts;
}

export function lookupFromMap(parts: ReadonlyMap<string, CatalogPart>): PartLookup {
  return (key) => {
    const part = parts.get(key);
    return part ? toPartRecord(part) : undefined;
  };
}
