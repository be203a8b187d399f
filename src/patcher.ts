// src/patcher.ts — Locate + rewrite in one call

import { rewrite } from "./document-rewriter.js";
import { locateKeyRecords } from "./record-locator.js";
import type { PatchConfig, PartLookup, RewriteResult } from "./types.js";

/**
 * Insert the configured derived records after every key record in `text`.
 * Pure: `text` is not modified and no I/O happens.
 */
export function enrichDocument(
  text: string,
  lookup: PartLookup,
  config: PatchConfig,
): RewriteResult {
  return rewrite(text, locateKeyRecords(text, config.targetKey), {
    derivedFields: config.derivedFields,
    lookup,
    gate: config.gate,
    template: config.template,
  });
}
