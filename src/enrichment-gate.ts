// src/enrichment-gate.ts — Enrichment gate
// Decides whether a key record is already followed by its derived records.

import type { GateOptions } from "./types.js";

export const DEFAULT_GATE_WINDOW = 300;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Inspect `options.windowSize` characters after `recordEnd` for
 * `(<recordName> "<name>"` openers of the derived fields.
 *
 * In "all" mode every derived name must be present; a partially enriched site
 * is reported as not enriched. In "any" mode one is enough.
 */
export function isAlreadyEnriched(
  text: string,
  recordEnd: number,
  derivedFieldNames: readonly string[],
  options: GateOptions,
): boolean {
  const window = text.slice(recordEnd, recordEnd + options.windowSize);
  const recordName = escapeRegExp(options.recordName);

  const isPresent = (name: string): boolean =>
    new RegExp(`\\(\\s*${recordName}\\s+"${escapeRegExp(name)}"`).test(window);

  return options.mode === "any"
    ? derivedFieldNames.some(isPresent)
    : derivedFieldNames.every(isPresent);
}
