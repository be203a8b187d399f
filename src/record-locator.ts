// src/record-locator.ts — Record locator
// Finds every `(<recordName> "<fieldName>" "<value>" ...)` record in document order.

import { findEnclosingOpen, findMatchingClose } from "./region-scanner.js";
import { MalformedDocumentError, NestedRecordError } from "./types.js";
import type { KeySite, TargetKey } from "./types.js";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function keyMatcher(key: TargetKey): RegExp {
  return new RegExp(
    `(?<=\\(\\s*)${escapeRegExp(key.recordName)}\\s+"${escapeRegExp(key.fieldName)}"\\s+"((?:[^"\\\\]|\\\\.)*)"`,
    "g",
  );
}

/**
 * Lazily yield every key record whose value satisfies `key.valuePattern`.
 * Each call starts a fresh scan.
 *
 * @throws MalformedDocumentError when a key record has no enclosing "(" or no matching ")".
 * @throws NestedRecordError when a key record starts inside the previous one.
 */
export function* locateKeyRecords(
  text: string,
  key: TargetKey,
): Generator<KeySite, void, undefined> {
  const matcher = keyMatcher(key);
  let previous: KeySite | undefined;

  for (const match of text.matchAll(matcher)) {
    const value = match[1];
    if (!key.valuePattern.test(value)) continue;

    const nameOffset = match.index ?? 0;
    const start = findEnclosingOpen(text, nameOffset);
    if (start === -1) {
      throw new MalformedDocumentError(
        `Key record at offset ${nameOffset} has no opening "("`,
        nameOffset,
      );
    }
    if (previous && start < previous.end) {
      throw new NestedRecordError(previous.start, start);
    }

    const site: KeySite = { value, start, end: findMatchingClose(text, start) };
    previous = site;
    yield site;
  }
}

/**
 * Unique key values in the document, sorted.
 */
export function collectKeyValues(text: string, key: TargetKey): string[] {
  const values = new Set<string>();
  for (const site of locateKeyRecords(text, key)) {
    values.add(site.value);
  }
  return [...values].sort();
}
