// src/region-scanner.ts — Balanced-region scanner
// Depth counting over "(" and ")", ignoring delimiters inside quoted strings.

import { MalformedDocumentError } from "./types.js";

const OPEN = "(";
const CLOSE = ")";
const QUOTE = '"';
const ESCAPE = "\\";

/**
 * Find the offset one past the ")" that closes the record opened at `openOffset`.
 * Delimiters inside double-quoted strings are ignored; a backslash inside a
 * string escapes the next character.
 *
 * @throws MalformedDocumentError if `openOffset` is not "(" or the text ends first.
 */
export function findMatchingClose(text: string, openOffset: number): number {
  if (text[openOffset] !== OPEN) {
    throw new MalformedDocumentError(
      `Expected "(" at offset ${openOffset}`,
      openOffset,
    );
  }

  let depth = 0;
  let inString = false;

  for (let i = openOffset; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (ch === ESCAPE) {
        i++;
      } else if (ch === QUOTE) {
        inString = false;
      }
      continue;
    }

    if (ch === QUOTE) {
      inString = true;
    } else if (ch === OPEN) {
      depth++;
    } else if (ch === CLOSE) {
      depth--;
      if (depth === 0) return i + 1;
    }
  }

  throw new MalformedDocumentError(
    `No matching ")" for the record opened at offset ${openOffset}`,
    openOffset,
  );
}

/**
 * Scan backward from `offset` to the first "(" that is not closed before it.
 * Returns -1 when there is none. Not string-aware: callers pass an offset whose
 * enclosing "(" is separated from it by whitespace only.
 */
export function findEnclosingOpen(text: string, offset: number): number {
  let depth = 0;
  for (let i = offset - 1; i >= 0; i--) {
    const ch = text[i];
    if (ch === CLOSE) {
      depth++;
    } else if (ch === OPEN) {
      if (depth === 0) return i;
      depth--;
    }
  }
  return -1;
}
