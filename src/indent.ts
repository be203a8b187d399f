// src/indent.ts — Leading whitespace of the line a record starts on

/**
 * Return the run of spaces and tabs at the start of the line containing
 * `recordStart`, stopping at `recordStart`. Empty at column 0.
 */
export function inferIndent(text: string, recordStart: number): string {
  const lineStart = text.lastIndexOf("\n", recordStart - 1) + 1;
  const prefix = text.slice(lineStart, recordStart);
  return prefix.match(/^[ \t]*/)?.[0] ?? "";
}
