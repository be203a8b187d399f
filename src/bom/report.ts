// src/bom/report.ts — Fixed-width BOM verification report

import type { BomRowResult, BomRowStatus, ReconcileResult } from "../types.js";

const RULE = "=".repeat(80);

const ICONS: Record<BomRowStatus, string> = {
  OK: "+",
  MISMATCH: "!",
  "NO MPN": "?",
  "MISSING LCSC": " ",
  "FETCH FAILED": " ",
};

export function formatRow(row: BomRowResult): string {
  if (row.status === "MISSING LCSC") {
    return `  MISSING LCSC  ${row.designator.padEnd(12)}  ${row.value}`;
  }
  if (row.status === "FETCH FAILED" || !row.part) {
    return `  FETCH FAILED  ${row.designator.padEnd(12)}  ${row.value}  [${row.code}]`;
  }

  let line =
    `  ${ICONS[row.status]} ${row.status.padEnd(10)}  ${row.designator.padEnd(12)}  ` +
    `${row.code.padEnd(10)}  ${row.part.manufacturer.padEnd(20)}  ${row.part.mpn}`;
  if (row.notes.length > 0) line += `  -- ${row.notes.join("; ")}`;
  return line;
}

export function formatReport(result: ReconcileResult): string {
  const { summary } = result;
  return [
    RULE,
    "BOM VERIFICATION REPORT",
    RULE,
    "",
    ...result.rows.map(formatRow),
    "",
    RULE,
    `SUMMARY: ${summary.ok} OK, ${summary.missingMpn} missing MPN in schematic, ` +
      `${summary.mismatched} mismatched, ${summary.missingKey} missing LCSC code, ` +
      `${summary.fetchFailed} fetch failed`,
    RULE,
  ].join("\n");
}
