// src/bom/reconcile.ts — Compare BOM rows against catalog parts

import { MissingColumnError } from "../types.js";
import type {
  BomColumnConfig,
  BomColumns,
  BomRowResult,
  BomSummary,
  BomTable,
  CatalogPart,
  DerivedField,
  ReconcileResult,
} from "../types.js";
import { toPartRecord } from "../catalog/client.js";

export const DEFAULT_BOM_COLUMNS: BomColumnConfig = {
  keyColumns: ["LCSC", "LCSC PART #", "LCSC PART#"],
  mpnColumns: ["MPN", "MANUFACTURER_PART_NUMBER"],
  manufacturerColumns: ["MANUFACTURER"],
};

/** Trim and drop surrounding double quotes. */
export function cleanCell(value: string | undefined): string {
  return (value ?? "").trim().replace(/^"+|"+$/g, "");
}

function findColumn(headers: string[], candidates: string[]): string | undefined {
  const wanted = new Set(candidates.map((c) => c.toUpperCase()));
  return headers.find((h) => wanted.has(h.trim().toUpperCase()));
}

/**
 * Locate the key, MPN and manufacturer columns. The key column is required.
 */
export function detectColumns(headers: string[], config: BomColumnConfig): BomColumns {
  const key = findColumn(headers, config.keyColumns);
  if (!key) throw new MissingColumnError(config.keyColumns);
  return {
    key,
    mpn: findColumn(headers, config.mpnColumns),
    manufacturer: findColumn(headers, config.manufacturerColumns),
  };
}

/** Unique valid key values in the table, sorted. */
export function collectTableKeys(
  table: BomTable,
  keyColumn: string,
  valuePattern: RegExp,
): string[] {
  const keys = new Set<string>();
  for (const row of table.rows) {
    const code = cleanCell(row[keyColumn]);
    if (valuePattern.test(code)) keys.add(code);
  }
  return [...keys].sort();
}

export function reconcileTable(
  table: BomTable,
  parts: ReadonlyMap<string, CatalogPart>,
  columns: BomColumns,
  valuePattern: RegExp,
): ReconcileResult {
  const summary: BomSummary = { ok: 0, missingMpn: 0, mismatched: 0, missingKey: 0, fetchFailed: 0 };
  const rows: BomRowResult[] = [];

  for (const row of table.rows) {
    const code = cleanCell(row[columns.key]);
    const designator = cleanCell(row["Designator"]);
    const value = cleanCell(row["Value"]);
    const schMpn = columns.mpn ? cleanCell(row[columns.mpn]) : "";

    if (!valuePattern.test(code)) {
      summary.missingKey++;
      rows.push({ status: "MISSING LCSC", designator, value, code, notes: [] });
      continue;
    }

    const part = parts.get(code);
    if (!part) {
      summary.fetchFailed++;
      rows.push({ status: "FETCH FAILED", designator, value, code, notes: [] });
      continue;
    }

    if (schMpn && part.mpn && schMpn.toUpperCase() !== part.mpn.toUpperCase()) {
      summary.mismatched++;
      rows.push({
        status: "MISMATCH",
        designator,
        value,
        code,
        part,
        notes: [`MPN: schematic=${schMpn} vs LCSC=${part.mpn}`],
      });
    } else if (!schMpn && part.mpn) {
      summary.missingMpn++;
      rows.push({
        status: "NO MPN",
        designator,
        value,
        code,
        part,
        notes: [`LCSC has: ${part.manufacturer} / ${part.mpn}`],
      });
    } else {
      summary.ok++;
      rows.push({ status: "OK", designator, value, code, part, notes: [] });
    }
  }

  return { columns, rows, summary };
}

/**
 * Copy of `table` with one column per derived field appended, filled from the
 * resolved part of each row (empty when unresolved).
 */
export function enrichTable(
  table: BomTable,
  parts: ReadonlyMap<string, CatalogPart>,
  keyColumn: string,
  derivedFields: readonly DerivedField[],
): BomTable {
  const added = derivedFields.map((f) => f.name).filter((name) => !table.headers.includes(name));
  return {
    headers: [...table.headers, ...added],
    rows: table.rows.map((row) => {
      const part = parts.get(cleanCell(row[keyColumn]));
      const record = part ? toPartRecord(part) : undefined;
      const enriched = { ...row };
      for (const field of derivedFields) {
        enriched[field.name] = record ? record[field.attribute] : "";
      }
      return enriched;
    }),
  };
}
