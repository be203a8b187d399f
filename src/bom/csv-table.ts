// src/bom/csv-table.ts — BOM CSV read/write through SheetJS

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import * as XLSX from "xlsx";
import { FileNotFoundError } from "../types.js";
import type { BomTable } from "../types.js";

const UTF8_BOM = "\uFEFF";

function cellText(cell: unknown): string {
  if (cell === undefined || cell === null) return "";
  return String(cell);
}

/**
 * Parse CSV text into headers + rows keyed by header. Cells stay raw text
 * (no number or date coercion). Rows shorter than the header are padded
 * with empty strings; fully blank rows are dropped.
 */
export function parseBomTable(text: string): BomTable {
  const source = text.startsWith(UTF8_BOM) ? text.slice(UTF8_BOM.length) : text;
  if (source.trim() === "") return { headers: [], rows: [] };
  const workbook = XLSX.read(source, { type: "string", raw: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return { headers: [], rows: [] };

  const grid = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
    header: 1,
    raw: true,
    defval: "",
    blankrows: false,
  });
  if (grid.length === 0) return { headers: [], rows: [] };

  const headers = grid[0].map(cellText);
  const rows = grid.slice(1).map((cells) => {
    const row: Record<string, string> = {};
    headers.forEach((header, i) => {
      row[header] = cellText(cells[i]);
    });
    return row;
  });

  return { headers, rows };
}

export function readBomTable(filePath: string): BomTable {
  if (!existsSync(filePath)) throw new FileNotFoundError(filePath);
  return parseBomTable(readFileSync(filePath, "utf-8"));
}

export function serializeBomTable(table: BomTable): string {
  const grid = [
    table.headers,
    ...table.rows.map((row) => table.headers.map((h) => row[h] ?? "")),
  ];
  const sheet = XLSX.utils.aoa_to_sheet(grid);
  return XLSX.utils.sheet_to_csv(sheet) + "\n";
}

export function writeBomTable(filePath: string, table: BomTable): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, serializeBomTable(table));
}
