// src/bin/verify-bom.ts — `verify-bom` command
// Look up every LCSC code in a BOM CSV and report against the schematic columns.

import { resolve } from "node:path";
import { readBomTable, writeBomTable } from "../bom/csv-table.js";
import { collectTableKeys, detectColumns, enrichTable, reconcileTable } from "../bom/reconcile.js";
import { formatReport } from "../bom/report.js";
import { createCatalogFetcher } from "../catalog/client.js";
import { resolveParts } from "../catalog/dispatcher.js";
import type { PartFetcher, ReconcileResult, ResolvedConfig, Warning } from "../types.js";

export interface VerifyBomOptions {
  config: ResolvedConfig;
  bomPath: string;
  outputPath?: string;
  fetcher?: PartFetcher;
  log?: (line: string) => void;
  out?: (text: string) => void;
}

export interface VerifyBomResult {
  reconcile: ReconcileResult;
  outputPath?: string;
  warnings: Warning[];
}

/**
 * @throws FileNotFoundError when the BOM does not exist
 * @throws MissingColumnError when no key column is present
 */
export async function runVerifyBom(options: VerifyBomOptions): Promise<VerifyBomResult> {
  const { config } = options;
  const log = options.log ?? ((line: string) => process.stderr.write(line + "\n"));
  const out = options.out ?? ((text: string) => process.stdout.write(text + "\n"));
  const warnings: Warning[] = [];

  const table = readBomTable(resolve(options.bomPath));
  const columns = detectColumns(table.headers, config.bom);
  const valuePattern = config.patch.targetKey.valuePattern;

  const codes = collectTableKeys(table, columns.key, valuePattern);
  log(`Found ${codes.length} unique LCSC parts to verify`);

  const fetcher = options.fetcher ?? createCatalogFetcher(config.catalog, warnings);
  const parts = await resolveParts(codes, fetcher, {
    delayMs: config.catalog.requestDelayMs,
    onProgress: ({ index, total, code, part }) => {
      log(`[${index}/${total}] Fetching ${code}... ${part ? `${part.manufacturer} / ${part.mpn} (${part.package})` : "FAILED"}`);
    },
  });

  const reconcile = reconcileTable(table, parts, columns, valuePattern);
  out(formatReport(reconcile));

  let outputPath: string | undefined;
  if (options.outputPath) {
    outputPath = resolve(options.outputPath);
    writeBomTable(outputPath, enrichTable(table, parts, columns.key, config.patch.derivedFields));
    log(`Enriched BOM written to: ${outputPath}`);
  }

  return { reconcile, outputPath, warnings };
}
