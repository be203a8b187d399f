// src/bin/enrich.ts — `enrich` command
// Discover schematics, resolve their LCSC codes once, patch each file.

import { copyFileSync, readFileSync, writeFileSync } from "node:fs";
import { relative } from "node:path";
import { createCatalogFetcher } from "../catalog/client.js";
import { lookupFromMap, resolveParts } from "../catalog/dispatcher.js";
import { discoverSchematics } from "../file-discovery.js";
import { enrichDocument } from "../patcher.js";
import { collectKeyValues } from "../record-locator.js";
import type { PartFetcher, ResolvedConfig, RewriteResult, Warning } from "../types.js";

export interface EnrichOptions {
  config: ResolvedConfig;
  paths: string[];
  /** Replaces the catalog client; used by tests and library callers. */
  fetcher?: PartFetcher;
  cwd?: string;
  log?: (line: string) => void;
}

export type FileStatus = "written" | "dry-run" | "unchanged" | "failed";

export interface FileResult {
  file: string;
  status: FileStatus;
  applied: number;
  skipped: number;
  unresolved: number;
  backupPath?: string;
  error?: string;
}

export interface EnrichSummary {
  codes: string[];
  resolved: number;
  files: FileResult[];
  warnings: Warning[];
}

function stderr(line: string): void {
  process.stderr.write(line + "\n");
}

/**
 * Run the enrich command. Never throws for per-file problems: a file whose
 * structure cannot be patched is reported with status "failed" and left as is.
 */
export async function runEnrich(options: EnrichOptions): Promise<EnrichSummary> {
  const { config } = options;
  const cwd = options.cwd ?? process.cwd();
  const log = options.log ?? stderr;
  const warnings: Warning[] = [];
  const summary: EnrichSummary = { codes: [], resolved: 0, files: [], warnings };

  const inputs = options.paths.length > 0 ? options.paths : [cwd];
  const files = discoverSchematics(inputs, config.exclude, warnings);
  if (files.length === 0) {
    log("No schematic files found. Nothing to do.");
    return summary;
  }

  // Read everything up front and collect codes across all sheets
  const contents = new Map<string, string>();
  const codes = new Set<string>();
  for (const file of files) {
    try {
      const text = readFileSync(file, "utf-8");
      for (const code of collectKeyValues(text, config.patch.targetKey)) codes.add(code);
      contents.set(file, text);
    } catch (err: unknown) {
      const entry = failed(file, err);
      summary.files.push(entry);
      log(`[error] ${relative(cwd, file) || file}: ${entry.error}; file skipped`);
    }
  }

  summary.codes = [...codes].sort();
  log(`Found ${summary.codes.length} unique ${config.patch.targetKey.fieldName} codes in ${files.length} schematic file(s)`);
  if (summary.codes.length === 0) {
    log("Nothing to do.");
    return summary;
  }

  const fetcher = options.fetcher ?? createCatalogFetcher(config.catalog, warnings);
  const parts = await resolveParts(summary.codes, fetcher, {
    delayMs: config.catalog.requestDelayMs,
    onProgress: ({ index, total, code, part }) => {
      log(`[${index}/${total}] Fetching ${code}... ${part ? `${part.manufacturer} / ${part.mpn}` : "FAILED"}`);
    },
  });
  summary.resolved = parts.size;
  log(`Fetched ${parts.size}/${summary.codes.length} parts successfully`);

  const lookup = lookupFromMap(parts);
  for (const [file, text] of contents) {
    const name = relative(cwd, file) || file;
    let result: RewriteResult;
    try {
      result = enrichDocument(text, lookup, config.patch);
    } catch (err: unknown) {
      const entry = failed(file, err);
      summary.files.push(entry);
      log(`[error] ${name}: ${entry.error}; file left unchanged`);
      continue;
    }
    warnings.push(...result.warnings.map((w) => ({ ...w, file })));

    const entry: FileResult = {
      file,
      status: "unchanged",
      applied: result.applied,
      skipped: result.skipped,
      unresolved: result.unresolved,
    };
    log(`${name}: ${result.applied} parts enriched, ${result.skipped} already enriched, ${result.unresolved} unresolved`);

    if (config.dryRun) {
      entry.status = "dry-run";
    } else if (result.applied > 0) {
      try {
        if (config.backup) {
          entry.backupPath = file + ".bak";
          copyFileSync(file, entry.backupPath);
          log(`  Backup saved to: ${relative(cwd, entry.backupPath) || entry.backupPath}`);
        }
        writeFileSync(file, result.text);
        entry.status = "written";
      } catch (err: unknown) {
        const failure = failed(file, err);
        summary.files.push(failure);
        log(`[error] ${name}: ${failure.error}; file left unchanged`);
        continue;
      }
    }
    summary.files.push(entry);
  }

  if (config.dryRun) {
    log("(Dry run — no changes written)");
  } else if (!summary.files.some((f) => f.status === "written")) {
    log("No changes needed.");
  }

  return summary;
}

function failed(file: string, err: unknown): FileResult {
  return {
    file,
    status: "failed",
    applied: 0,
    skipped: 0,
    unresolved: 0,
    error: err instanceof Error ? `${err.name}: ${err.message}` : String(err),
  };
}
