#!/usr/bin/env node
// CLI entry point for sch-enrich

import { parseCliArgs, resolveConfig } from "../config.js";
import { ENGINE_VERSION, FileNotFoundError, MissingColumnError } from "../types.js";
import type { Warning } from "../types.js";

const HELP_TEXT = `
sch-enrich v${ENGINE_VERSION}

Usage:
  sch-enrich enrich [paths...]           Add LCSC_Manufacturer / LCSC_MPN properties to schematics
  sch-enrich verify-bom <bom.csv>        Check a BOM CSV against the LCSC catalog

Arguments:
  paths                .kicad_sch files or directories to search (default: current directory)

Options:
  --dry-run            Report what would change without writing files
  --no-backup          Do not copy the original schematic to <file>.bak before writing
  --output, -o         verify-bom: write an enriched CSV with the derived columns
  --config, -c         Path to config file (default: sch-enrich.config.json)
  --exclude <glob>     Skip matching schematics when walking directories (repeatable)
  --gate-mode <mode>   all (default): skip a part only when every derived property exists
                       any: skip a part when at least one derived property exists
  --delay <ms>         Pause between catalog requests (default: 300)
  --quiet, -q          Suppress warnings
  --verbose, -v        Print resolved configuration
  --version            Print version
  --help, -h           Show this help text

Environment Variables:
  SCH_ENRICH_CATALOG_URL   Catalog URL template, {code} is replaced by the part code

Examples:
  npx sch-enrich enrich board.kicad_sch --dry-run
  npx sch-enrich enrich ./hardware --exclude "**/archive/**"
  npx sch-enrich verify-bom manufacturing/BOM/board_bom.csv -o enriched_bom.csv
`.trim();

function printWarnings(warnings: Warning[]): void {
  for (const w of warnings) {
    process.stderr.write(`[${w.level}] ${w.module}: ${w.message}${w.file ? ` (${w.file})` : ""}\n`);
  }
}

async function main() {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.version) {
    process.stdout.write(ENGINE_VERSION + "\n");
    process.exit(0);
  }

  if (args.help || !args.command) {
    process.stdout.write(HELP_TEXT + "\n");
    process.exit(args.help ? 0 : 1);
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);

  if (args.verbose) {
    process.stderr.write(`[INFO] Target: (${config.patch.targetKey.recordName} "${config.patch.targetKey.fieldName}" /${config.patch.targetKey.valuePattern.source}/)\n`);
    process.stderr.write(`[INFO] Derived fields: ${config.patch.derivedFields.map((f) => f.name).join(", ")}\n`);
    process.stderr.write(`[INFO] Gate: ${config.patch.gate.mode} within ${config.patch.gate.windowSize} chars\n`);
    process.stderr.write(`[INFO] Catalog: ${config.catalog.urlTemplate} (delay ${config.catalog.requestDelayMs}ms)\n`);
  }

  if (args.command === "enrich") {
    const { runEnrich } = await import("./enrich.js");
    const summary = await runEnrich({ config, paths: args.paths });
    if (!args.quiet) printWarnings([...warnings, ...summary.warnings]);
    process.exit(summary.files.some((f) => f.status === "failed") ? 1 : 0);
  }

  if (args.command === "verify-bom") {
    const bomPath = args.paths[0];
    if (!bomPath) {
      process.stderr.write("[error] verify-bom needs a BOM CSV path\n");
      process.exit(1);
    }
    const { runVerifyBom } = await import("./verify-bom.js");
    try {
      const result = await runVerifyBom({ config, bomPath, outputPath: args.output });
      if (!args.quiet) printWarnings([...warnings, ...result.warnings]);
    } catch (err: unknown) {
      if (err instanceof FileNotFoundError || err instanceof MissingColumnError) {
        process.stderr.write(`[error] ${err.message}\n`);
        process.exit(1);
      }
      throw err;
    }
    process.exit(0);
  }

  process.stderr.write(`[error] Unknown command "${args.command}"\n\n${HELP_TEXT}\n`);
  process.exit(1);
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
