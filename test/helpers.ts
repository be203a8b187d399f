import { DEFAULT_GATE_WINDOW } from "../src/enrichment-gate.js";
import { PROPERTY_TEMPLATE } from "../src/record-synthesizer.js";
import type { ParsedArgs } from "../src/config.js";
import type { PartLookup, PartRecord, PatchConfig } from "../src/types.js";

// ─── Schematic builders ──────────────────────────────────────────────────────

/** A hidden property block indented by two tabs, as KiCad writes inside a symbol. */
export function propertyBlock(name: string, value: string, indent = "\t\t"): string {
  return [
    `${indent}(property "${name}" "${value}"`,
    `${indent}\t(at 0 0 0)`,
    `${indent}\t(effects`,
    `${indent}\t\t(font`,
    `${indent}\t\t\t(size 1.27 1.27)`,
    `${indent}\t\t)`,
    `${indent}\t\t(hide yes)`,
    `${indent}\t)`,
    `${indent})`,
  ].join("\n");
}

export function lcscBlock(code: string): string {
  return [
    `\t\t(property "LCSC" "${code}"`,
    "\t\t\t(at 100 50 0)",
    "\t\t\t(effects",
    "\t\t\t\t(font",
    "\t\t\t\t\t(size 1.27 1.27)",
    "\t\t\t\t)",
    "\t\t\t\t(hide yes)",
    "\t\t\t)",
    "\t\t)",
  ].join("\n");
}

export function symbol(reference: string, body: string[]): string {
  return [
    "\t(symbol",
    '\t\t(lib_id "Device:C")',
    "\t\t(at 100 50 0)",
    `\t\t(property "Reference" "${reference}"`,
    "\t\t\t(at 101 48 0)",
    "\t\t)",
    ...body,
    '\t\t(property "Description" "Codec (stereo) \\"audio\\""',
    "\t\t\t(at 100 50 0)",
    "\t\t)",
    "\t)",
  ].join("\n");
}

export function schematic(symbols: string[]): string {
  return [
    "(kicad_sch",
    "\t(version 20231120)",
    '\t(generator "eeschema")',
    ...symbols,
    ")",
    "",
  ].join("\n");
}

/** The text the patcher inserts after an LCSC block indented by two tabs. */
export function insertionFor(manufacturer: string, mpn: string): string {
  return (
    "\n" + propertyBlock("LCSC_Manufacturer", manufacturer) +
    "\n" + propertyBlock("LCSC_MPN", mpn)
  );
}

// ─── Config builders ─────────────────────────────────────────────────────────

export function makePatchConfig(overrides: Partial<PatchConfig> = {}): PatchConfig {
  return {
    targetKey: { recordName: "property", fieldName: "LCSC", valuePattern: /^C[0-9]+$/ },
    derivedFields: [
      { name: "LCSC_Manufacturer", attribute: "displayName" },
      { name: "LCSC_MPN", attribute: "code" },
    ],
    gate: { recordName: "property", windowSize: DEFAULT_GATE_WINDOW, mode: "all" },
    template: { ...PROPERTY_TEMPLATE },
    ...overrides,
  };
}

export function mapLookup(entries: Record<string, PartRecord>): PartLookup {
  return (key) => entries[key];
}

export function makeArgs(overrides: Partial<ParsedArgs> = {}): ParsedArgs {
  return {
    paths: [],
    exclude: [],
    dryRun: false,
    noBackup: false,
    quiet: false,
    verbose: false,
    help: false,
    version: false,
    ...overrides,
  };
}
