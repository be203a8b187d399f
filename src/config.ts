// src/config.ts — Config resolver
// Defaults ← config file ← environment ← CLI flags.

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { DEFAULT_CATALOG_CONFIG } from "./catalog/client.js";
import { DEFAULT_BOM_COLUMNS } from "./bom/reconcile.js";
import { DEFAULT_GATE_WINDOW } from "./enrichment-gate.js";
import { PROPERTY_TEMPLATE } from "./record-synthesizer.js";
import type { ConfigFile, DerivedField, GateMode, ResolvedConfig, TargetKey, Warning } from "./types.js";

export interface ParsedArgs {
  command?: string;
  paths: string[];
  output?: string;
  config?: string;
  exclude: string[];
  gateMode?: string;
  delay?: number;
  dryRun: boolean;
  noBackup: boolean;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

const CONFIG_FILENAME = "sch-enrich.config.json";
const PACKAGE_JSON_KEY = "schEnrich";

export const DEFAULT_VALUE_PATTERN = "^C[0-9]+$";

export const DEFAULT_DERIVED_FIELDS: DerivedField[] = [
  { name: "LCSC_Manufacturer", attribute: "displayName" },
  { name: "LCSC_MPN", attribute: "code" },
];

export const DEFAULT_TARGET_KEY: TargetKey = {
  recordName: "property",
  fieldName: "LCSC",
  valuePattern: new RegExp(DEFAULT_VALUE_PATTERN),
};

function defaults(): ResolvedConfig {
  return {
    patch: {
      targetKey: { ...DEFAULT_TARGET_KEY },
      derivedFields: DEFAULT_DERIVED_FIELDS.map((f) => ({ ...f })),
      gate: { recordName: DEFAULT_TARGET_KEY.recordName, windowSize: DEFAULT_GATE_WINDOW, mode: "all" },
      template: { ...PROPERTY_TEMPLATE },
    },
    catalog: { ...DEFAULT_CATALOG_CONFIG },
    bom: {
      keyColumns: [...DEFAULT_BOM_COLUMNS.keyColumns],
      mpnColumns: [...DEFAULT_BOM_COLUMNS.mpnColumns],
      manufacturerColumns: [...DEFAULT_BOM_COLUMNS.manufacturerColumns],
    },
    exclude: [],
    backup: true,
    dryRun: false,
    quiet: false,
    verbose: false,
  };
}

function isGateMode(value: unknown): value is GateMode {
  return value === "all" || value === "any";
}

function isDerivedField(value: unknown): value is DerivedField {
  if (typeof value !== "object" || value === null) return false;
  if (!("name" in value) || !("attribute" in value)) return false;
  return (
    typeof value.name === "string" &&
    value.name.length > 0 &&
    (value.attribute === "displayName" || value.attribute === "code")
  );
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

/**
 * `value` when it passes `isValid`, else `fallback`. An absent value falls
 * back silently; anything else present but invalid adds a warning.
 */
function pick<T>(
  value: unknown,
  isValid: (v: unknown) => v is T,
  fallback: T,
  key: string,
  warnings: Warning[],
): T {
  if (value === undefined) return fallback;
  if (isValid(value)) return value;
  warnings.push({
    level: "warn",
    module: "config",
    message: `Invalid ${key} ${JSON.stringify(value)}; using ${JSON.stringify(fallback)}`,
  });
  return fallback;
}

function compilePattern(
  source: string | undefined,
  warnings: Warning[],
): RegExp {
  if (source === undefined) return new RegExp(DEFAULT_VALUE_PATTERN);
  try {
    return new RegExp(source);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Invalid valuePattern ${JSON.stringify(source)} (${msg}); using ${DEFAULT_VALUE_PATTERN}`,
    });
    return new RegExp(DEFAULT_VALUE_PATTERN);
  }
}

/**
 * Resolve config from CLI args, config file, environment and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, warnings, cwd) ?? {};
  const config = defaults();

  // Target key
  const key = fileConfig.targetKey ?? {};
  config.patch.targetKey = {
    recordName: pick(key.recordName, isNonEmptyString, config.patch.targetKey.recordName, "targetKey.recordName", warnings),
    fieldName: pick(key.fieldName, isNonEmptyString, config.patch.targetKey.fieldName, "targetKey.fieldName", warnings),
    valuePattern: compilePattern(key.valuePattern, warnings),
  };

  // Derived fields
  if (fileConfig.derivedFields !== undefined) {
    const fields = Array.isArray(fileConfig.derivedFields) ? fileConfig.derivedFields : [];
    if (fields.length > 0 && fields.every(isDerivedField)) {
      config.patch.derivedFields = fields.map((f) => ({ name: f.name, attribute: f.attribute }));
    } else {
      warnings.push({
        level: "warn",
        module: "config",
        message: 'derivedFields must be a non-empty list of { name, attribute: "displayName" | "code" }; using defaults',
      });
    }
  }

  // Gate
  const gateMode = args.gateMode ?? fileConfig.gate?.mode;
  if (gateMode !== undefined) {
    if (isGateMode(gateMode)) {
      config.patch.gate.mode = gateMode;
    } else {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Unknown gate mode "${String(gateMode)}" (expected "all" or "any"); using "all"`,
      });
    }
  }
  config.patch.gate.windowSize = pick(
    fileConfig.gate?.windowSize,
    isPositiveInteger,
    config.patch.gate.windowSize,
    "gate.windowSize",
    warnings,
  );
  config.patch.gate.recordName = config.patch.targetKey.recordName;
  config.patch.template.recordName = config.patch.targetKey.recordName;

  // Catalog
  const catalog = fileConfig.catalog ?? {};
  for (const name of ["urlTemplate", "productUrlTemplate", "userAgent"] as const) {
    config.catalog[name] = pick(catalog[name], isNonEmptyString, config.catalog[name], `catalog.${name}`, warnings);
  }
  config.catalog.timeoutMs = pick(catalog.timeoutMs, isPositiveInteger, config.catalog.timeoutMs, "catalog.timeoutMs", warnings);
  for (const name of ["requestDelayMs", "retryDelayMs"] as const) {
    config.catalog[name] = pick(catalog[name], isNonNegativeNumber, config.catalog[name], `catalog.${name}`, warnings);
  }
  if (process.env.SCH_ENRICH_CATALOG_URL) {
    config.catalog.urlTemplate = process.env.SCH_ENRICH_CATALOG_URL;
  }
  if (args.delay !== undefined) {
    config.catalog.requestDelayMs = args.delay;
  }

  // BOM columns
  const bom = fileConfig.bom ?? {};
  for (const name of ["keyColumns", "mpnColumns", "manufacturerColumns"] as const) {
    config.bom[name] = pick(bom[name], isStringList, config.bom[name], `bom.${name}`, warnings);
  }

  config.exclude = [...pick(fileConfig.exclude, isStringList, [], "exclude", warnings), ...args.exclude];
  const backup = pick(fileConfig.backup, isBoolean, true, "backup", warnings);
  config.backup = args.noBackup ? false : backup;
  config.dryRun = args.dryRun;
  config.quiet = args.quiet;
  config.verbose = args.verbose;

  return config;
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
  cwd: string,
): ConfigFile | null {
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: { [PACKAGE_JSON_KEY]?: ConfigFile } = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (pkg[PACKAGE_JSON_KEY]) return pkg[PACKAGE_JSON_KEY];
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "info",
        module: "config",
        message: `Ignoring unreadable package.json: ${msg}`,
        file: pkgJson,
      });
    }
  }

  return null;
}

function parseConfigFile(
  filePath: string,
  warnings: Warning[],
): ConfigFile | null {
  try {
    const parsed: ConfigFile = JSON.parse(readFileSync(filePath, "utf-8"));
    return parsed;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function asStringList(value: unknown): string[] {
  if (Array.isArray(value)) return value.map(String);
  return typeof value === "string" ? [value] : [];
}

/**
 * Parse CLI args using mri. The first positional is the command.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { o: "output", c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["dry-run", "quiet", "verbose", "help", "version"],
    string: ["output", "config", "exclude", "gate-mode", "delay"],
  });

  const positionals = args._.map(String);
  const delay = asString(args.delay);
  const parsedDelay = delay !== undefined ? parseInt(delay, 10) : undefined;

  return {
    command: positionals[0],
    paths: positionals.slice(1),
    output: asString(args.output),
    config: asString(args.config),
    exclude: asStringList(args.exclude),
    gateMode: asString(args["gate-mode"]),
    delay: parsedDelay !== undefined && Number.isFinite(parsedDelay) && parsedDelay >= 0 ? parsedDelay : undefined,
    dryRun: args["dry-run"] === true,
    // mri turns --no-backup into backup: false
    noBackup: args.backup === false,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    help: args.help === true,
    version: args.version === true,
  };
}
