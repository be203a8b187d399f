// src/types.ts — Shared types for the schematic enricher
// Core patcher types, catalog types, BOM types, config, warnings and errors.

export const ENGINE_VERSION = "0.3.0";

// ─── Core: target key, sites, derived fields ────────────────────────────────

/**
 * The anchor record the locator searches for, e.g.
 * `(property "LCSC" "C2040" ...)`.
 */
export interface TargetKey {
  recordName: string;
  fieldName: string;
  valuePattern: RegExp;
}

/** One located key record, identified by offsets into the document. */
export interface KeySite {
  value: string;
  /** Offset of the opening "(" of the key record. */
  start: number;
  /** Offset one past the matching ")". */
  end: number;
}

/** Attributes resolved for a key value, consumed by the rewriter. */
export interface PartRecord {
  displayName: string;
  code: string;
}

export type PartAttribute = keyof PartRecord;

/** A record synthesized after each key record, filled from one part attribute. */
export interface DerivedField {
  name: string;
  attribute: PartAttribute;
}

export type PartLookup = (key: string) => PartRecord | undefined;

export type GateMode = "all" | "any";

export interface GateOptions {
  recordName: string;
  windowSize: number;
  mode: GateMode;
}

export interface RecordTemplate {
  recordName: string;
  indentUnit: string;
  fontSize: number;
  hidden: boolean;
}

export interface PatchConfig {
  targetKey: TargetKey;
  derivedFields: DerivedField[];
  gate: GateOptions;
  template: RecordTemplate;
}

export type SiteStatus = "applied" | "skipped" | "unresolved" | "rejected";

export interface SiteOutcome extends KeySite {
  status: SiteStatus;
}

export interface RewriteResult {
  text: string;
  applied: number;
  skipped: number;
  /** Sites with no lookup entry, plus sites whose values were rejected. */
  unresolved: number;
  outcomes: SiteOutcome[];
  warnings: Warning[];
}

// ─── Catalog ─────────────────────────────────────────────────────────────────

export interface CatalogPart {
  manufacturer: string;
  mpn: string;
  package: string;
  description: string;
  stock: number;
  productUrl: string;
}

export type PartFetcher = (code: string) => Promise<CatalogPart | undefined>;

export interface CatalogConfig {
  /** `{code}` is replaced with the URL-encoded part code. */
  urlTemplate: string;
  productUrlTemplate: string;
  userAgent: string;
  timeoutMs: number;
  requestDelayMs: number;
  retryDelayMs: number;
}

// ─── BOM tables ──────────────────────────────────────────────────────────────

export interface BomTable {
  headers: string[];
  rows: Record<string, string>[];
}

export type BomRowStatus = "OK" | "NO MPN" | "MISMATCH" | "MISSING LCSC" | "FETCH FAILED";

export interface BomRowResult {
  status: BomRowStatus;
  designator: string;
  value: string;
  code: string;
  part?: CatalogPart;
  notes: string[];
}

export interface BomColumns {
  key: string;
  mpn?: string;
  manufacturer?: string;
}

export interface BomSummary {
  ok: number;
  missingMpn: number;
  mismatched: number;
  missingKey: number;
  fetchFailed: number;
}

export interface ReconcileResult {
  columns: BomColumns;
  rows: BomRowResult[];
  summary: BomSummary;
}

export interface BomColumnConfig {
  keyColumns: string[];
  mpnColumns: string[];
  manufacturerColumns: string[];
}

// ─── Config ──────────────────────────────────────────────────────────────────

export interface ResolvedConfig {
  patch: PatchConfig;
  catalog: CatalogConfig;
  bom: BomColumnConfig;
  exclude: string[];
  backup: boolean;
  dryRun: boolean;
  quiet: boolean;
  verbose: boolean;
}

/** Shape accepted in `sch-enrich.config.json` (all optional). */
export interface ConfigFile {
  targetKey?: {
    recordName?: string;
    fieldName?: string;
    valuePattern?: string;
  };
  derivedFields?: DerivedField[];
  gate?: {
    windowSize?: number;
    mode?: GateMode;
  };
  catalog?: Partial<CatalogConfig>;
  bom?: Partial<BomColumnConfig>;
  exclude?: string[];
  backup?: boolean;
}

export const DEFAULT_EXCLUDE_DIRS = [
  "node_modules",
  ".git",
  "backups",
] as const;

export const SCHEMATIC_EXTENSION = /\.kicad_sch$/;

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class FileNotFoundError extends Error {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(`File not found: ${filePath}`);
    this.name = "FileNotFoundError";
    if (cause) this.cause = cause;
  }
}

export class MalformedDocumentError extends Error {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(message);
    this.name = "MalformedDocumentError";
  }
}

export class NestedRecordError extends Error {
  constructor(
    public readonly outerStart: number,
    public readonly innerStart: number,
  ) {
    super(
      `Key record at offset ${innerStart} is nested inside the key record at offset ${outerStart}`,
    );
    this.name = "NestedRecordError";
  }
}

export class UnsupportedValueError extends Error {
  constructor(
    public readonly value: string,
    reason: string,
  ) {
    super(`Cannot embed ${JSON.stringify(value)} as a quoted string: ${reason}`);
    this.name = "UnsupportedValueError";
  }
}

export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = "CatalogError";
  }
}

export class MissingColumnError extends Error {
  constructor(public readonly candidates: string[]) {
    super(`No key column found (expected one of: ${candidates.join(", ")})`);
    this.name = "MissingColumnError";
  }
}
