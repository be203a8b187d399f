// src/index.ts — Library API
// The structural patcher, the catalog client and the BOM reconciliation tools.

export type {
  TargetKey,
  KeySite,
  PartRecord,
  PartAttribute,
  DerivedField,
  PartLookup,
  GateMode,
  GateOptions,
  RecordTemplate,
  PatchConfig,
  SiteStatus,
  SiteOutcome,
  RewriteResult,
  CatalogPart,
  CatalogConfig,
  PartFetcher,
  BomTable,
  BomRowStatus,
  BomRowResult,
  BomColumns,
  BomSummary,
  ReconcileResult,
  BomColumnConfig,
  ResolvedConfig,
  ConfigFile,
  Warning,
} from "./types.js";

export {
  ENGINE_VERSION,
  FileNotFoundError,
  MalformedDocumentError,
  NestedRecordError,
  UnsupportedValueError,
  CatalogError,
  MissingColumnError,
} from "./types.js";

// Core patcher
export { findMatchingClose, findEnclosingOpen } from "./region-scanner.js";
export { locateKeyRecords, collectKeyValues } from "./record-locator.js";
export { isAlreadyEnriched, DEFAULT_GATE_WINDOW } from "./enrichment-gate.js";
export { inferIndent } from "./indent.js";
export { synthesize, buildInsertion, assertEmbeddable, PROPERTY_TEMPLATE } from "./record-synthesizer.js";
export { rewrite } from "./document-rewriter.js";
export type { RewriteOptions } from "./document-rewriter.js";
export { enrichDocument } from "./patcher.js";

// Catalog
export { fetchPart, fetchPartWithRetry, createCatalogFetcher, toPartRecord, DEFAULT_CATALOG_CONFIG } from "./catalog/client.js";
export { resolveParts, lookupFromMap } from "./catalog/dispatcher.js";
export type { ResolveOptions, ResolveProgress } from "./catalog/dispatcher.js";

// BOM
export { parseBomTable, readBomTable, serializeBomTable, writeBomTable } from "./bom/csv-table.js";
export { detectColumns, collectTableKeys, reconcileTable, enrichTable, cleanCell, DEFAULT_BOM_COLUMNS } from "./bom/reconcile.js";
export { formatReport, formatRow } from "./bom/report.js";

// Config and discovery
export { resolveConfig, parseCliArgs, DEFAULT_DERIVED_FIELDS, DEFAULT_TARGET_KEY } from "./config.js";
export type { ParsedArgs } from "./config.js";
export { discoverSchematics } from "./file-discovery.js";

// Commands
export { runEnrich } from "./bin/enrich.js";
export type { EnrichOptions, EnrichSummary, FileResult, FileStatus } from "./bin/enrich.js";
export { runVerifyBom } from "./bin/verify-bom.js";
export type { VerifyBomOptions, VerifyBomResult } from "./bin/verify-bom.js";
