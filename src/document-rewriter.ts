// src/document-rewriter.ts — Document rewriter
// Single forward pass: copy original spans, splice insertions after key records.

import { isAlreadyEnriched } from "./enrichment-gate.js";
import { inferIndent } from "./indent.js";
import { buildInsertion, PROPERTY_TEMPLATE } from "./record-synthesizer.js";
import { NestedRecordError, UnsupportedValueError } from "./types.js";
import type {
  DerivedField,
  GateOptions,
  KeySite,
  PartLookup,
  RecordTemplate,
  RewriteResult,
  SiteOutcome,
  Warning,
} from "./types.js";

export interface RewriteOptions {
  derivedFields: readonly DerivedField[];
  lookup: PartLookup;
  gate: GateOptions;
  template?: RecordTemplate;
}

/**
 * Rewrite `text`, inserting the derived records after every site that is not
 * already enriched and has a lookup entry. Sites must be in ascending `start`
 * order and must not overlap.
 *
 * Any error thrown while iterating `sites` (a lazy locator) propagates before
 * output is assembled, so a partially patched document is never returned.
 */
export function rewrite(
  text: string,
  sites: Iterable<KeySite>,
  options: RewriteOptions,
): RewriteResult {
  const { derivedFields, lookup, gate } = options;
  const template = options.template ?? PROPERTY_TEMPLATE;
  const fieldNames = derivedFields.map((f) => f.name);

  const chunks: string[] = [];
  const outcomes: SiteOutcome[] = [];
  const warnings: Warning[] = [];
  let cursor = 0;
  let previousStart = -1;
  let applied = 0;
  let skipped = 0;
  let unresolved = 0;

  for (const site of sites) {
    if (site.start < cursor) {
      throw new NestedRecordError(previousStart, site.start);
    }
    previousStart = site.start;

    chunks.push(text.slice(cursor, site.end));
    cursor = site.end;

    const part = lookup(site.value);
    let insertion: string | undefined;
    let rejection: UnsupportedValueError | undefined;
    if (part) {
      try {
        insertion = buildInsertion(part, derivedFields, inferIndent(text, site.start), template);
      } catch (err: unknown) {
        if (!(err instanceof UnsupportedValueError)) throw err;
        rejection = err;
      }
    }

    // The window must cover a full insertion, however long its values are
    const windowSize = Math.max(gate.windowSize, insertion?.length ?? 0);
    if (isAlreadyEnriched(text, site.end, fieldNames, { ...gate, windowSize })) {
      skipped++;
      outcomes.push({ ...site, status: "skipped" });
      continue;
    }

    if (rejection) {
      unresolved++;
      outcomes.push({ ...site, status: "rejected" });
      warnings.push({
        level: "warn",
        module: "document-rewriter",
        message: `${site.value} left untouched: ${rejection.message}`,
      });
      continue;
    }

    if (insertion === undefined) {
      unresolved++;
      outcomes.push({ ...site, status: "unresolved" });
      continue;
    }

    chunks.push(insertion);
    applied++;
    outcomes.push({ ...site, status: "applied" });
  }

  chunks.push(text.slice(cursor));

  return {
    text: chunks.join(""),
    applied,
    skipped,
    unresolved,
    outcomes,
    warnings,
  };
}
