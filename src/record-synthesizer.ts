// src/record-synthesizer.ts — Sibling record synthesizer
// Fixed-shape property records in the same layout KiCad writes for hidden fields.

import { UnsupportedValueError } from "./types.js";
import type { DerivedField, PartRecord, RecordTemplate } from "./types.js";

export const PROPERTY_TEMPLATE: RecordTemplate = {
  recordName: "property",
  indentUnit: "\t",
  fontSize: 1.27,
  hidden: true,
};

/**
 * Reject strings that would corrupt a quoted S-expression string.
 */
export function assertEmbeddable(value: string): void {
  if (value.includes('"')) {
    throw new UnsupportedValueError(value, "contains a double quote");
  }
  if (value.includes("\\")) {
    throw new UnsupportedValueError(value, "contains a backslash");
  }
  if (/[\r\n]/.test(value)) {
    throw new UnsupportedValueError(value, "contains a line break");
  }
}

/**
 * Build one record:
 *
 * ```
 * <indent>(property "<fieldName>" "<value>"
 * <indent>	(at 0 0 0)
 * <indent>	(effects
 * <indent>		(font
 * <indent>			(size 1.27 1.27)
 * <indent>		)
 * <indent>		(hide yes)
 * <indent>	)
 * <indent>)
 * ```
 *
 * No leading or trailing newline.
 */
export function synthesize(
  fieldName: string,
  value: string,
  indent: string,
  template: RecordTemplate = PROPERTY_TEMPLATE,
): string {
  assertEmbeddable(fieldName);
  assertEmbeddable(value);

  const u = template.indentUnit;
  const size = String(template.fontSize);
  const lines = [
    `(${template.recordName} "${fieldName}" "${value}"`,
    `${u}(at 0 0 0)`,
    `${u}(effects`,
    `${u}${u}(font`,
    `${u}${u}${u}(size ${size} ${size})`,
    `${u}${u})`,
    ...(template.hidden ? [`${u}${u}(hide yes)`] : []),
    `${u})`,
    `)`,
  ];

  return lines.map((line) => indent + line).join("\n");
}

/**
 * The full insertion for one site: every derived field, each on a new line.
 * Either all records are built or an UnsupportedValueError is thrown.
 */
export function buildInsertion(
  part: PartRecord,
  derivedFields: readonly DerivedField[],
  indent: string,
  template: RecordTemplate = PROPERTY_TEMPLATE,
): string {
  return derivedFields
    .map((field) => "\n" + synthesize(field.name, part[field.attribute], indent, template))
    .join("");
}
