import { describe, it, expect } from "vitest";
import { collectKeyValues, locateKeyRecords } from "../src/record-locator.js";
import { MalformedDocumentError, NestedRecordError } from "../src/types.js";
import type { TargetKey } from "../src/types.js";
import { lcscBlock, schematic, symbol } from "./helpers.js";

const KEY: TargetKey = { recordName: "property", fieldName: "LCSC", valuePattern: /^C[0-9]+$/ };

describe("locateKeyRecords", () => {
  it("yields value, start and end for each key record in document order", () => {
    const doc = schematic([symbol("C1", [lcscBlock("C2040")]), symbol("C2", [lcscBlock("C1525")])]);
    const sites = [...locateKeyRecords(doc, KEY)];

    const first = doc.indexOf('(property "LCSC" "C2040"');
    const second = doc.indexOf('(property "LCSC" "C1525"');
    expect(sites).toEqual([
      { value: "C2040", start: first, end: first + lcscBlock("C2040").trimStart().length },
      { value: "C1525", start: second, end: second + lcscBlock("C1525").trimStart().length },
    ]);
  });

  it("does not match other fields whose values look like codes", () => {
    const doc = '(symbol (property "Reference" "C1") (property "LCSC_MPN" "C5"))';
    expect([...locateKeyRecords(doc, KEY)]).toEqual([]);
  });

  it("skips values that fail the value pattern", () => {
    const doc = '(a (property "LCSC" "") (property "LCSC" "X12") (property "LCSC" "C7"))';
    expect([...locateKeyRecords(doc, KEY)].map((s) => s.value)).toEqual(["C7"]);
  });

  it("tolerates extra whitespace between tokens", () => {
    const doc = '(  property   "LCSC"\t"C42" (at 0 0 0))';
    expect([...locateKeyRecords(doc, KEY)]).toEqual([{ value: "C42", start: 0, end: doc.length }]);
  });

  it("is lazy: a broken later record only throws when reached", () => {
    const doc = '(property "LCSC" "C1")\n(property "LCSC" "C2" (at 0 0 0)';
    const sites = locateKeyRecords(doc, KEY);
    expect(sites.next().value).toEqual({ value: "C1", start: 0, end: 22 });
    expect(() => sites.next()).toThrow(MalformedDocumentError);
  });

  it("restarts from the beginning on each call", () => {
    const doc = '(property "LCSC" "C1")';
    expect([...locateKeyRecords(doc, KEY)]).toHaveLength(1);
    expect([...locateKeyRecords(doc, KEY)]).toHaveLength(1);
  });

  it("throws NestedRecordError for a key record inside another", () => {
    const doc = '(property "LCSC" "C1" (property "LCSC" "C2"))';
    expect(() => [...locateKeyRecords(doc, KEY)]).toThrow(NestedRecordError);
  });

  it("uses the configured record and field names", () => {
    const key: TargetKey = { recordName: "field", fieldName: "JLC", valuePattern: /^J\d+$/ };
    const doc = '(comp (field "JLC" "J9") (property "LCSC" "C1"))';
    expect([...locateKeyRecords(doc, key)]).toEqual([{ value: "J9", start: 6, end: 24 }]);
  });
});

describe("collectKeyValues", () => {
  it("returns unique values sorted", () => {
    const doc = schematic([
      symbol("C1", [lcscBlock("C2040")]),
      symbol("C2", [lcscBlock("C1")]),
      symbol("C3", [lcscBlock("C2040")]),
    ]);
    expect(collectKeyValues(doc, KEY)).toEqual(["C1", "C2040"]);
  });

  it("returns an empty list when there are no key records", () => {
    expect(collectKeyValues("(kicad_sch (version 1))", KEY)).toEqual([]);
  });
});
