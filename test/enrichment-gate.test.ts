import { describe, it, expect } from "vitest";
import { isAlreadyEnriched } from "../src/enrichment-gate.js";
import type { GateOptions } from "../src/types.js";
import { propertyBlock } from "./helpers.js";

const NAMES = ["LCSC_Manufacturer", "LCSC_MPN"];
const ALL: GateOptions = { recordName: "property", windowSize: 300, mode: "all" };
const ANY: GateOptions = { ...ALL, mode: "any" };

const KEY = '(property "LCSC" "C2040")';

describe("isAlreadyEnriched", () => {
  it("is true when every derived record follows the key record", () => {
    const text = KEY + "\n" + propertyBlock("LCSC_Manufacturer", "TI") + "\n" + propertyBlock("LCSC_MPN", "TAC5212");
    expect(isAlreadyEnriched(text, KEY.length, NAMES, ALL)).toBe(true);
  });

  it("is false when nothing follows", () => {
    expect(isAlreadyEnriched(KEY + "\n)", KEY.length, NAMES, ALL)).toBe(false);
  });

  it("treats a partially enriched site as not enriched in all mode", () => {
    const text = KEY + "\n" + propertyBlock("LCSC_Manufacturer", "TI");
    expect(isAlreadyEnriched(text, KEY.length, NAMES, ALL)).toBe(false);
  });

  it("treats a partially enriched site as enriched in any mode", () => {
    const text = KEY + "\n" + propertyBlock("LCSC_MPN", "TAC5212");
    expect(isAlreadyEnriched(text, KEY.length, NAMES, ANY)).toBe(true);
  });

  it("ignores derived records beyond the window", () => {
    const text = KEY + " ".repeat(300) + '(property "LCSC_Manufacturer" "TI") (property "LCSC_MPN" "X")';
    expect(isAlreadyEnriched(text, KEY.length, NAMES, ALL)).toBe(false);
    expect(isAlreadyEnriched(text, KEY.length, NAMES, { ...ALL, windowSize: 400 })).toBe(true);
  });

  it("only counts the names as record names, not as values", () => {
    const text = KEY + ' (property "Note" "LCSC_Manufacturer") (property "Other" "LCSC_MPN")';
    expect(isAlreadyEnriched(text, KEY.length, NAMES, ALL)).toBe(false);
  });

  it("does not look before the record end", () => {
    const text = '(property "LCSC_Manufacturer" "TI") (property "LCSC_MPN" "X") ' + KEY;
    expect(isAlreadyEnriched(text, text.length, NAMES, ALL)).toBe(false);
  });
});
