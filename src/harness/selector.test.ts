/**
 * Tests for header selectors
 */

import { describe, it, expect } from "vitest";
import {
  formatSelector,
  matchesSelector,
  parseSelector,
  selectorFromArgs,
  selectorKeywords,
  valueMatches,
} from "./selector.js";
import {
  bigintValue,
  booleanValue,
  numberValue,
  stringValue,
  type Header,
} from "../artifacts/types.js";
import { ValidationError } from "../utils/errors.js";

const header: Header = new Map([
  ["INSTRUME", stringValue("WFC3")],
  ["DETECTOR", stringValue("UVIS    ")],
  ["PCTECORR", stringValue("PERFORM")],
  ["CCDAMP", stringValue("ABCD")],
  ["EXPTIME", numberValue(350)],
  ["FLASHUSE", booleanValue(false)],
]);

describe("parseSelector", () => {
  it("should parse a single term and upper-case its keyword", () => {
    expect(parseSelector("instrume = WFC3")).toEqual({
      first: { keyword: "INSTRUME", value: "WFC3" },
      rest: [],
    });
  });

  it("should parse operators case-insensitively", () => {
    expect(parseSelector("INSTRUME=ACS OR INSTRUME=WFC3 and PCTECORR=PERFORM")).toEqual({
      first: { keyword: "INSTRUME", value: "ACS" },
      rest: [
        { operator: "or", term: { keyword: "INSTRUME", value: "WFC3" } },
        { operator: "and", term: { keyword: "PCTECORR", value: "PERFORM" } },
      ],
    });
  });

  it("should reject empty expressions and terms without a value", () => {
    expect(() => parseSelector("  ")).toThrow("Empty selector");
    expect(() => parseSelector("INSTRUME=")).toThrow(
      'Invalid selector term "INSTRUME=": expected KEYWORD=value',
    );
    expect(() => parseSelector("WFC3")).toThrow(ValidationError);
  });
});

describe("selectorFromArgs", () => {
  it("should build a selector from positional triples", () => {
    expect(selectorFromArgs(["INSTRUME", "ACS", "and", "DETECTOR", "WFC"])).toEqual({
      first: { keyword: "INSTRUME", value: "ACS" },
      rest: [{ operator: "and", term: { keyword: "DETECTOR", value: "WFC" } }],
    });
  });

  it("should reject incomplete triples and unknown operators", () => {
    expect(() => selectorFromArgs(["INSTRUME"])).toThrow(ValidationError);
    expect(() => selectorFromArgs(["INSTRUME", "ACS", "and", "DETECTOR"])).toThrow(
      ValidationError,
    );
    expect(() => selectorFromArgs(["INSTRUME", "ACS", "xor", "DETECTOR", "WFC"])).toThrow(
      'Invalid selector operator "xor": expected and/or',
    );
  });
});

describe("valueMatches", () => {
  it("should compare strings case-insensitively ignoring trailing blanks", () => {
    expect(valueMatches(stringValue("UVIS    "), "uvis")).toBe(true);
    expect(valueMatches(stringValue("IR"), "UVIS")).toBe(false);
  });

  it("should compare numbers numerically", () => {
    expect(valueMatches(numberValue(350), "350.0")).toBe(true);
    expect(valueMatches(numberValue(350), "abc")).toBe(false);
  });

  it("should compare large integers exactly", () => {
    expect(valueMatches(bigintValue(9007199254740993n), "9007199254740993")).toBe(true);
    expect(valueMatches(bigintValue(9007199254740993n), "9007199254740992")).toBe(false);
    expect(valueMatches(bigintValue(9007199254740993n), "9.007e15")).toBe(false);
  });

  it("should accept T/F and true/false for logicals", () => {
    expect(valueMatches(booleanValue(true), "T")).toBe(true);
    expect(valueMatches(booleanValue(false), "false")).toBe(true);
    expect(valueMatches(booleanValue(false), "yes")).toBe(false);
  });

  it("should never match a missing keyword", () => {
    expect(valueMatches(undefined, "anything")).toBe(false);
  });
});

describe("matchesSelector", () => {
  it("should require every and-term", () => {
    expect(matchesSelector(parseSelector("INSTRUME=WFC3 and PCTECORR=PERFORM"), header)).toBe(
      true,
    );
    expect(matchesSelector(parseSelector("INSTRUME=WFC3 and DETECTOR=IR"), header)).toBe(false);
  });

  it("should accept any or-term", () => {
    expect(matchesSelector(parseSelector("INSTRUME=ACS or EXPTIME=350"), header)).toBe(true);
  });

  it("should evaluate left to right without precedence", () => {
    // (ACS or WFC3) and FLASHUSE=T
    expect(
      matchesSelector(parseSelector("INSTRUME=ACS or INSTRUME=WFC3 and FLASHUSE=T"), header),
    ).toBe(false);
    // (WFC3 and FLASHUSE=T) or CCDAMP=ABCD
    expect(
      matchesSelector(parseSelector("INSTRUME=WFC3 and FLASHUSE=T or CCDAMP=ABCD"), header),
    ).toBe(true);
  });
});

describe("selectorKeywords", () => {
  it("should list keywords in expression order", () => {
    expect(selectorKeywords(parseSelector("INSTRUME=WFC3 or DETECTOR=IR"))).toEqual([
      "INSTRUME",
      "DETECTOR",
    ]);
  });
});

describe("formatSelector", () => {
  it("should render a normalised expression", () => {
    expect(formatSelector(parseSelector("instrume = wfc3  AND  detector=ir"))).toBe(
      "INSTRUME=wfc3 and DETECTOR=ir",
    );
  });
});
