import { describe, it, expect } from "vitest";
import { formatPercent, formatSeconds, parseDecimal, readDecimalField } from "../src/overview/numeric";

describe("parseDecimal", () => {
  it("parses plain decimals and exponents", () => {
    expect(parseDecimal("10")).toEqual({ state: "known", value: 10 });
    expect(parseDecimal("-3.5")).toEqual({ state: "known", value: -3.5 });
    expect(parseDecimal(".5")).toEqual({ state: "known", value: 0.5 });
    expect(parseDecimal("1e3")).toEqual({ state: "known", value: 1000 });
    expect(parseDecimal(" 42 ")).toEqual({ state: "known", value: 42 });
  });

  it("passes finite numbers through", () => {
    expect(parseDecimal(7)).toEqual({ state: "known", value: 7 });
  });

  it("rejects infinity tokens, empty strings and hex", () => {
    for (const raw of ["inf", "-inf", "Infinity", "nan", "", "0x10", "1,5"]) {
      expect(parseDecimal(raw)).toEqual({ state: "unknown", reason: "malformed_field" });
    }
    expect(parseDecimal(Number.POSITIVE_INFINITY)).toEqual({ state: "unknown", reason: "malformed_field" });
  });
});

describe("readDecimalField", () => {
  it("separates a missing key from a malformed value", () => {
    const record = { objective: "inf", walltime: "2.000" };
    expect(readDecimalField(record, "best_bound")).toEqual({ state: "unknown", reason: "missing_field" });
    expect(readDecimalField(record, "objective")).toEqual({ state: "unknown", reason: "malformed_field" });
    expect(readDecimalField(record, "walltime")).toEqual({ state: "known", value: 2 });
  });
});

describe("formatting", () => {
  it("rounds seconds to three decimals and percentages to two", () => {
    expect(formatSeconds(1.5)).toBe("1.500s");
    expect(formatSeconds(0.12345)).toBe("0.123s");
    expect(formatPercent(0)).toBe("0.00%");
    expect(formatPercent(100 / 6)).toBe("16.67%");
  });
});
