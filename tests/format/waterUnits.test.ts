import { describe, expect, it } from "vitest";
import { formatEur, formatM3, formatPercent, hasMaxDecimals, parseNumber } from "@/lib/format/waterUnits";

describe("parseNumber", () => {
  it("reads comma decimals with units attached", () => {
    expect(parseNumber("84,03€")).toBe(84.03);
    expect(parseNumber(" 27,366 m3 ")).toBe(27.366);
    expect(parseNumber("12.5 EUR")).toBe(12.5);
    expect(parseNumber("-3,5")).toBe(-3.5);
    expect(parseNumber(7)).toBe(7);
  });

  it("returns null for anything that is not a plain decimal", () => {
    expect(parseNumber("")).toBeNull();
    expect(parseNumber("abc")).toBeNull();
    expect(parseNumber("1.234,5")).toBeNull();
    expect(parseNumber(Number.POSITIVE_INFINITY)).toBeNull();
    expect(parseNumber(undefined)).toBeNull();
    expect(parseNumber(true)).toBeNull();
  });
});

describe("hasMaxDecimals", () => {
  it("counts decimals after a comma or dot", () => {
    expect(hasMaxDecimals("84,03€", 2)).toBe(true);
    expect(hasMaxDecimals("84,034", 2)).toBe(false);
    expect(hasMaxDecimals(12.5, 3)).toBe(true);
    expect(hasMaxDecimals("12", 0)).toBe(true);
    expect(hasMaxDecimals(",5", 1)).toBe(true);
  });

  it("rejects malformed text and unwanted signs", () => {
    expect(hasMaxDecimals("1,2,3", 3)).toBe(false);
    expect(hasMaxDecimals("", 2)).toBe(false);
    expect(hasMaxDecimals("-1,5", 2)).toBe(false);
    expect(hasMaxDecimals("-1,5", 2, { allowNegative: true })).toBe(true);
  });
});

describe("formatting", () => {
  it("uses a comma separator and glued units", () => {
    expect(formatEur(1234.5)).toBe("1234,50€");
    expect(formatEur(-8)).toBe("-8,00€");
    expect(formatM3(27.366)).toBe("27,366m3");
    expect(formatM3(-0.5)).toBe("-0,500m3");
    expect(formatPercent(0.16667)).toBe("16,67%");
    expect(formatPercent(0.05, 0)).toBe("5%");
  });
});
