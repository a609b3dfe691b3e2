// Finnish-style number text: comma decimal separator, unit suffix glued on
// ("84,03€", "27,366m3").

const UNIT_TOKENS = ["EUR", "€", "m³", "m3", "%"];

function stripUnits(text: string): string {
  let s = text;
  for (const token of UNIT_TOKENS) s = s.split(token).join("");
  return s.replace(/\s+/g, "");
}

export function formatNumber(value: number, decimals: number): string {
  return value.toFixed(decimals).replace(".", ",");
}

export function formatEur(value: number): string {
  return `${formatNumber(value, 2)}€`;
}

export function formatM3(value: number): string {
  const sign = value < 0 ? "-" : "";
  return `${sign}${formatNumber(Math.abs(value), 3)}m3`;
}

/** `fraction` is a ratio (0.1667), printed as a percentage ("16,67%"). */
export function formatPercent(fraction: number, decimals = 2): string {
  return `${formatNumber(fraction * 100, decimals)}%`;
}

const NUMERIC_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Lenient number parsing for form and history values. Returns null for
 * blanks and anything that is not a plain decimal once units are removed.
 */
export function parseNumber(value: unknown): number | null {
  if (value == null) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const text = stripUnits(value.trim()).replace(",", ".");
  if (!text || !NUMERIC_TEXT.test(text)) return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

/**
 * True when `value` is a plain number with at most `maxDecimals` decimals.
 * A comma is the decimal separator; a lone dot is accepted in its place.
 */
export function hasMaxDecimals(value: unknown, maxDecimals: number, opts?: { allowNegative?: boolean }): boolean {
  if (value == null) return false;
  let text = typeof value === "number" ? String(value) : typeof value === "string" ? value : "";
  text = stripUnits(text.trim());
  if (!text) return false;
  if (!text.includes(",")) text = text.replace(".", ",");
  if (text.startsWith("-")) {
    if (!opts?.allowNegative) return false;
    text = text.slice(1);
  }
  const parts = text.split(",");
  if (parts.length > 2) return false;
  const isDigits = (s: string) => /^\d+$/.test(s);
  if (parts.length === 2) {
    const [integerPart, fractional] = parts;
    if (integerPart !== "" && !isDigits(integerPart)) return false;
    if (!isDigits(fractional)) return false;
    return fractional.length <= maxDecimals;
  }
  return isDigits(text);
}
