import { ValidationError } from "./errors";
import { roundVolume } from "./readings";
import type { MismatchResult, Severity } from "./types";

// Upper bounds, inclusive. Anything above the WARNING bound is INVESTIGATE.
export const MISMATCH_THRESHOLDS = {
  absoluteM3: { ok: 1.0, warning: 3.0 },
  fraction: { ok: 0.05, warning: 0.1 },
} as const;

const SEVERITY_RANK: Record<Severity, number> = { OK: 0, WARNING: 1, INVESTIGATE: 2 };

export function moreSevere(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b;
}

function bandSeverity(value: number, bounds: { ok: number; warning: number }): Severity {
  const v = Math.abs(value);
  if (v <= bounds.ok) return "OK";
  if (v <= bounds.warning) return "WARNING";
  return "INVESTIGATE";
}

/** Absolute and percentage bands are judged separately; the worse one wins. */
export function classifyMismatch(mismatchM3: number, mismatchPct: number): Severity {
  return moreSevere(
    bandSeverity(mismatchM3, MISMATCH_THRESHOLDS.absoluteM3),
    bandSeverity(mismatchPct, MISMATCH_THRESHOLDS.fraction)
  );
}

export function evaluateMismatch(sub1Usage: number, sub2Usage: number, mainUsage: number | null): MismatchResult {
  if (mainUsage == null) return { evaluated: false, reason: "main_missing" };
  if (mainUsage < 0 || sub1Usage < 0 || sub2Usage < 0) {
    throw new ValidationError("usage_negative", "Meter usage cannot be negative.");
  }
  if (mainUsage === 0) return { evaluated: false, reason: "main_zero" };

  const subTotal = roundVolume(sub1Usage + sub2Usage);
  const mismatchM3 = roundVolume(mainUsage - subTotal);
  const mismatchPct = mismatchM3 / mainUsage;
  return {
    evaluated: true,
    mainUsage,
    subTotal,
    mismatchM3,
    mismatchPct,
    severity: classifyMismatch(mismatchM3, mismatchPct),
  };
}

export const SEVERITY_MESSAGES: Record<Severity, string> = {
  OK: "OK (likely rounding/timing)",
  WARNING: "Warning: check readings",
  INVESTIGATE: "Investigate: mismatch is large",
};
