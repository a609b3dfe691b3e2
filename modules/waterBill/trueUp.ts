import { DivisionError, ValidationError } from "./errors";
import type { Period, TrueUpAllocation, UsageBasis } from "./types";

/**
 * Spread a correction invoice over the parties by usage. `correctionAmount`
 * is signed: positive for an extra charge, negative for a credit.
 */
export function settleTrueUp(correctionAmount: number, usage1: number, usage2: number): TrueUpAllocation {
  if (!Number.isFinite(correctionAmount)) {
    throw new ValidationError("trueup_amount_invalid", "True-up amount must be a number.");
  }
  if (!Number.isFinite(usage1) || !Number.isFinite(usage2)) {
    throw new ValidationError("trueup_usage_invalid", "True-up usage must be a number.");
  }
  if (usage1 < 0 || usage2 < 0) {
    throw new ValidationError("trueup_usage_negative", "Sub-meter usage cannot be negative.");
  }
  const total = usage1 + usage2;
  if (total <= 0) {
    throw new DivisionError("trueup_usage_zero", "Total usage must be greater than 0.");
  }

  const share1 = correctionAmount * (usage1 / total);
  const share2 = correctionAmount * (usage2 / total);
  return { share1, share2, settlement: share1 - share2 };
}

/**
 * Per-party usage summed over the selected saved periods. Raw sub-meter
 * usage is used, not the policy-adjusted figures. The result is a snapshot;
 * later edits to storage do not change a true-up already computed from it.
 */
export function usageBasisFromPeriods(
  periodIds: string[],
  saved: ReadonlyArray<Pick<Period, "sub1Usage" | "sub2Usage"> & { id: string }>
): UsageBasis {
  const byId = new Map(saved.map((p) => [p.id, p]));
  const uniqueIds = Array.from(new Set(periodIds));
  let usage1 = 0;
  let usage2 = 0;
  for (const id of uniqueIds) {
    const p = byId.get(id);
    if (!p) throw new ValidationError("trueup_period_not_found", `Saved period ${id} was not found.`);
    usage1 += p.sub1Usage;
    usage2 += p.sub2Usage;
  }
  return { kind: "PERIODS", periodIds: uniqueIds, usage1, usage2 };
}
