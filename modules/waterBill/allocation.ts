import { DivisionError, PreconditionError, ValidationError } from "./errors";
import { evaluateMismatch } from "./mismatch";
import type { AllocationResult, MismatchPolicy, MismatchResult, Party, Period, Reimbursement } from "./types";

type FeeInputs = Pick<Period, "basicFeesTotal" | "usageFeesTotal" | "sub1Usage" | "sub2Usage" | "mainUsage">;

function requireAmount(n: number, code: string, label: string): void {
  if (!Number.isFinite(n)) throw new ValidationError(`${code}_invalid`, `${label} must be a number.`);
  if (n < 0) throw new ValidationError(`${code}_negative`, `${label} cannot be negative.`);
}

/**
 * Sub-meter usage after the mismatch policy is applied. IGNORE returns the
 * raw usage; the two overrides hand the main/sub difference out to the
 * parties and therefore need an evaluated mismatch.
 */
export function adjustUsage(
  sub1Usage: number,
  sub2Usage: number,
  policy: MismatchPolicy,
  mismatch: MismatchResult
): { adjusted1: number; adjusted2: number } {
  if (policy === "IGNORE") return { adjusted1: sub1Usage, adjusted2: sub2Usage };

  if (!mismatch.evaluated) {
    throw new PreconditionError(
      "mismatch_override_requires_main",
      "Mismatch override requires main meter usage greater than 0."
    );
  }

  const diff = mismatch.mismatchM3;
  if (policy === "SPLIT_HALF") {
    return { adjusted1: sub1Usage + diff / 2, adjusted2: sub2Usage + diff / 2 };
  }

  const subTotal = sub1Usage + sub2Usage;
  if (subTotal <= 0) {
    throw new DivisionError("sub_usage_zero", "Total sub-meter usage must be greater than 0.");
  }
  return {
    adjusted1: sub1Usage + diff * (sub1Usage / subTotal),
    adjusted2: sub2Usage + diff * (sub2Usage / subTotal),
  };
}

export function allocateFees(period: FeeInputs, policy: MismatchPolicy = "IGNORE"): AllocationResult {
  requireAmount(period.basicFeesTotal, "basic_fees", "Basic fees total");
  requireAmount(period.usageFeesTotal, "usage_fees", "Usage fees total");
  requireAmount(period.sub1Usage, "sub_usage", "Sub-meter usage");
  requireAmount(period.sub2Usage, "sub_usage", "Sub-meter usage");
  if (period.sub1Usage + period.sub2Usage <= 0) {
    throw new DivisionError("sub_usage_zero", "Total sub-meter usage must be greater than 0.");
  }

  const mismatch = evaluateMismatch(period.sub1Usage, period.sub2Usage, period.mainUsage);
  const { adjusted1, adjusted2 } = adjustUsage(period.sub1Usage, period.sub2Usage, policy, mismatch);
  if (adjusted1 < 0 || adjusted2 < 0) {
    throw new ValidationError("adjusted_usage_negative", "Adjusted usage became negative.");
  }
  const adjustedTotal = adjusted1 + adjusted2;
  if (adjustedTotal <= 0) {
    throw new DivisionError("adjusted_usage_zero", "Adjusted usage total must be greater than 0.");
  }

  const basicShare = period.basicFeesTotal / 2;
  const usageShare1 = period.usageFeesTotal * (adjusted1 / adjustedTotal);
  const usageShare2 = period.usageFeesTotal * (adjusted2 / adjustedTotal);
  const total1 = basicShare + usageShare1;
  const total2 = basicShare + usageShare2;

  return {
    policy,
    adjustedUsage1: adjusted1,
    adjustedUsage2: adjusted2,
    basicShare1: basicShare,
    basicShare2: basicShare,
    usageShare1,
    usageShare2,
    total1,
    total2,
    settlement: total1 - total2,
  };
}

export function otherParty(p: Party): Party {
  return p === 1 ? 2 : 1;
}

/**
 * The payer settles with the utility; the other party owes the payer its own
 * share. A negative share (a credit) flips the direction.
 */
export function reimbursementFor(shares: { share1: number; share2: number }, payer: Party): Reimbursement {
  const debtor = otherParty(payer);
  const owed = debtor === 1 ? shares.share1 : shares.share2;
  if (owed < 0) return { from: payer, to: debtor, amount: -owed };
  return { from: debtor, to: payer, amount: owed };
}
