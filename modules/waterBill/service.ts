import type { SavedPeriod, SavedTrueUp, WaterHistoryStore } from "@/modules/waterHistory/types";
import { HistoryStoreError } from "@/modules/waterHistory/types";
import { allocateFees, reimbursementFor } from "./allocation";
import { isWaterCalcError, ValidationError } from "./errors";
import { evaluateMismatch } from "./mismatch";
import { normalizeMeter, normalizeOptionalMeter } from "./readings";
import { settleTrueUp, usageBasisFromPeriods } from "./trueUp";
import type {
  AllocationResult,
  BillInput,
  MismatchResult,
  Party,
  Period,
  Reimbursement,
  TrueUp,
  TrueUpInput,
  UsageBasis,
} from "./types";

export type ServiceOptions = {
  save?: boolean;
  billPayer?: Party;
  now?: () => Date;
};

export type SplitOutcome = {
  period: Period;
  mismatch: MismatchResult;
  allocation: AllocationResult;
  reimbursement: Reimbursement;
  savedId: string | null;
  saveError?: string;
};

export type TrueUpOutcome = {
  trueUp: TrueUp;
  reimbursement: Reimbursement;
  savedId: string | null;
  saveError?: string;
};

export type PeriodHistoryEntry = SavedPeriod & { mismatch: MismatchResult };

type Failure = { ok: false; error: string; message?: string };
export type SplitResult = { ok: true; data: SplitOutcome } | Failure;
export type TrueUpResult = { ok: true; data: TrueUpOutcome } | Failure;
export type PeriodHistoryResult = { ok: true; data: PeriodHistoryEntry[] } | Failure;
export type TrueUpHistoryResult = { ok: true; data: SavedTrueUp[] } | Failure;

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function storeErrorCode(e: unknown): string {
  return e instanceof HistoryStoreError ? e.code : "history_store_error";
}

function toFailure(e: unknown, op: string): Failure {
  if (isWaterCalcError(e)) return { ok: false, error: e.code, message: e.message };
  console.error(`[waterBill/service] ${op} failed`, e);
  return { ok: false, error: storeErrorCode(e), message: errorMessage(e) };
}

export async function splitCurrentBill(
  store: WaterHistoryStore,
  input: BillInput,
  opts: ServiceOptions = {}
): Promise<SplitResult> {
  let period: Period;
  let mismatch: MismatchResult;
  let allocation: AllocationResult;
  try {
    if (input.startDate > input.endDate) {
      throw new ValidationError("period_dates_inverted", "Period start date is after its end date.");
    }
    period = {
      startDate: input.startDate,
      endDate: input.endDate,
      basicFeesTotal: input.basicFeesTotal,
      usageFeesTotal: input.usageFeesTotal,
      sub1Usage: normalizeMeter(input.sub1, "sub1"),
      sub2Usage: normalizeMeter(input.sub2, "sub2"),
      mainUsage: normalizeOptionalMeter(input.main, "main"),
    };
    mismatch = evaluateMismatch(period.sub1Usage, period.sub2Usage, period.mainUsage);
    allocation = allocateFees(period, input.policy);
  } catch (e) {
    return toFailure(e, "splitCurrentBill");
  }

  const reimbursement = reimbursementFor({ share1: allocation.total1, share2: allocation.total2 }, opts.billPayer ?? 2);
  const outcome: SplitOutcome = { period, mismatch, allocation, reimbursement, savedId: null };
  if (!opts.save) return { ok: true, data: outcome };

  try {
    outcome.savedId = await store.savePeriod({
      ...period,
      mismatchPolicy: input.policy,
      allocation,
      invoiceNumber: input.invoice?.invoiceNumber ?? null,
      dueDate: input.invoice?.dueDate ?? null,
      estimated: input.invoice?.estimated ?? false,
      savedAt: (opts.now ?? (() => new Date()))().toISOString(),
    });
  } catch (e) {
    console.error("[waterBill/service] savePeriod failed", e);
    outcome.saveError = storeErrorCode(e);
  }
  return { ok: true, data: outcome };
}

export async function calculateTrueUp(
  store: WaterHistoryStore,
  input: TrueUpInput,
  opts: ServiceOptions = {}
): Promise<TrueUpResult> {
  let trueUp: TrueUp;
  try {
    if (input.startDate > input.endDate) {
      throw new ValidationError("period_dates_inverted", "True-up start date is after its end date.");
    }
    let basis: UsageBasis;
    if (input.basis.kind === "PERIODS") {
      const saved = await store.listPeriods();
      basis = usageBasisFromPeriods(input.basis.periodIds, saved);
    } else {
      basis = { kind: "MANUAL", usage1: input.basis.usage1, usage2: input.basis.usage2 };
    }
    trueUp = {
      correctionAmount: input.correctionAmount,
      startDate: input.startDate,
      endDate: input.endDate,
      basis,
      allocation: settleTrueUp(input.correctionAmount, basis.usage1, basis.usage2),
    };
  } catch (e) {
    return toFailure(e, "calculateTrueUp");
  }

  const reimbursement = reimbursementFor(trueUp.allocation, opts.billPayer ?? 2);
  const outcome: TrueUpOutcome = { trueUp, reimbursement, savedId: null };
  if (!opts.save) return { ok: true, data: outcome };

  try {
    outcome.savedId = await store.saveTrueUp({
      ...trueUp,
      savedAt: (opts.now ?? (() => new Date()))().toISOString(),
    });
  } catch (e) {
    console.error("[waterBill/service] saveTrueUp failed", e);
    outcome.saveError = storeErrorCode(e);
  }
  return { ok: true, data: outcome };
}

/** Saved periods with the mismatch evaluated fresh, never read back from storage. */
export async function listPeriodHistory(store: WaterHistoryStore): Promise<PeriodHistoryResult> {
  try {
    const periods = await store.listPeriods();
    return {
      ok: true,
      data: periods.map((p) => ({ ...p, mismatch: evaluateMismatch(p.sub1Usage, p.sub2Usage, p.mainUsage) })),
    };
  } catch (e) {
    return toFailure(e, "listPeriodHistory");
  }
}

export async function listTrueUpHistory(store: WaterHistoryStore): Promise<TrueUpHistoryResult> {
  try {
    return { ok: true, data: await store.listTrueUps() };
  } catch (e) {
    return toFailure(e, "listTrueUpHistory");
  }
}
