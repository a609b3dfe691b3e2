import { compareDateKeys, isDateKey } from "@/lib/time/dateKeys";
import {
  MISMATCH_POLICIES,
  type AllocationResult,
  type MismatchPolicy,
  type TrueUpAllocation,
  type UsageBasis,
} from "@/modules/waterBill/types";
import type { SavedPeriod, SavedTrueUp } from "./types";

// Shape checks for records coming back from JSON files or database rows.

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function num(v: unknown): number | null {
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

function str(v: unknown): string | null {
  return typeof v === "string" && v.trim() ? v : null;
}

function timestamp(v: unknown): string | null {
  if (v instanceof Date) return Number.isFinite(v.getTime()) ? v.toISOString() : null;
  const s = str(v);
  return s && Number.isFinite(Date.parse(s)) ? s : null;
}

function isPolicy(v: unknown): v is MismatchPolicy {
  return typeof v === "string" && (MISMATCH_POLICIES as readonly string[]).includes(v);
}

export function parseAllocation(v: unknown): AllocationResult | null {
  if (!isPlainObject(v) || !isPolicy(v.policy)) return null;
  const adjustedUsage1 = num(v.adjustedUsage1);
  const adjustedUsage2 = num(v.adjustedUsage2);
  const basicShare1 = num(v.basicShare1);
  const basicShare2 = num(v.basicShare2);
  const usageShare1 = num(v.usageShare1);
  const usageShare2 = num(v.usageShare2);
  const total1 = num(v.total1);
  const total2 = num(v.total2);
  const settlement = num(v.settlement);
  if (
    adjustedUsage1 == null ||
    adjustedUsage2 == null ||
    basicShare1 == null ||
    basicShare2 == null ||
    usageShare1 == null ||
    usageShare2 == null ||
    total1 == null ||
    total2 == null ||
    settlement == null
  ) {
    return null;
  }
  return {
    policy: v.policy,
    adjustedUsage1,
    adjustedUsage2,
    basicShare1,
    basicShare2,
    usageShare1,
    usageShare2,
    total1,
    total2,
    settlement,
  };
}

export function parseSavedPeriod(v: unknown): SavedPeriod | null {
  if (!isPlainObject(v)) return null;
  const id = str(v.id);
  const savedAt = timestamp(v.savedAt);
  const { startDate, endDate, dueDate } = v;
  const basicFeesTotal = num(v.basicFeesTotal);
  const usageFeesTotal = num(v.usageFeesTotal);
  const sub1Usage = num(v.sub1Usage);
  const sub2Usage = num(v.sub2Usage);
  const mainUsage = v.mainUsage == null ? null : num(v.mainUsage);
  const allocation = parseAllocation(v.allocation);
  if (
    !id ||
    !savedAt ||
    !isDateKey(startDate) ||
    !isDateKey(endDate) ||
    basicFeesTotal == null ||
    usageFeesTotal == null ||
    sub1Usage == null ||
    sub2Usage == null ||
    (v.mainUsage != null && mainUsage == null) ||
    !isPolicy(v.mismatchPolicy) ||
    !allocation
  ) {
    return null;
  }
  return {
    id,
    savedAt,
    startDate,
    endDate,
    basicFeesTotal,
    usageFeesTotal,
    sub1Usage,
    sub2Usage,
    mainUsage,
    mismatchPolicy: v.mismatchPolicy,
    allocation,
    invoiceNumber: str(v.invoiceNumber),
    dueDate: isDateKey(dueDate) ? dueDate : null,
    estimated: v.estimated === true,
  };
}

function parseBasis(v: unknown): UsageBasis | null {
  if (!isPlainObject(v)) return null;
  const usage1 = num(v.usage1);
  const usage2 = num(v.usage2);
  if (usage1 == null || usage2 == null) return null;
  if (v.kind === "MANUAL") return { kind: "MANUAL", usage1, usage2 };
  if (v.kind === "PERIODS" && Array.isArray(v.periodIds)) {
    const periodIds: string[] = [];
    for (const id of v.periodIds) {
      if (typeof id !== "string") return null;
      periodIds.push(id);
    }
    return { kind: "PERIODS", periodIds, usage1, usage2 };
  }
  return null;
}

function parseTrueUpAllocation(v: unknown): TrueUpAllocation | null {
  if (!isPlainObject(v)) return null;
  const share1 = num(v.share1);
  const share2 = num(v.share2);
  const settlement = num(v.settlement);
  if (share1 == null || share2 == null || settlement == null) return null;
  return { share1, share2, settlement };
}

export function parseSavedTrueUp(v: unknown): SavedTrueUp | null {
  if (!isPlainObject(v)) return null;
  const id = str(v.id);
  const savedAt = timestamp(v.savedAt);
  const { startDate, endDate } = v;
  const correctionAmount = num(v.correctionAmount);
  const basis = parseBasis(v.basis);
  const allocation = parseTrueUpAllocation(v.allocation);
  if (!id || !savedAt || !isDateKey(startDate) || !isDateKey(endDate) || correctionAmount == null || !basis || !allocation) {
    return null;
  }
  return { id, savedAt, startDate, endDate, correctionAmount, basis, allocation };
}

export function sortPeriods(periods: SavedPeriod[]): SavedPeriod[] {
  return [...periods].sort(
    (a, b) => compareDateKeys(a.startDate, b.startDate) || Date.parse(a.savedAt) - Date.parse(b.savedAt)
  );
}

export function sortTrueUps(trueUps: SavedTrueUp[]): SavedTrueUp[] {
  return [...trueUps].sort((a, b) => Date.parse(a.savedAt) - Date.parse(b.savedAt));
}
