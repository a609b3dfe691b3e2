import type { AllocationResult, InvoiceMeta, MismatchPolicy, Period, TrueUp } from "@/modules/waterBill/types";

export type SavedPeriod = Period &
  InvoiceMeta & {
    id: string;
    /** ISO timestamp */
    savedAt: string;
    mismatchPolicy: MismatchPolicy;
    allocation: AllocationResult;
  };

export type SavedTrueUp = TrueUp & {
  id: string;
  savedAt: string;
};

export type NewPeriodRecord = Omit<SavedPeriod, "id">;
export type NewTrueUpRecord = Omit<SavedTrueUp, "id">;

/**
 * Append-only history of billing periods and true-ups. Nothing here edits or
 * deletes a saved record.
 */
export interface WaterHistoryStore {
  /** Ordered by period start date, then save time. */
  listPeriods(): Promise<SavedPeriod[]>;
  savePeriod(record: NewPeriodRecord): Promise<string>;
  /** Ordered by save time. */
  listTrueUps(): Promise<SavedTrueUp[]>;
  saveTrueUp(record: NewTrueUpRecord): Promise<string>;
}

export class HistoryStoreError extends Error {
  readonly code: string;
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HistoryStoreError";
    this.code = code;
  }
}
