import type { NewPeriodRecord, NewTrueUpRecord } from "@/modules/waterHistory/types";

export function periodRecord(overrides: Partial<NewPeriodRecord> = {}): NewPeriodRecord {
  return {
    startDate: "2026-01-01",
    endDate: "2026-03-31",
    basicFeesTotal: 84.03,
    usageFeesTotal: 222.13,
    sub1Usage: 10,
    sub2Usage: 15,
    mainUsage: 26,
    mismatchPolicy: "IGNORE",
    allocation: {
      policy: "IGNORE",
      adjustedUsage1: 10,
      adjustedUsage2: 15,
      basicShare1: 42.015,
      basicShare2: 42.015,
      usageShare1: 88.852,
      usageShare2: 133.278,
      total1: 130.867,
      total2: 175.293,
      settlement: -44.426,
    },
    invoiceNumber: null,
    dueDate: null,
    estimated: false,
    savedAt: "2026-04-02T08:00:00.000Z",
    ...overrides,
  };
}

export function trueUpRecord(overrides: Partial<NewTrueUpRecord> = {}): NewTrueUpRecord {
  return {
    correctionAmount: 20,
    startDate: "2026-01-01",
    endDate: "2026-06-30",
    basis: { kind: "MANUAL", usage1: 10, usage2: 15 },
    allocation: { share1: 8, share2: 12, settlement: -4 },
    savedAt: "2026-07-05T10:00:00.000Z",
    ...overrides,
  };
}
