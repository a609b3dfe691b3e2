// Quantities are m³, money is EUR, dates are YYYY-MM-DD keys.

export type MeterInput =
  | { mode: "READINGS"; previous: number; current: number }
  | { mode: "USAGE"; usage: number };

export type Party = 1 | 2;

export type MismatchPolicy = "IGNORE" | "SPLIT_HALF" | "PROPORTIONAL";

export const MISMATCH_POLICIES: readonly MismatchPolicy[] = ["IGNORE", "SPLIT_HALF", "PROPORTIONAL"];

export type Severity = "OK" | "WARNING" | "INVESTIGATE";

export type Period = {
  startDate: string;
  endDate: string;
  basicFeesTotal: number;
  usageFeesTotal: number;
  sub1Usage: number;
  sub2Usage: number;
  mainUsage: number | null;
};

/** Optional invoice details kept alongside a saved period. */
export type InvoiceMeta = {
  invoiceNumber: string | null;
  dueDate: string | null;
  estimated: boolean;
};

export type BillInput = {
  startDate: string;
  endDate: string;
  basicFeesTotal: number;
  usageFeesTotal: number;
  sub1: MeterInput;
  sub2: MeterInput;
  main?: MeterInput | null;
  policy: MismatchPolicy;
  invoice?: Partial<InvoiceMeta>;
};

export type MismatchResult =
  | {
      evaluated: true;
      mainUsage: number;
      subTotal: number;
      mismatchM3: number;
      mismatchPct: number;
      severity: Severity;
    }
  | { evaluated: false; reason: "main_missing" | "main_zero" };

export type AllocationResult = {
  policy: MismatchPolicy;
  adjustedUsage1: number;
  adjustedUsage2: number;
  basicShare1: number;
  basicShare2: number;
  usageShare1: number;
  usageShare2: number;
  total1: number;
  total2: number;
  /** total1 − total2; positive: party 1's share is larger by this amount. */
  settlement: number;
};

export type Reimbursement = {
  from: Party;
  to: Party;
  amount: number;
};

export type UsageBasis =
  | { kind: "PERIODS"; periodIds: string[]; usage1: number; usage2: number }
  | { kind: "MANUAL"; usage1: number; usage2: number };

export type UsageBasisRequest =
  | { kind: "PERIODS"; periodIds: string[] }
  | { kind: "MANUAL"; usage1: number; usage2: number };

export type TrueUpAllocation = {
  share1: number;
  share2: number;
  /** share1 − share2, same sign convention as AllocationResult. */
  settlement: number;
};

export type TrueUp = {
  correctionAmount: number;
  startDate: string;
  endDate: string;
  basis: UsageBasis;
  allocation: TrueUpAllocation;
};

export type TrueUpInput = {
  correctionAmount: number;
  startDate: string;
  endDate: string;
  basis: UsageBasisRequest;
};
