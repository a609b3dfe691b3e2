import { hasMaxDecimals, parseNumber } from "@/lib/format/waterUnits";
import { toDateKey } from "@/lib/time/dateKeys";
import { VOLUME_DECIMALS } from "./readings";
import type { BillInput, MeterInput, MismatchPolicy, TrueUpInput } from "./types";

// Raw form payloads. Numbers may arrive as text in the Finnish style
// ("84,03€", "27,366m3"); the first failing field decides the error code.

type Check<T> = { ok: true; value: T } | { ok: false; error: string };

const MONEY_DECIMALS = 2;

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function isBlank(v: unknown): boolean {
  return v == null || (typeof v === "string" && v.trim() === "");
}

function readNumber(
  raw: unknown,
  code: string,
  maxDecimals: number,
  opts?: { allowNegative?: boolean }
): Check<number> {
  if (isBlank(raw)) return { ok: false, error: `${code}_required` };
  const n = parseNumber(raw);
  if (n == null) return { ok: false, error: `${code}_invalid` };
  if (n < 0 && !opts?.allowNegative) return { ok: false, error: `${code}_negative` };
  if (!hasMaxDecimals(raw, maxDecimals, opts)) return { ok: false, error: `${code}_decimals` };
  return { ok: true, value: n };
}

function readDate(raw: unknown, code: string): Check<string> {
  const key = toDateKey(raw);
  return key ? { ok: true, value: key } : { ok: false, error: `${code}_invalid` };
}

const POLICY_ALIASES: Record<string, MismatchPolicy> = {
  ignore: "IGNORE",
  half: "SPLIT_HALF",
  split_half: "SPLIT_HALF",
  proportional: "PROPORTIONAL",
};

export function parsePolicy(raw: unknown): MismatchPolicy | null {
  if (isBlank(raw)) return "IGNORE";
  if (typeof raw !== "string") return null;
  return POLICY_ALIASES[raw.trim().toLowerCase()] ?? null;
}

function parseFlag(raw: unknown): boolean {
  if (typeof raw === "boolean") return raw;
  if (typeof raw !== "string") return false;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

function readMeter(form: Record<string, unknown>, label: string, mode: "READINGS" | "USAGE"): Check<MeterInput> {
  if (mode === "USAGE") {
    const usage = readNumber(form[`${label}Usage`], `${label}_usage`, VOLUME_DECIMALS);
    return usage.ok ? { ok: true, value: { mode: "USAGE", usage: usage.value } } : usage;
  }
  const previous = readNumber(form[`${label}Start`], `${label}_start`, VOLUME_DECIMALS);
  if (!previous.ok) return previous;
  const current = readNumber(form[`${label}End`], `${label}_end`, VOLUME_DECIMALS);
  if (!current.ok) return current;
  return { ok: true, value: { mode: "READINGS", previous: previous.value, current: current.value } };
}

function mainMeterPresent(form: Record<string, unknown>, mode: "READINGS" | "USAGE"): boolean | "partial" {
  if (mode === "USAGE") return !isBlank(form.mainUsage);
  const hasStart = !isBlank(form.mainStart);
  const hasEnd = !isBlank(form.mainEnd);
  if (hasStart !== hasEnd) return "partial";
  return hasStart;
}

export function validateBillForm(form: unknown): Check<BillInput> {
  if (!isPlainObject(form)) return { ok: false, error: "payload_required" };

  const startDate = readDate(form.startDate, "start_date");
  if (!startDate.ok) return startDate;
  const endDate = readDate(form.endDate, "end_date");
  if (!endDate.ok) return endDate;
  if (startDate.value > endDate.value) return { ok: false, error: "period_dates_inverted" };

  const basicFees = readNumber(form.basicFees, "basic_fees", MONEY_DECIMALS);
  if (!basicFees.ok) return basicFees;
  const usageFees = readNumber(form.usageFees, "usage_fees", MONEY_DECIMALS);
  if (!usageFees.ok) return usageFees;

  const modeRaw = isBlank(form.usageMode) ? "READINGS" : form.usageMode;
  if (modeRaw !== "READINGS" && modeRaw !== "USAGE") return { ok: false, error: "usage_mode_invalid" };
  const mode = modeRaw;

  const sub1 = readMeter(form, "sub1", mode);
  if (!sub1.ok) return sub1;
  const sub2 = readMeter(form, "sub2", mode);
  if (!sub2.ok) return sub2;

  const mainPresent = mainMeterPresent(form, mode);
  if (mainPresent === "partial") return { ok: false, error: "main_reading_incomplete" };
  let main: MeterInput | null = null;
  if (mainPresent) {
    const m = readMeter(form, "main", mode);
    if (!m.ok) return m;
    main = m.value;
  }

  const policy = parsePolicy(form.policy);
  if (!policy) return { ok: false, error: "policy_invalid" };
  if (policy !== "IGNORE" && !main) return { ok: false, error: "mismatch_override_requires_main" };

  let dueDate: string | null = null;
  if (!isBlank(form.dueDate)) {
    const d = readDate(form.dueDate, "due_date");
    if (!d.ok) return d;
    dueDate = d.value;
  }
  const invoiceNumber = typeof form.invoiceNumber === "string" && form.invoiceNumber.trim() ? form.invoiceNumber.trim() : null;

  return {
    ok: true,
    value: {
      startDate: startDate.value,
      endDate: endDate.value,
      basicFeesTotal: basicFees.value,
      usageFeesTotal: usageFees.value,
      sub1: sub1.value,
      sub2: sub2.value,
      main,
      policy,
      invoice: { invoiceNumber, dueDate, estimated: parseFlag(form.estimated) },
    },
  };
}

function readPeriodIds(raw: unknown): string[] {
  const items = typeof raw === "string" ? raw.split(",") : Array.isArray(raw) ? raw : [];
  const out: string[] = [];
  for (const item of items) {
    if (typeof item === "string" && item.trim()) out.push(item.trim());
  }
  return out;
}

export function validateTrueUpForm(form: unknown): Check<TrueUpInput> {
  if (!isPlainObject(form)) return { ok: false, error: "payload_required" };

  const startDate = readDate(form.startDate, "start_date");
  if (!startDate.ok) return startDate;
  const endDate = readDate(form.endDate, "end_date");
  if (!endDate.ok) return endDate;
  if (startDate.value > endDate.value) return { ok: false, error: "period_dates_inverted" };

  const amount = readNumber(form.amount, "trueup_amount", MONEY_DECIMALS, { allowNegative: true });
  if (!amount.ok) return amount;

  const source = isBlank(form.source) ? "PERIODS" : form.source;
  if (source === "PERIODS") {
    const periodIds = readPeriodIds(form.periodIds);
    if (!periodIds.length) return { ok: false, error: "trueup_periods_required" };
    return {
      ok: true,
      value: {
        correctionAmount: amount.value,
        startDate: startDate.value,
        endDate: endDate.value,
        basis: { kind: "PERIODS", periodIds },
      },
    };
  }
  if (source !== "MANUAL") return { ok: false, error: "usage_source_invalid" };

  const usage1 = readNumber(form.usage1, "sub1_usage", VOLUME_DECIMALS);
  if (!usage1.ok) return usage1;
  const usage2 = readNumber(form.usage2, "sub2_usage", VOLUME_DECIMALS);
  if (!usage2.ok) return usage2;
  return {
    ok: true,
    value: {
      correctionAmount: amount.value,
      startDate: startDate.value,
      endDate: endDate.value,
      basis: { kind: "MANUAL", usage1: usage1.value, usage2: usage2.value },
    },
  };
}
