import { afterEach, describe, expect, it, vi } from "vitest";
import { MemoryHistoryStore } from "@/modules/waterHistory/memoryStore";
import { HistoryStoreError, type WaterHistoryStore } from "@/modules/waterHistory/types";
import {
  calculateTrueUp,
  listPeriodHistory,
  listTrueUpHistory,
  splitCurrentBill,
} from "@/modules/waterBill/service";
import type { BillInput } from "@/modules/waterBill/types";

const fixedNow = () => new Date("2026-04-02T08:00:00.000Z");

const q1: BillInput = {
  startDate: "2026-01-01",
  endDate: "2026-03-31",
  basicFeesTotal: 84.03,
  usageFeesTotal: 222.13,
  sub1: { mode: "USAGE", usage: 10 },
  sub2: { mode: "USAGE", usage: 15 },
  main: { mode: "USAGE", usage: 26 },
  policy: "IGNORE",
};

function failingStore(error: unknown): WaterHistoryStore {
  return {
    listPeriods: () => Promise.reject(error),
    savePeriod: () => Promise.reject(error),
    listTrueUps: () => Promise.reject(error),
    saveTrueUp: () => Promise.reject(error),
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("splitCurrentBill", () => {
  it("computes the split without saving by default", async () => {
    const store = new MemoryHistoryStore();
    const res = await splitCurrentBill(store, q1);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.data.period.mainUsage).toBe(26);
    expect(res.data.mismatch.evaluated && res.data.mismatch.severity).toBe("OK");
    expect(res.data.allocation.total1).toBeCloseTo(130.867, 9);
    expect(res.data.reimbursement.from).toBe(1);
    expect(res.data.reimbursement.to).toBe(2);
    expect(res.data.reimbursement.amount).toBeCloseTo(130.867, 9);
    expect(res.data.savedId).toBeNull();
    expect(await store.listPeriods()).toHaveLength(0);
  });

  it("saves the period with its allocation and invoice details", async () => {
    const store = new MemoryHistoryStore();
    const res = await splitCurrentBill(
      store,
      { ...q1, invoice: { invoiceNumber: "INV-1", estimated: true } },
      { save: true, billPayer: 1, now: fixedNow }
    );
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.data.reimbursement.from).toBe(2);
    expect(res.data.reimbursement.amount).toBeCloseTo(175.293, 9);

    const [saved] = await store.listPeriods();
    expect(saved.id).toBe(res.data.savedId);
    expect(saved.savedAt).toBe("2026-04-02T08:00:00.000Z");
    expect(saved.sub1Usage).toBe(10);
    expect(saved.mismatchPolicy).toBe("IGNORE");
    expect(saved.invoiceNumber).toBe("INV-1");
    expect(saved.dueDate).toBeNull();
    expect(saved.estimated).toBe(true);
    expect(saved.allocation.total2).toBeCloseTo(175.293, 9);
  });

  it("maps calculation failures to their codes", async () => {
    const store = new MemoryHistoryStore();
    const inverted = await splitCurrentBill(store, {
      ...q1,
      sub1: { mode: "READINGS", previous: 50, current: 40 },
    });
    expect(inverted).toMatchObject({ ok: false, error: "sub1_readings_inverted" });

    const noMain = await splitCurrentBill(store, { ...q1, main: null, policy: "SPLIT_HALF" });
    expect(noMain).toMatchObject({ ok: false, error: "mismatch_override_requires_main" });

    const zero = await splitCurrentBill(store, {
      ...q1,
      sub1: { mode: "USAGE", usage: 0 },
      sub2: { mode: "USAGE", usage: 0 },
    });
    expect(zero).toMatchObject({ ok: false, error: "sub_usage_zero" });

    const dates = await splitCurrentBill(store, { ...q1, startDate: "2026-04-01" });
    expect(dates).toMatchObject({ ok: false, error: "period_dates_inverted" });
  });

  it("still returns the split when saving fails", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const res = await splitCurrentBill(failingStore(new Error("disk full")), q1, { save: true });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.data.savedId).toBeNull();
    expect(res.data.saveError).toBe("history_store_error");
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});

describe("calculateTrueUp", () => {
  it("allocates against the usage of saved periods and stores a snapshot", async () => {
    const store = new MemoryHistoryStore();
    const first = await splitCurrentBill(store, q1, { save: true, now: fixedNow });
    const second = await splitCurrentBill(
      store,
      {
        ...q1,
        startDate: "2026-04-01",
        endDate: "2026-06-30",
        sub1: { mode: "USAGE", usage: 25 },
        sub2: { mode: "USAGE", usage: 40 },
        main: null,
      },
      { save: true, now: fixedNow }
    );
    if (!first.ok || !second.ok || !first.data.savedId || !second.data.savedId) {
      throw new Error("setup failed");
    }

    const res = await calculateTrueUp(
      store,
      {
        correctionAmount: 90,
        startDate: "2026-01-01",
        endDate: "2026-06-30",
        basis: { kind: "PERIODS", periodIds: [first.data.savedId, second.data.savedId] },
      },
      { save: true, now: fixedNow }
    );
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.data.trueUp.basis.usage1).toBe(35);
    expect(res.data.trueUp.basis.usage2).toBe(55);
    expect(res.data.trueUp.allocation.share1).toBeCloseTo(35, 9);
    expect(res.data.trueUp.allocation.share2).toBeCloseTo(55, 9);
    expect(res.data.reimbursement).toEqual({ from: 1, to: 2, amount: res.data.trueUp.allocation.share1 });

    const history = await listTrueUpHistory(store);
    expect(history.ok && history.data.map((t) => t.id)).toEqual([res.data.savedId]);
    expect(await store.listPeriods()).toHaveLength(2);
  });

  it("uses manual usage as given", async () => {
    const res = await calculateTrueUp(new MemoryHistoryStore(), {
      correctionAmount: -20,
      startDate: "2026-07-01",
      endDate: "2026-09-30",
      basis: { kind: "MANUAL", usage1: 10, usage2: 15 },
    });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.data.trueUp.allocation.share1).toBeCloseTo(-8, 9);
    expect(res.data.reimbursement.from).toBe(2);
    expect(res.data.reimbursement.to).toBe(1);
    expect(res.data.reimbursement.amount).toBeCloseTo(8, 9);
  });

  it("reports unknown periods and empty usage", async () => {
    const store = new MemoryHistoryStore();
    const missing = await calculateTrueUp(store, {
      correctionAmount: 10,
      startDate: "2026-01-01",
      endDate: "2026-01-31",
      basis: { kind: "PERIODS", periodIds: ["nope"] },
    });
    expect(missing).toMatchObject({ ok: false, error: "trueup_period_not_found" });

    const empty = await calculateTrueUp(store, {
      correctionAmount: 10,
      startDate: "2026-01-01",
      endDate: "2026-01-31",
      basis: { kind: "MANUAL", usage1: 0, usage2: 0 },
    });
    expect(empty).toMatchObject({ ok: false, error: "trueup_usage_zero" });
  });

  it("surfaces store failures while loading periods", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const res = await calculateTrueUp(failingStore(new HistoryStoreError("history_file_corrupt", "bad json")), {
      correctionAmount: 10,
      startDate: "2026-01-01",
      endDate: "2026-01-31",
      basis: { kind: "PERIODS", periodIds: ["p1"] },
    });
    expect(res).toEqual({ ok: false, error: "history_file_corrupt", message: "bad json" });
  });
});

describe("listPeriodHistory", () => {
  it("evaluates the mismatch fresh for every saved period", async () => {
    const store = new MemoryHistoryStore();
    await splitCurrentBill(store, { ...q1, main: { mode: "USAGE", usage: 30 } }, { save: true, now: fixedNow });
    await splitCurrentBill(store, { ...q1, startDate: "2025-10-01", endDate: "2025-12-31", main: null }, { save: true, now: fixedNow });

    const res = await listPeriodHistory(store);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.data.map((p) => p.startDate)).toEqual(["2025-10-01", "2026-01-01"]);
    expect(res.data[0].mismatch).toEqual({ evaluated: false, reason: "main_missing" });
    expect(res.data[1].mismatch.evaluated && res.data[1].mismatch.severity).toBe("INVESTIGATE");
  });

  it("maps unexpected store errors to history_store_error", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const res = await listPeriodHistory(failingStore(new Error("connection refused")));
    expect(res).toEqual({ ok: false, error: "history_store_error", message: "connection refused" });
  });
});
