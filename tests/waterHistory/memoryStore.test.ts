import { describe, expect, it } from "vitest";
import { MemoryHistoryStore } from "@/modules/waterHistory/memoryStore";
import { periodRecord, trueUpRecord } from "./fixtures";

describe("MemoryHistoryStore", () => {
  it("assigns ids and lists periods in date order", async () => {
    const store = new MemoryHistoryStore();
    const laterId = await store.savePeriod(periodRecord({ startDate: "2026-04-01", endDate: "2026-06-30" }));
    const earlierId = await store.savePeriod(periodRecord());
    expect(laterId).not.toBe(earlierId);

    const periods = await store.listPeriods();
    expect(periods.map((p) => p.id)).toEqual([earlierId, laterId]);
  });

  it("hands out copies so callers cannot edit history", async () => {
    const store = new MemoryHistoryStore();
    await store.savePeriod(periodRecord());
    const [first] = await store.listPeriods();
    first.sub1Usage = 999;
    first.allocation.total1 = 0;

    const [again] = await store.listPeriods();
    expect(again.sub1Usage).toBe(10);
    expect(again.allocation.total1).toBe(130.867);
  });

  it("starts from a seed and keeps true-ups separately", async () => {
    const store = new MemoryHistoryStore({ trueUps: [{ ...trueUpRecord(), id: "seeded" }] });
    const id = await store.saveTrueUp(trueUpRecord({ savedAt: "2026-08-01T00:00:00.000Z" }));

    expect((await store.listTrueUps()).map((t) => t.id)).toEqual(["seeded", id]);
    expect(await store.listPeriods()).toEqual([]);
  });
});
