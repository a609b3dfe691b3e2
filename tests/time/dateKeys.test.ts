import { describe, expect, it } from "vitest";
import { compareDateKeys, formatDisplayDate, isDateKey, toDateKey } from "@/lib/time/dateKeys";

describe("toDateKey", () => {
  it("accepts ISO and day-first dates", () => {
    expect(toDateKey("2026-03-31")).toBe("2026-03-31");
    expect(toDateKey("31/03/2026")).toBe("2026-03-31");
    expect(toDateKey("1/4/2026")).toBe("2026-04-01");
    expect(toDateKey("31/03/2026 14:05")).toBe("2026-03-31");
  });

  it("keeps the wall date of an offset timestamp", () => {
    expect(toDateKey("2026-03-31T23:30:00-05:00")).toBe("2026-03-31");
    expect(toDateKey(new Date("2026-03-31T12:00:00.000Z"))).toBe("2026-03-31");
  });

  it("returns null for impossible or missing dates", () => {
    expect(toDateKey("2026-02-30")).toBeNull();
    expect(toDateKey("31/02/2026")).toBeNull();
    expect(toDateKey("  ")).toBeNull();
    expect(toDateKey(20260331)).toBeNull();
  });
});

describe("isDateKey", () => {
  it("only accepts real YYYY-MM-DD dates", () => {
    expect(isDateKey("2026-12-31")).toBe(true);
    expect(isDateKey("2026-13-01")).toBe(false);
    expect(isDateKey("31/12/2026")).toBe(false);
    expect(isDateKey(null)).toBe(false);
  });
});

describe("formatDisplayDate", () => {
  it("prints day-first", () => {
    expect(formatDisplayDate("2026-03-31")).toBe("31/03/2026");
    expect(formatDisplayDate("not a date")).toBe("not a date");
  });
});

describe("compareDateKeys", () => {
  it("orders keys chronologically", () => {
    expect(["2026-04-01", "2025-12-31", "2026-01-15"].sort(compareDateKeys)).toEqual([
      "2025-12-31",
      "2026-01-15",
      "2026-04-01",
    ]);
    expect(compareDateKeys("2026-01-01", "2026-01-01")).toBe(0);
  });
});
