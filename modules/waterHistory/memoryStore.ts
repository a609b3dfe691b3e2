import { randomUUID } from "node:crypto";
import { sortPeriods, sortTrueUps } from "./records";
import type { NewPeriodRecord, NewTrueUpRecord, SavedPeriod, SavedTrueUp, WaterHistoryStore } from "./types";

export class MemoryHistoryStore implements WaterHistoryStore {
  private periods: SavedPeriod[] = [];
  private trueUps: SavedTrueUp[] = [];

  constructor(seed?: { periods?: SavedPeriod[]; trueUps?: SavedTrueUp[] }) {
    this.periods = structuredClone(seed?.periods ?? []);
    this.trueUps = structuredClone(seed?.trueUps ?? []);
  }

  async listPeriods(): Promise<SavedPeriod[]> {
    return structuredClone(sortPeriods(this.periods));
  }

  async savePeriod(record: NewPeriodRecord): Promise<string> {
    const id = randomUUID();
    this.periods.push({ ...structuredClone(record), id });
    return id;
  }

  async listTrueUps(): Promise<SavedTrueUp[]> {
    return structuredClone(sortTrueUps(this.trueUps));
  }

  async saveTrueUp(record: NewTrueUpRecord): Promise<string> {
    const id = randomUUID();
    this.trueUps.push({ ...structuredClone(record), id });
    return id;
  }
}
