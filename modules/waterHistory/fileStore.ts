import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { parseSavedPeriod, parseSavedTrueUp, sortPeriods, sortTrueUps } from "./records";
import {
  HistoryStoreError,
  type NewPeriodRecord,
  type NewTrueUpRecord,
  type SavedPeriod,
  type SavedTrueUp,
  type WaterHistoryStore,
} from "./types";

type HistoryDocument = {
  version: 1;
  periods: unknown[];
  trueUps: unknown[];
};

function isErrnoCode(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}

/**
 * History kept in one JSON document on disk. Entries that fail the shape
 * check are skipped on read but written back untouched, so a bad row never
 * costs the rest of the file.
 */
export class FileHistoryStore implements WaterHistoryStore {
  constructor(private readonly filePath: string) {}

  private async readDocument(): Promise<HistoryDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (e) {
      if (isErrnoCode(e, "ENOENT")) return { version: 1, periods: [], trueUps: [] };
      throw new HistoryStoreError("history_file_unreadable", `Cannot read ${this.filePath}`, { cause: e });
    }
    if (!raw.trim()) return { version: 1, periods: [], trueUps: [] };

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new HistoryStoreError("history_file_corrupt", `${this.filePath} is not valid JSON`, { cause: e });
    }
    if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new HistoryStoreError("history_file_corrupt", `${this.filePath} is not a history document`);
    }
    const version = "version" in parsed ? parsed.version : undefined;
    if (version !== 1) {
      throw new HistoryStoreError("history_file_corrupt", `${this.filePath} has unsupported version ${String(version)}`);
    }
    const periods = "periods" in parsed ? parsed.periods : [];
    const trueUps = "trueUps" in parsed ? parsed.trueUps : [];
    if (!Array.isArray(periods) || !Array.isArray(trueUps)) {
      throw new HistoryStoreError("history_file_corrupt", `${this.filePath} has non-list periods or trueUps`);
    }
    return { version: 1, periods, trueUps };
  }

  private async writeDocument(doc: HistoryDocument): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(doc, null, 2), "utf8");
      await fs.rename(tmp, this.filePath);
    } catch (e) {
      await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
        console.warn(`[waterHistory/file] could not remove ${tmp}`, rmErr);
      });
      throw new HistoryStoreError("history_file_unwritable", `Cannot write ${this.filePath}`, { cause: e });
    }
  }

  async listPeriods(): Promise<SavedPeriod[]> {
    const doc = await this.readDocument();
    const out: SavedPeriod[] = [];
    for (const entry of doc.periods) {
      const p = parseSavedPeriod(entry);
      if (p) out.push(p);
      else console.warn("[waterHistory/file] skipping malformed period entry");
    }
    return sortPeriods(out);
  }

  async savePeriod(record: NewPeriodRecord): Promise<string> {
    const doc = await this.readDocument();
    const id = randomUUID();
    doc.periods.push({ ...record, id });
    await this.writeDocument(doc);
    return id;
  }

  async listTrueUps(): Promise<SavedTrueUp[]> {
    const doc = await this.readDocument();
    const out: SavedTrueUp[] = [];
    for (const entry of doc.trueUps) {
      const t = parseSavedTrueUp(entry);
      if (t) out.push(t);
      else console.warn("[waterHistory/file] skipping malformed true-up entry");
    }
    return sortTrueUps(out);
  }

  async saveTrueUp(record: NewTrueUpRecord): Promise<string> {
    const doc = await this.readDocument();
    const id = randomUUID();
    doc.trueUps.push({ ...record, id });
    await this.writeDocument(doc);
    return id;
  }
}
