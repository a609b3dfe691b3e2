import { randomUUID } from "node:crypto";
import type { HistorySqlClient } from "@/lib/db/historyClient";
import { parseSavedPeriod, parseSavedTrueUp } from "./records";
import {
  HistoryStoreError,
  type NewPeriodRecord,
  type NewTrueUpRecord,
  type SavedPeriod,
  type SavedTrueUp,
  type WaterHistoryStore,
} from "./types";

const SELECT_PERIODS = `
SELECT id,
       to_char(start_date, 'YYYY-MM-DD') AS start_date,
       to_char(end_date, 'YYYY-MM-DD') AS end_date,
       basic_fees_total, usage_fees_total,
       sub1_usage, sub2_usage, main_usage,
       mismatch_policy, allocation_json,
       invoice_number, to_char(due_date, 'YYYY-MM-DD') AS due_date, estimated,
       saved_at
  FROM water_period
 ORDER BY start_date ASC, saved_at ASC`;

const INSERT_PERIOD = `
INSERT INTO water_period (
  id, start_date, end_date, basic_fees_total, usage_fees_total,
  sub1_usage, sub2_usage, main_usage, mismatch_policy, allocation_json,
  invoice_number, due_date, estimated, saved_at
) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)`;

const SELECT_TRUEUPS = `
SELECT t.id,
       to_char(t.start_date, 'YYYY-MM-DD') AS start_date,
       to_char(t.end_date, 'YYYY-MM-DD') AS end_date,
       t.correction_amount, t.basis_kind, t.usage1, t.usage2,
       t.share1, t.share2, t.settlement, t.saved_at,
       COALESCE(
         array_agg(r.period_id ORDER BY r.position) FILTER (WHERE r.period_id IS NOT NULL),
         '{}'::text[]
       ) AS period_ids
  FROM water_trueup t
  LEFT JOIN water_trueup_period r ON r.trueup_id = t.id
 GROUP BY t.id
 ORDER BY t.saved_at ASC`;

// One statement so the true-up and its period links land together.
const INSERT_TRUEUP = `
WITH t AS (
  INSERT INTO water_trueup (
    id, start_date, end_date, correction_amount, basis_kind,
    usage1, usage2, share1, share2, settlement, saved_at
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
  RETURNING id
)
INSERT INTO water_trueup_period (trueup_id, period_id, position)
SELECT t.id, ref.period_id, ref.position
  FROM t CROSS JOIN unnest($12::text[]) WITH ORDINALITY AS ref(period_id, position)`;

function isRow(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function asRow(row: unknown): Record<string, unknown> {
  if (!isRow(row)) {
    throw new HistoryStoreError("history_row_invalid", "Unexpected row shape from water history query");
  }
  return row;
}

export function periodFromRow(raw: unknown): SavedPeriod {
  const row = asRow(raw);
  const period = parseSavedPeriod({
    id: row.id,
    startDate: row.start_date,
    endDate: row.end_date,
    basicFeesTotal: row.basic_fees_total,
    usageFeesTotal: row.usage_fees_total,
    sub1Usage: row.sub1_usage,
    sub2Usage: row.sub2_usage,
    mainUsage: row.main_usage,
    mismatchPolicy: row.mismatch_policy,
    allocation: row.allocation_json,
    invoiceNumber: row.invoice_number,
    dueDate: row.due_date,
    estimated: row.estimated,
    savedAt: row.saved_at,
  });
  if (!period) throw new HistoryStoreError("history_row_invalid", `water_period row ${String(row.id)} is malformed`);
  return period;
}

export function trueUpFromRow(raw: unknown): SavedTrueUp {
  const row = asRow(raw);
  const trueUp = parseSavedTrueUp({
    id: row.id,
    startDate: row.start_date,
    endDate: row.end_date,
    correctionAmount: row.correction_amount,
    basis: {
      kind: row.basis_kind,
      periodIds: row.period_ids,
      usage1: row.usage1,
      usage2: row.usage2,
    },
    allocation: { share1: row.share1, share2: row.share2, settlement: row.settlement },
    savedAt: row.saved_at,
  });
  if (!trueUp) throw new HistoryStoreError("history_row_invalid", `water_trueup row ${String(row.id)} is malformed`);
  return trueUp;
}

export class PgHistoryStore implements WaterHistoryStore {
  constructor(private readonly client: HistorySqlClient) {}

  async listPeriods(): Promise<SavedPeriod[]> {
    const res = await this.client.query(SELECT_PERIODS);
    return res.rows.map(periodFromRow);
  }

  async savePeriod(record: NewPeriodRecord): Promise<string> {
    const id = randomUUID();
    await this.client.query(INSERT_PERIOD, [
      id,
      record.startDate,
      record.endDate,
      record.basicFeesTotal,
      record.usageFeesTotal,
      record.sub1Usage,
      record.sub2Usage,
      record.mainUsage,
      record.mismatchPolicy,
      JSON.stringify(record.allocation),
      record.invoiceNumber,
      record.dueDate,
      record.estimated,
      record.savedAt,
    ]);
    return id;
  }

  async listTrueUps(): Promise<SavedTrueUp[]> {
    const res = await this.client.query(SELECT_TRUEUPS);
    return res.rows.map(trueUpFromRow);
  }

  async saveTrueUp(record: NewTrueUpRecord): Promise<string> {
    const id = randomUUID();
    const periodIds = record.basis.kind === "PERIODS" ? record.basis.periodIds : [];
    await this.client.query(INSERT_TRUEUP, [
      id,
      record.startDate,
      record.endDate,
      record.correctionAmount,
      record.basis.kind,
      record.basis.usage1,
      record.basis.usage2,
      record.allocation.share1,
      record.allocation.share2,
      record.allocation.settlement,
      record.savedAt,
      periodIds,
    ]);
    return id;
  }
}
