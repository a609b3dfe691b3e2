import path from 'node:path';
import type { Party } from '@/modules/waterBill/types';

export type HistoryBackend = 'memory' | 'file' | 'postgres';

export type WaterConfig = {
  historyBackend: HistoryBackend;
  historyFile: string;
  databaseUrl: string | null;
  partyLabels: Record<Party, string>;
  /** The party that pays the utility and is reimbursed by the other. */
  billPayer: Party;
};

type Env = Record<string, string | undefined>;

function pick(env: Env, key: string): string | null {
  const v = env[key];
  if (typeof v !== 'string') return null;
  const s = v.trim();
  return s.length ? s : null;
}

function parseBackend(raw: string | null): HistoryBackend {
  if (raw == null) return 'file';
  const v = raw.toLowerCase();
  if (v === 'memory' || v === 'file' || v === 'postgres') return v;
  console.warn(`[config] Unknown WATER_HISTORY_BACKEND "${raw}", using "file"`);
  return 'file';
}

function parsePayer(raw: string | null): Party {
  if (raw == null || raw === '2') return 2;
  if (raw === '1') return 1;
  console.warn(`[config] WATER_BILL_PAYER must be 1 or 2 (got "${raw}"), using 2`);
  return 2;
}

export function loadWaterConfig(env: Env = process.env, cwd: string = process.cwd()): WaterConfig {
  const historyFile = pick(env, 'WATER_HISTORY_FILE') ?? path.join('data', 'history.json');
  return {
    historyBackend: parseBackend(pick(env, 'WATER_HISTORY_BACKEND')),
    historyFile: path.resolve(cwd, historyFile),
    databaseUrl: pick(env, 'WATER_HISTORY_DATABASE_URL') ?? pick(env, 'DATABASE_URL'),
    partyLabels: {
      1: pick(env, 'WATER_PARTY_1_LABEL') ?? 'AS-1',
      2: pick(env, 'WATER_PARTY_2_LABEL') ?? 'AS-2',
    },
    billPayer: parsePayer(pick(env, 'WATER_BILL_PAYER')),
  };
}
