import { Pool } from 'pg';

/** The slice of `pg` the history store needs; tests pass an in-process fake. */
export type HistorySqlClient = {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
};

declare global {
  // Reuse one pool across module reloads in dev.
  // eslint-disable-next-line no-var
  var waterHistoryPool: Pool | undefined;
}

export function createHistoryPool(databaseUrl: string): Pool {
  const urlLower = databaseUrl.toLowerCase();
  const sslRequired = urlLower.includes('sslmode=require') || urlLower.includes('ssl=true');
  return new Pool({
    connectionString: databaseUrl,
    ssl: sslRequired ? { rejectUnauthorized: false } : undefined,
    max: 4,
  });
}

let pool: Pool | undefined;

export function getHistoryPool(databaseUrl: string): Pool {
  pool = pool ?? globalThis.waterHistoryPool ?? createHistoryPool(databaseUrl);
  if (process.env.NODE_ENV !== 'production') globalThis.waterHistoryPool = pool;
  return pool;
}

export async function closeHistoryPool(): Promise<void> {
  const p = pool ?? globalThis.waterHistoryPool;
  pool = undefined;
  globalThis.waterHistoryPool = undefined;
  if (p) await p.end();
}

export function historySqlClient(source: Pool): HistorySqlClient {
  return {
    async query(text, values) {
      const res = await source.query(text, values);
      return { rows: res.rows };
    },
  };
}
