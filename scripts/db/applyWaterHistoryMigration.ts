import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { createHistoryPool } from "@/lib/db/historyClient";

dotenv.config({ path: ".env.local", override: false });
dotenv.config({ path: ".env", override: false });

async function main() {
  const dbUrl = process.env.WATER_HISTORY_DATABASE_URL || process.env.DATABASE_URL;
  if (!dbUrl) {
    console.error("[DB] WATER_HISTORY_DATABASE_URL (or DATABASE_URL) is not set. Export it before running this script.");
    process.exit(1);
  }

  const migrationPath = path.join(process.cwd(), "db", "migrations", "20261018_water_history", "migration.sql");

  if (!fs.existsSync(migrationPath)) {
    console.error("[DB] Migration file not found:", migrationPath);
    process.exit(1);
  }

  const sql = fs.readFileSync(migrationPath, "utf8").trim();
  if (!sql) {
    console.error("[DB] Migration file is empty:", migrationPath);
    process.exit(1);
  }

  const pool = createHistoryPool(dbUrl);
  try {
    console.log("[DB] Running migration SQL from:", migrationPath);
    await pool.query(sql);
    console.log("[DB] Water history tables are in place.");
  } catch (err) {
    console.error("[DB] Error applying water history migration:");
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error("[DB] Unexpected error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
