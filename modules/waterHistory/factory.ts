import { getHistoryPool, historySqlClient } from "@/lib/db/historyClient";
import type { WaterConfig } from "@/lib/waterConfig";
import { FileHistoryStore } from "./fileStore";
import { MemoryHistoryStore } from "./memoryStore";
import { PgHistoryStore } from "./pgStore";
import { HistoryStoreError, type WaterHistoryStore } from "./types";

export function createHistoryStore(config: Pick<WaterConfig, "historyBackend" | "historyFile" | "databaseUrl">): WaterHistoryStore {
  switch (config.historyBackend) {
    case "memory":
      return new MemoryHistoryStore();
    case "file":
      return new FileHistoryStore(config.historyFile);
    case "postgres": {
      if (!config.databaseUrl) {
        throw new HistoryStoreError(
          "history_db_missing_env",
          "WATER_HISTORY_DATABASE_URL (or DATABASE_URL) is required for the postgres history backend."
        );
      }
      return new PgHistoryStore(historySqlClient(getHistoryPool(config.databaseUrl)));
    }
  }
}
