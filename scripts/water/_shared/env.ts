import dotenv from 'dotenv';
import { loadWaterConfig, type WaterConfig } from '@/lib/waterConfig';
import { closeHistoryPool } from '@/lib/db/historyClient';
import { createHistoryStore } from '@/modules/waterHistory/factory';
import type { WaterHistoryStore } from '@/modules/waterHistory/types';

dotenv.config({ path: '.env.local', override: false });
dotenv.config({ path: '.env', override: false });

export function bootstrap(): { config: WaterConfig; store: WaterHistoryStore } {
  const config = loadWaterConfig();
  return { config, store: createHistoryStore(config) };
}

export async function shutdown(): Promise<void> {
  await closeHistoryPool();
}
