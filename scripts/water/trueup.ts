/* eslint-disable no-console */
/**
 * Reconcile a correction invoice against saved periods or manual usage.
 *
 * Usage:
 *   tsx scripts/water/trueup.ts --startDate=2026-07-01 --endDate=2026-09-30 \
 *     --amount=-12,50 --periodIds=<id>,<id> [--save]
 *   tsx scripts/water/trueup.ts ... --source=MANUAL --usage1=10 --usage2=15
 */
import { parseFlagArgs } from '@/lib/cli/args';
import { calculateTrueUp } from '@/modules/waterBill/service';
import { trueUpSummaryLine } from '@/modules/waterBill/summary';
import { validateTrueUpForm } from '@/modules/waterBill/validation';
import { bootstrap, shutdown } from './_shared/env';

async function main() {
  const args = parseFlagArgs(process.argv.slice(2));
  const form = validateTrueUpForm(args);
  if (!form.ok) {
    console.error(`ERROR: ${form.error}`);
    process.exitCode = 1;
    return;
  }

  const { config, store } = bootstrap();
  const res = await calculateTrueUp(store, form.value, {
    save: args.save === 'true',
    billPayer: config.billPayer,
  });
  if (!res.ok) {
    console.error(`ERROR: ${res.error}${res.message ? ` (${res.message})` : ''}`);
    process.exitCode = 1;
    return;
  }

  const { trueUp, reimbursement, savedId, saveError } = res.data;
  console.log(trueUpSummaryLine(trueUp, reimbursement, config.partyLabels));
  if (savedId) console.log(`[water] saved true-up ${savedId}`);
  if (saveError) {
    console.error(`[water] true-up not saved: ${saveError}`);
    process.exitCode = 1;
  }
}

main()
  .catch((err) => {
    console.error('[water] Unexpected error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  })
  .finally(shutdown);
