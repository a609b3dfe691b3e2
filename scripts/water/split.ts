/* eslint-disable no-console */
/**
 * Split one water bill between the two sub-meters.
 *
 * Usage:
 *   tsx scripts/water/split.ts --startDate=01/01/2026 --endDate=31/03/2026 \
 *     --basicFees=84,03 --usageFees=222,13 --usageMode=USAGE \
 *     --sub1Usage=10 --sub2Usage=15 [--mainUsage=26] [--policy=proportional] [--save]
 *
 * Readings mode takes --sub1Start/--sub1End, --sub2Start/--sub2End and
 * optionally --mainStart/--mainEnd instead of the *Usage flags.
 */
import { parseFlagArgs } from '@/lib/cli/args';
import { formatEur, formatM3 } from '@/lib/format/waterUnits';
import { splitCurrentBill } from '@/modules/waterBill/service';
import { mismatchSummaryLines, splitSummaryLine } from '@/modules/waterBill/summary';
import { validateBillForm } from '@/modules/waterBill/validation';
import { bootstrap, shutdown } from './_shared/env';

async function main() {
  const args = parseFlagArgs(process.argv.slice(2));
  const form = validateBillForm(args);
  if (!form.ok) {
    console.error(`ERROR: ${form.error}`);
    process.exitCode = 1;
    return;
  }

  const { config, store } = bootstrap();
  const res = await splitCurrentBill(store, form.value, {
    save: args.save === 'true',
    billPayer: config.billPayer,
  });
  if (!res.ok) {
    console.error(`ERROR: ${res.error}${res.message ? ` (${res.message})` : ''}`);
    process.exitCode = 1;
    return;
  }

  const { allocation, mismatch, reimbursement, savedId, saveError } = res.data;
  const labels = config.partyLabels;
  console.table([
    {
      person: labels[1],
      usage: formatM3(allocation.adjustedUsage1),
      usageFees: formatEur(allocation.usageShare1),
      basicFees: formatEur(allocation.basicShare1),
      total: formatEur(allocation.total1),
    },
    {
      person: labels[2],
      usage: formatM3(allocation.adjustedUsage2),
      usageFees: formatEur(allocation.usageShare2),
      basicFees: formatEur(allocation.basicShare2),
      total: formatEur(allocation.total2),
    },
  ]);
  for (const line of mismatchSummaryLines(mismatch)) console.log(line);
  console.log(splitSummaryLine(allocation, reimbursement, labels));

  if (savedId) console.log(`[water] saved period ${savedId}`);
  if (saveError) {
    console.error(`[water] period not saved: ${saveError}`);
    process.exitCode = 1;
  }
}

main()
  .catch((err) => {
    console.error('[water] Unexpected error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  })
  .finally(shutdown);
