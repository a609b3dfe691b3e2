/* eslint-disable no-console */
/**
 * Print saved periods (with a freshly evaluated mismatch) and true-ups.
 *
 * Usage:
 *   tsx scripts/water/history.ts
 */
import { formatDisplayDate } from '@/lib/time/dateKeys';
import { formatEur, formatM3, formatPercent } from '@/lib/format/waterUnits';
import { listPeriodHistory, listTrueUpHistory } from '@/modules/waterBill/service';
import { bootstrap, shutdown } from './_shared/env';

async function main() {
  const { config, store } = bootstrap();
  const labels = config.partyLabels;

  const periods = await listPeriodHistory(store);
  if (!periods.ok) {
    console.error(`ERROR: ${periods.error}`);
    process.exitCode = 1;
    return;
  }
  console.log(`Periods (${periods.data.length})`);
  console.table(
    periods.data.map((p) => ({
      id: p.id,
      period: `${formatDisplayDate(p.startDate)} – ${formatDisplayDate(p.endDate)}`,
      [labels[1]]: `${formatM3(p.sub1Usage)} / ${formatEur(p.allocation.total1)}`,
      [labels[2]]: `${formatM3(p.sub2Usage)} / ${formatEur(p.allocation.total2)}`,
      policy: p.mismatchPolicy,
      mismatch: p.mismatch.evaluated
        ? `${formatM3(p.mismatch.mismatchM3)} (${formatPercent(p.mismatch.mismatchPct)}) ${p.mismatch.severity}`
        : 'n/a',
    }))
  );

  const trueUps = await listTrueUpHistory(store);
  if (!trueUps.ok) {
    console.error(`ERROR: ${trueUps.error}`);
    process.exitCode = 1;
    return;
  }
  console.log(`True-ups (${trueUps.data.length})`);
  console.table(
    trueUps.data.map((t) => ({
      id: t.id,
      period: `${formatDisplayDate(t.startDate)} – ${formatDisplayDate(t.endDate)}`,
      amount: formatEur(t.correctionAmount),
      basis: t.basis.kind === 'PERIODS' ? `${t.basis.periodIds.length} period(s)` : 'manual',
      [labels[1]]: formatEur(t.allocation.share1),
      [labels[2]]: formatEur(t.allocation.share2),
    }))
  );
}

main()
  .catch((err) => {
    console.error('[water] Unexpected error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  })
  .finally(shutdown);
