import { formatEur, formatM3, formatPercent } from "@/lib/format/waterUnits";
import { SEVERITY_MESSAGES } from "./mismatch";
import type { AllocationResult, MismatchResult, Party, Reimbursement, TrueUp } from "./types";

export type PartyLabels = Record<Party, string>;

function transferText(r: Reimbursement, labels: PartyLabels): string {
  if (r.amount === 0) return "no transfer.";
  return `${labels[r.from]} pays ${labels[r.to]} ${formatEur(r.amount)}.`;
}

/** One-line message for sharing the split, e.g. in a chat. */
export function splitSummaryLine(allocation: AllocationResult, reimbursement: Reimbursement, labels: PartyLabels): string {
  return (
    `This period: ${labels[2]} total ${formatEur(allocation.total2)}, ` +
    `${labels[1]} total ${formatEur(allocation.total1)} → ${transferText(reimbursement, labels)}`
  );
}

export function trueUpSummaryLine(trueUp: TrueUp, reimbursement: Reimbursement, labels: PartyLabels): string {
  const { share1, share2 } = trueUp.allocation;
  return (
    `True-up ${formatEur(trueUp.correctionAmount)}: ` +
    `${labels[1]} share ${formatEur(share1)}, ${labels[2]} share ${formatEur(share2)} → ` +
    transferText(reimbursement, labels)
  );
}

export function mismatchSummaryLines(mismatch: MismatchResult): string[] {
  if (!mismatch.evaluated) {
    return mismatch.reason === "main_zero"
      ? ["Mismatch not available (main meter usage is 0)."]
      : ["Mismatch not available (main meter not provided)."];
  }
  return [
    `Main usage: ${formatM3(mismatch.mainUsage)}`,
    `Sub-meter total: ${formatM3(mismatch.subTotal)}`,
    `Mismatch: ${formatM3(mismatch.mismatchM3)} (${formatPercent(mismatch.mismatchPct)})`,
    `Status: ${SEVERITY_MESSAGES[mismatch.severity]}`,
  ];
}
