import type { BudgetClassSnapshot } from "../application/services/budgetLedger";
import type { RunReport } from "../application/services/researchSchedulerService";

const money = (amount: number): string => `$${amount.toFixed(4)}`;

/** Share of a daily cap at which the cost summary flags a class. */
export const CAP_WARNING_RATIO = 0.8;

/**
 * Formats a run report into a compact terminal summary for manual inspection.
 */
export const formatRunReport = (report: RunReport): string => {
  const lines: string[] = [];
  const entityCount = report.outcomes.length;

  lines.push(
    `Run ${report.runId}: ${entityCount} entities in ${report.batches.length} batches` +
      (report.duplicates.length > 0
        ? ` (${report.duplicates.length} duplicates skipped)`
        : "") +
      (report.stopped ? " [stopped]" : ""),
  );
  lines.push(
    `Delivered: ${report.totals.delivered} | Unreachable: ${report.totals.unreachable} | ` +
      `Delivery failed: ${report.totals["delivery-failed"]} | Cancelled: ${report.totals.cancelled}`,
  );

  const resumed = report.outcomes.filter((outcome) => outcome.resumed).length;
  if (resumed > 0) {
    lines.push(`Resumed (already delivered): ${resumed}`);
  }
  lines.push(`Total cost: ${money(report.totalCost)}`);

  const failures = report.outcomes.filter(
    (outcome) => outcome.outcome !== "delivered",
  );
  if (failures.length > 0) {
    lines.push("Failures:");
    for (const failure of failures) {
      lines.push(
        `- ${failure.entityId} (${failure.name}): ${failure.outcome ?? failure.state} ` +
          `via ${failure.lastProvider ?? "none"} [${failure.failureKind ?? "unknown"}]` +
          (failure.message ? ` ${failure.message}` : ""),
      );
    }
  }

  return lines.join("\n");
};

export type DeliveredCost = {
  delivered: number;
  cost: number;
};

export const formatCostSummary = (
  spend: readonly BudgetClassSnapshot[],
  delivered: DeliveredCost,
): string => {
  const lines: string[] = [];
  const day = spend[0]?.day ?? "today";
  lines.push(`Spend for ${day}:`);

  if (spend.length === 0) {
    lines.push("- none");
  }
  for (const entry of spend) {
    if (entry.cap === null) {
      lines.push(`- ${entry.costClass}: ${money(entry.committed)} (uncapped)`);
      continue;
    }

    const ratio = entry.cap > 0 ? entry.committed / entry.cap : 1;
    lines.push(
      `- ${entry.costClass}: ${money(entry.committed)} of $${entry.cap.toFixed(2)} ` +
        `(${(ratio * 100).toFixed(1)}%)` +
        (ratio >= CAP_WARNING_RATIO ? " WARNING" : ""),
    );
  }

  if (delivered.delivered > 0) {
    lines.push(
      `Average cost per delivered company: ${money(delivered.cost / delivered.delivered)} ` +
        `(${delivered.delivered} delivered)`,
    );
  } else {
    lines.push("Average cost per delivered company: n/a (0 delivered)");
  }

  return lines.join("\n");
};
