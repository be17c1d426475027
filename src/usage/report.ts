import type { UsageLedger } from "./ledger.js";
import type { UsageStats } from "./types.js";

function money(value: number): string {
  return `$${value.toFixed(4)}`;
}

function statsLine(stats: UsageStats): string {
  return (
    `${stats.totalTokens.toLocaleString("en-US")} tokens ` +
    `(${stats.inputTokens.toLocaleString("en-US")} in / ` +
    `${stats.outputTokens.toLocaleString("en-US")} out), ` +
    `${stats.callCount} calls, ${money(stats.totalCost)}`
  );
}

export function formatUsageReport(ledger: UsageLedger, title = "Usage report"): string {
  const summary = ledger.getUsageSummary();
  const lines: string[] = [title, "=".repeat(title.length), ""];

  lines.push(`Total: ${statsLine(summary.total)}`);

  const models = Object.entries(summary.models).sort(([a], [b]) => a.localeCompare(b));
  if (models.length > 0) {
    lines.push("", "By model:");
    for (const [model, stats] of models) {
      lines.push(`  ${model}: ${statsLine(stats)}`);
    }
  }

  const limit = ledger.getMonthlyLimit();
  lines.push(
    "",
    `Today: ${statsLine(ledger.getDailyUsage())}`,
    `This month: ${statsLine(ledger.getMonthlyUsage())}`,
    `Monthly budget: ${money(limit)} ` +
      `(${ledger.monthlyUsagePercentage().toFixed(1)}% used, ` +
      `${money(ledger.remainingMonthlyBudget())} remaining)`,
  );

  if (ledger.isMonthlyLimitExceeded()) {
    lines.push("Monthly budget exceeded.");
  }

  return lines.join("\n");
}
