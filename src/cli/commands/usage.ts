import { Command, Option } from "clipanion";
import { openLedger } from "../../app.js";
import { resolveLedgerName } from "../../config/credentials.js";
import { loadConfig } from "../../config/loader.js";
import { createLogger } from "../../logging/logger.js";
import type { UsageLedger } from "../../usage/ledger.js";
import { formatUsageReport } from "../../usage/report.js";
import type { UsageStats } from "../../usage/types.js";
import { formatCost, reportFailure } from "../shared.js";

abstract class UsageCommand extends Command {
  user = Option.String("-u,--user", {
    description: "User profile whose ledger is read",
  });

  async execute(): Promise<void> {
    try {
      const config = loadConfig();
      const logger = createLogger(config.logging);
      const { ledger } = await openLedger(config, logger, resolveLedgerName(process.env, this.user));
      this.context.stdout.write(this.render(ledger) + "\n");
    } catch (err) {
      reportFailure(this.context, err);
    }
  }

  protected abstract render(ledger: UsageLedger): string;
}

function statsBlock(label: string, stats: UsageStats): string {
  return [
    label,
    `  Calls:         ${stats.callCount}`,
    `  Input tokens:  ${stats.inputTokens}`,
    `  Output tokens: ${stats.outputTokens}`,
    `  Total tokens:  ${stats.totalTokens}`,
    `  Cost:          ${formatCost(stats.totalCost)}`,
  ].join("\n");
}

export class UsageReportCommand extends UsageCommand {
  static override paths = [["usage", "report"]];

  static override usage = Command.Usage({
    description: "Show lifetime, per-model, daily and monthly usage",
    examples: [
      ["Default ledger", "cjk-translate usage report"],
      ["Ledger of a user", "cjk-translate usage report --user jane_doe"],
    ],
  });

  protected render(ledger: UsageLedger): string {
    return formatUsageReport(ledger);
  }
}

export class UsageDailyCommand extends UsageCommand {
  static override paths = [["usage", "daily"]];

  static override usage = Command.Usage({
    description: "Show usage for one day",
    examples: [["A given day", "cjk-translate usage daily --date 2025-03-14"]],
  });

  date = Option.String("--date", { description: "Day as YYYY-MM-DD (default: today)" });

  protected render(ledger: UsageLedger): string {
    return statsBlock(`Usage for ${this.date ?? "today"}`, ledger.getDailyUsage(this.date));
  }
}

export class UsageMonthlyCommand extends UsageCommand {
  static override paths = [["usage", "monthly"]];

  static override usage = Command.Usage({
    description: "Show usage for one month against the budget",
    examples: [["A given month", "cjk-translate usage monthly --month 2025-03"]],
  });

  month = Option.String("--month", { description: "Month as YYYY-MM (default: this month)" });

  protected render(ledger: UsageLedger): string {
    const block = statsBlock(`Usage for ${this.month ?? "this month"}`, ledger.getMonthlyUsage(this.month));
    if (this.month) return block;
    return (
      block +
      `\n  Budget:        ${formatCost(ledger.getMonthlyLimit())}` +
      ` (${ledger.monthlyUsagePercentage().toFixed(1)}% used, ` +
      `${formatCost(ledger.remainingMonthlyBudget())} remaining)`
    );
  }
}
