import type { Logger } from "../logging/logger.js";
import type { PricingCatalog } from "../pricing/catalog.js";
import { readJsonFile, writeJsonFile } from "../utils/json-file.js";
import { ledgerStateSchema } from "./schema.js";
import { addToStats, dateKey, emptyStats, monthKey, sumStats } from "./stats.js";
import type { LedgerState, UsageRecord, UsageStats, UsageSummary } from "./types.js";

const SUMMARY_HISTORY_SIZE = 10;

export interface LedgerOptions {
  readonly logger: Logger;
  readonly now?: () => Date;
}

function emptyState(): LedgerState {
  return { total: emptyStats(), models: {}, daily: {}, history: [] };
}

function copyStats(stats: UsageStats | undefined): UsageStats {
  return stats ? { ...stats } : emptyStats();
}

/**
 * Per-user token and cost accounting. State is read once when opened and the
 * whole file is rewritten after every recorded call. One instance per ledger
 * file; concurrent writers are not supported.
 */
export class UsageLedger {
  private readonly now: () => Date;
  private readonly logger: Logger;

  private constructor(
    private readonly filePath: string,
    private readonly pricing: PricingCatalog,
    private readonly state: LedgerState,
    opts: LedgerOptions,
  ) {
    this.logger = opts.logger;
    this.now = opts.now ?? (() => new Date());
  }

  static async open(
    filePath: string,
    pricing: PricingCatalog,
    opts: LedgerOptions,
  ): Promise<UsageLedger> {
    const result = await readJsonFile(filePath, ledgerStateSchema);
    let state: LedgerState;
    if (result.status === "ok") {
      state = result.value;
    } else {
      if (result.status === "invalid") {
        opts.logger.warn(
          { path: filePath, reason: result.reason },
          "Usage ledger unreadable, starting empty",
        );
      }
      state = emptyState();
    }
    return new UsageLedger(filePath, pricing, state, opts);
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Bill one completed call. Rates come from `pricingModelOverride` when given,
   * since providers may echo a dated snapshot name instead of the requested one.
   */
  async recordUsage(
    billedModel: string,
    promptTokens: number,
    completionTokens: number,
    totalTokens: number,
    pricingModelOverride?: string,
  ): Promise<UsageRecord> {
    const requestedModel = pricingModelOverride ?? billedModel;
    const rates = this.pricing.getModelPricing(requestedModel);
    const unit = this.pricing.getPricingUnit();

    const inputCost = (promptTokens / unit) * rates.input;
    const outputCost = (completionTokens / unit) * rates.output;
    const timestamp = this.now();

    const record: UsageRecord = {
      model: billedModel,
      requestedModel,
      promptTokens,
      completionTokens,
      totalTokens,
      timestamp: timestamp.toISOString(),
      inputCost,
      outputCost,
      totalCost: inputCost + outputCost,
    };

    const day = dateKey(timestamp);
    const modelStats = (this.state.models[billedModel] ??= emptyStats());
    const dayStats = (this.state.daily[day] ??= emptyStats());
    addToStats(this.state.total, record);
    addToStats(modelStats, record);
    addToStats(dayStats, record);
    this.state.history.push(record);

    await writeJsonFile(this.filePath, this.state);
    this.logger.debug(
      { model: billedModel, tokens: totalTokens, cost: record.totalCost },
      "Recorded usage",
    );
    return record;
  }

  getTotalUsage(): UsageStats {
    return copyStats(this.state.total);
  }

  getModelUsage(model: string): UsageStats {
    return copyStats(this.state.models[model]);
  }

  /** @param date YYYY-MM-DD, defaults to today */
  getDailyUsage(date?: string): UsageStats {
    return copyStats(this.state.daily[date ?? dateKey(this.now())]);
  }

  /** Sum of the daily entries of a month. @param month YYYY-MM, defaults to the current month */
  getMonthlyUsage(month?: string): UsageStats {
    const prefix = `${month ?? monthKey(this.now())}-`;
    const days = Object.entries(this.state.daily)
      .filter(([key]) => key.startsWith(prefix))
      .map(([, stats]) => stats);
    return sumStats(days);
  }

  isMonthlyLimitExceeded(): boolean {
    return this.getMonthlyUsage().totalCost >= this.pricing.getMonthlyLimit();
  }

  remainingMonthlyBudget(): number {
    return Math.max(0, this.pricing.getMonthlyLimit() - this.getMonthlyUsage().totalCost);
  }

  monthlyUsagePercentage(): number {
    const limit = this.pricing.getMonthlyLimit();
    if (limit <= 0) return 100;
    return (this.getMonthlyUsage().totalCost / limit) * 100;
  }

  getMonthlyLimit(): number {
    return this.pricing.getMonthlyLimit();
  }

  getHistory(): readonly UsageRecord[] {
    return [...this.state.history];
  }

  getUsageSummary(): UsageSummary {
    const models: Record<string, UsageStats> = {};
    for (const [model, stats] of Object.entries(this.state.models)) {
      models[model] = copyStats(stats);
    }
    return {
      total: copyStats(this.state.total),
      models,
      recent: this.state.history.slice(-SUMMARY_HISTORY_SIZE),
    };
  }
}
