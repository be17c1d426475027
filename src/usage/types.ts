export interface UsageRecord {
  /** Model name as echoed by the provider. */
  readonly model: string;
  /** Model whose rates were applied. */
  readonly requestedModel: string;
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
  /** ISO-8601 timestamp of the call. */
  readonly timestamp: string;
  readonly inputCost: number;
  readonly outputCost: number;
  readonly totalCost: number;
}

export interface UsageStats {
  totalTokens: number;
  inputTokens: number;
  outputTokens: number;
  totalCost: number;
  callCount: number;
}

export interface LedgerState {
  total: UsageStats;
  models: Record<string, UsageStats>;
  /** Keyed by local calendar date, YYYY-MM-DD. */
  daily: Record<string, UsageStats>;
  history: UsageRecord[];
}

export interface UsageSummary {
  readonly total: UsageStats;
  readonly models: Readonly<Record<string, UsageStats>>;
  readonly recent: readonly UsageRecord[];
}
