import type { UsageRecord, UsageStats } from "./types.js";

export function emptyStats(): UsageStats {
  return { totalTokens: 0, inputTokens: 0, outputTokens: 0, totalCost: 0, callCount: 0 };
}

export function addToStats(stats: UsageStats, record: UsageRecord): void {
  stats.totalTokens += record.totalTokens;
  stats.inputTokens += record.promptTokens;
  stats.outputTokens += record.completionTokens;
  stats.totalCost += record.totalCost;
  stats.callCount += 1;
}

export function sumStats(entries: Iterable<UsageStats>): UsageStats {
  const sum = emptyStats();
  for (const entry of entries) {
    sum.totalTokens += entry.totalTokens;
    sum.inputTokens += entry.inputTokens;
    sum.outputTokens += entry.outputTokens;
    sum.totalCost += entry.totalCost;
    sum.callCount += entry.callCount;
  }
  return sum;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local calendar date, YYYY-MM-DD. */
export function dateKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local calendar month, YYYY-MM. */
export function monthKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}`;
}
