import { z } from "zod";
import type { LedgerState } from "./types.js";

const count = z.number().int().nonnegative().default(0);

export const usageStatsSchema = z.object({
  totalTokens: count,
  inputTokens: count,
  outputTokens: count,
  totalCost: z.number().nonnegative().default(0),
  callCount: count,
});

export const usageRecordSchema = z.object({
  model: z.string(),
  requestedModel: z.string(),
  promptTokens: z.number().int().nonnegative(),
  completionTokens: z.number().int().nonnegative(),
  totalTokens: z.number().int().nonnegative(),
  timestamp: z.string(),
  inputCost: z.number().nonnegative(),
  outputCost: z.number().nonnegative(),
  totalCost: z.number().nonnegative(),
});

export const ledgerStateSchema = z.object({
  total: usageStatsSchema.default({}),
  models: z.record(usageStatsSchema).default({}),
  daily: z.record(z.string().regex(/^\d{4}-\d{2}-\d{2}$/), usageStatsSchema).default({}),
  history: z.array(usageRecordSchema).default([]),
}) satisfies z.ZodType<LedgerState, z.ZodTypeDef, unknown>;
