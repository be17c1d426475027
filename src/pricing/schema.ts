import { z } from "zod";

export const pricingEntrySchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
});

export const pricingDocumentSchema = z.object({
  pricingUnit: z.number().positive().default(1_000_000),
  monthlyLimit: z.number().nonnegative().default(100),
  fallbackModel: z.string().min(1).optional(),
  models: z.record(pricingEntrySchema).default({}),
});

export type PricingEntry = z.infer<typeof pricingEntrySchema>;
export type PricingDocument = z.infer<typeof pricingDocumentSchema>;
