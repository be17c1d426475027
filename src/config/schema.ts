import { z } from "zod";
import type { TranslatorConfig } from "./types.js";

export const DEFAULT_MODELS = [
  "o3-mini",
  "gpt-4o-mini",
  "gpt-4o",
  "gpt-35-turbo-16k",
  "Meta-Llama-3-1-70B-Instruct",
  "Meta-Llama-3-1-8B-Instruct",
  "Mistral-Small",
];

const backendSchema = z.object({
  provider: z.enum(["azure", "openai"]).default("azure"),
  endpoint: z.string().url().default("https://api.openai.com/v1"),
  apiVersion: z.string().min(1).default("2025-03-01-preview"),
  timeoutMs: z.number().int().positive().default(120_000),
  maxRetries: z.number().int().min(0).default(2),
  retryDelayMs: z.number().int().min(0).default(1000),
  apiKey: z.string().min(1).optional(),
});

const translationSchema = z.object({
  model: z.string().min(1).default("gpt-4o"),
  availableModels: z.array(z.string().min(1)).min(1).default(DEFAULT_MODELS),
  temperature: z.number().min(0).max(2).default(0.5),
  topP: z.number().min(0).max(1).default(0.5),
  maxTokens: z.number().int().positive().default(1000),
  contextPercentage: z.number().min(0).max(1).default(0.65),
  maxRetries: z.number().int().positive().default(10),
  baseRetryDelayMs: z.number().min(0).default(3_000),
  retryJitterMs: z.number().min(0).default(250),
  interPageDelayMs: z.number().min(0).default(3_000),
  pageSize: z.number().int().positive().default(2_000),
});

const loggingSchema = z.object({
  level: z.enum(["silent", "debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const translatorConfigSchema = z.object({
  backend: backendSchema.default({}),
  translation: translationSchema.default({}),
  pricing: z.object({ path: z.string().min(1).optional() }).default({}),
  usage: z.object({ dir: z.string().min(1).optional() }).default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): TranslatorConfig {
  return translatorConfigSchema.parse(raw);
}
