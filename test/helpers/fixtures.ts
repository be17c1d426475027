import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { createLogger, type Logger } from "../../src/logging/logger.js";
import { PricingCatalog } from "../../src/pricing/catalog.js";
import type { PricingDocument } from "../../src/pricing/schema.js";
import type { EngineSettings } from "../../src/translation/engine.js";
import { UsageLedger } from "../../src/usage/ledger.js";

export function silentLogger(): Logger {
  return createLogger({ level: "silent", json: true });
}

export function makePricingDocument(overrides: Partial<PricingDocument> = {}): PricingDocument {
  return {
    pricingUnit: 1_000_000,
    monthlyLimit: 100,
    fallbackModel: "gpt-4o-mini",
    models: {
      "gpt-4o": { input: 2.75, output: 11.0 },
      "gpt-4o-mini": { input: 0.165, output: 0.66 },
    },
    ...overrides,
  };
}

export function writePricingFile(
  dir: string,
  overrides: Partial<PricingDocument> = {},
): string {
  const path = join(dir, "pricing.json");
  writeFileSync(path, JSON.stringify(makePricingDocument(overrides)));
  return path;
}

export async function openTestLedger(
  dir: string,
  opts: { pricing?: Partial<PricingDocument>; now?: () => Date; logger?: Logger } = {},
): Promise<{ catalog: PricingCatalog; ledger: UsageLedger; ledgerPath: string }> {
  const logger = opts.logger ?? silentLogger();
  const catalog = await PricingCatalog.load(writePricingFile(dir, opts.pricing), logger);
  const ledgerPath = join(dir, "usage", "default.json");
  const ledger = await UsageLedger.open(ledgerPath, catalog, { logger, now: opts.now });
  return { catalog, ledger, ledgerPath };
}

export function makeEngineSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  return {
    temperature: 0.5,
    topP: 0.5,
    maxTokens: 1000,
    contextPercentage: 0.65,
    maxRetries: 10,
    baseRetryDelayMs: 10,
    retryJitterMs: 0,
    interPageDelayMs: 3000,
    ...overrides,
  };
}
