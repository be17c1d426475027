import { TranslatorError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { readJsonFile, writeJsonFile } from "../utils/json-file.js";
import { DEFAULT_PRICING } from "./defaults.js";
import { pricingDocumentSchema } from "./schema.js";
import type { PricingDocument, PricingEntry } from "./schema.js";

export interface ResolvedPricing extends PricingEntry {
  /** Model whose rates were used; differs from the lookup key on fallback. */
  readonly pricedAs: string;
}

export class PricingCatalog {
  private constructor(
    private readonly filePath: string,
    private readonly document: PricingDocument,
    private readonly logger: Logger,
  ) {}

  /** Load the pricing file. The catalog refuses to bill without one. */
  static async load(filePath: string, logger: Logger): Promise<PricingCatalog> {
    const result = await readJsonFile(filePath, pricingDocumentSchema);
    switch (result.status) {
      case "ok":
        return new PricingCatalog(filePath, result.value, logger);
      case "missing":
        throw new TranslatorError(
          "pricing_config",
          `Pricing file not found: ${filePath}. Run "cjk-translate pricing init" to create one.`,
        );
      case "invalid":
        throw new TranslatorError(
          "pricing_config",
          `Invalid pricing file ${filePath}: ${result.reason}`,
        );
    }
  }

  /** Write the seed pricing file. Returns false when one exists and `force` is off. */
  static async writeDefaultPricing(
    filePath: string,
    opts: { force?: boolean } = {},
  ): Promise<boolean> {
    if (!opts.force) {
      const existing = await readJsonFile(filePath, pricingDocumentSchema);
      if (existing.status !== "missing") return false;
    }
    await writeJsonFile(filePath, DEFAULT_PRICING);
    return true;
  }

  getModelPricing(model: string): ResolvedPricing {
    const entry = this.document.models[model];
    if (entry) return { ...entry, pricedAs: model };

    const fallback = this.document.fallbackModel;
    const fallbackEntry = fallback ? this.document.models[fallback] : undefined;
    if (!fallback || !fallbackEntry) {
      throw new TranslatorError(
        "pricing",
        `No pricing found for model '${model}' and no usable fallback model is configured`,
      );
    }

    this.logger.warn({ model, fallback }, "No pricing for model, using fallback rates");
    return { ...fallbackEntry, pricedAs: fallback };
  }

  async updatePricing(model: string, input: number, output: number): Promise<void> {
    if (!Number.isFinite(input) || !Number.isFinite(output) || input < 0 || output < 0) {
      throw new TranslatorError("pricing", "Pricing rates must be non-negative numbers");
    }
    this.document.models[model] = { input, output };
    await writeJsonFile(this.filePath, this.document);
    this.logger.info({ model, input, output }, "Updated model pricing");
  }

  getPricingUnit(): number {
    return this.document.pricingUnit;
  }

  getMonthlyLimit(): number {
    return this.document.monthlyLimit;
  }

  getFallbackModel(): string | undefined {
    return this.document.fallbackModel;
  }

  listModels(): Array<{ model: string } & PricingEntry> {
    return Object.entries(this.document.models)
      .map(([model, entry]) => ({ model, ...entry }))
      .sort((a, b) => a.model.localeCompare(b.model));
  }
}
