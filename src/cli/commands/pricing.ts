import { Command, Option } from "clipanion";
import { getPricingPath } from "../../config/paths.js";
import { loadConfig } from "../../config/loader.js";
import { TranslatorError } from "../../errors.js";
import { createLogger } from "../../logging/logger.js";
import { PricingCatalog } from "../../pricing/catalog.js";
import { reportFailure } from "../shared.js";

function parseRate(value: string, label: string): number {
  const rate = Number(value);
  if (value.trim() === "" || !Number.isFinite(rate) || rate < 0) {
    throw new TranslatorError("pricing", `${label} rate must be a non-negative number, got '${value}'`);
  }
  return rate;
}

export class PricingShowCommand extends Command {
  static override paths = [["pricing", "show"]];

  static override usage = Command.Usage({
    description: "Show model rates, pricing unit and monthly budget",
    examples: [["Show pricing", "cjk-translate pricing show"]],
  });

  async execute(): Promise<void> {
    try {
      const config = loadConfig();
      const catalog = await PricingCatalog.load(getPricingPath(config), createLogger(config.logging));

      const unit = catalog.getPricingUnit().toLocaleString("en-US");
      const lines = [
        `Pricing file:   ${getPricingPath(config)}`,
        `Pricing unit:   per ${unit} tokens`,
        `Monthly limit:  $${catalog.getMonthlyLimit().toFixed(2)}`,
        `Fallback model: ${catalog.getFallbackModel() ?? "(none)"}`,
        "",
        "Models (input / output):",
        ...catalog.listModels().map((m) => `  ${m.model}: $${m.input} / $${m.output}`),
      ];
      this.context.stdout.write(lines.join("\n") + "\n");
    } catch (err) {
      reportFailure(this.context, err);
    }
  }
}

export class PricingSetCommand extends Command {
  static override paths = [["pricing", "set"]];

  static override usage = Command.Usage({
    description: "Set the input and output rate of a model",
    examples: [["Price gpt-4o", "cjk-translate pricing set gpt-4o 2.75 11"]],
  });

  model = Option.String({ name: "model" });
  input = Option.String({ name: "input" });
  output = Option.String({ name: "output" });

  async execute(): Promise<void> {
    try {
      const input = parseRate(this.input, "Input");
      const output = parseRate(this.output, "Output");
      const config = loadConfig();
      const catalog = await PricingCatalog.load(getPricingPath(config), createLogger(config.logging));
      await catalog.updatePricing(this.model, input, output);
      this.context.stdout.write(`Updated ${this.model}: input $${input}, output $${output}\n`);
    } catch (err) {
      reportFailure(this.context, err);
    }
  }
}

export class PricingInitCommand extends Command {
  static override paths = [["pricing", "init"]];

  static override usage = Command.Usage({
    description: "Create the pricing file with default rates",
    examples: [
      ["Create if missing", "cjk-translate pricing init"],
      ["Overwrite", "cjk-translate pricing init --force"],
    ],
  });

  force = Option.Boolean("--force", false, {
    description: "Overwrite an existing pricing file",
  });

  async execute(): Promise<void> {
    try {
      const path = getPricingPath(loadConfig());
      const written = await PricingCatalog.writeDefaultPricing(path, { force: this.force });
      this.context.stdout.write(
        written
          ? `Wrote default pricing to ${path}\n`
          : `Pricing file already exists: ${path} (use --force to overwrite)\n`,
      );
    } catch (err) {
      reportFailure(this.context, err);
    }
  }
}
