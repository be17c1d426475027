import { Cli } from "clipanion";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import {
  PricingInitCommand,
  PricingSetCommand,
  PricingShowCommand,
} from "./commands/pricing.js";
import { TranslateCommand } from "./commands/translate.js";
import {
  UsageDailyCommand,
  UsageMonthlyCommand,
  UsageReportCommand,
} from "./commands/usage.js";
import { UsersCommand } from "./commands/users.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "CJK Translate",
    binaryName: "cjk-translate",
    binaryVersion: "0.1.0",
  });

  cli.register(TranslateCommand);

  // Usage commands
  cli.register(UsageReportCommand);
  cli.register(UsageDailyCommand);
  cli.register(UsageMonthlyCommand);

  // Pricing commands
  cli.register(PricingShowCommand);
  cli.register(PricingSetCommand);
  cli.register(PricingInitCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(UsersCommand);

  return cli;
}
