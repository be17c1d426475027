import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { TranslatorConfig } from "./types.js";

export function getStateDir(): string {
  return process.env["CJK_TRANSLATE_STATE_DIR"] ?? join(homedir(), ".cjk-translate");
}

export function getConfigPath(): string {
  return process.env["CJK_TRANSLATE_CONFIG_PATH"] ?? "cjk-translate.config.json";
}

export function getPricingPath(config: TranslatorConfig): string {
  return config.pricing.path ?? join(getStateDir(), "pricing.json");
}

export function getUsageDir(config: TranslatorConfig): string {
  return config.usage.dir ?? join(getStateDir(), "usage");
}

export function getLedgerPath(config: TranslatorConfig, ledgerName: string): string {
  return join(getUsageDir(config), `${ledgerName}.json`);
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
