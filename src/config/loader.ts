import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { TranslatorError, errorMessage } from "../errors.js";
import type { TranslatorConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig, translatorConfigSchema } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

/** Replace `${env:NAME}` references with values from `env`. */
export function substituteEnv(raw: string, env: NodeJS.ProcessEnv = process.env): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = env[varName];
    if (value === undefined) {
      throw new TranslatorError(
        "config",
        `Missing environment variable: ${varName} (referenced as ${match})`,
      );
    }
    return value;
  });
}

/** Parse config file content; `source` names the file in error messages. */
export function parseConfigText(content: string, source: string): TranslatorConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(substituteEnv(content));
  } catch (err) {
    if (err instanceof TranslatorError) throw err;
    throw new TranslatorError("config", `Invalid JSON in ${source}: ${errorMessage(err)}`);
  }

  const parsed = translatorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new TranslatorError("config", `Invalid config in ${source}: ${issues}`);
  }
  return parsed.data;
}

export function loadConfig(path?: string): TranslatorConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return parseConfig({});
    }
    throw err;
  }

  return parseConfigText(content, configPath);
}
