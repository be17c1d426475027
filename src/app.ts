import { resolveCredentials, type ResolvedCredentials } from "./config/credentials.js";
import { getLedgerPath, getPricingPath } from "./config/paths.js";
import type { TranslatorConfig } from "./config/types.js";
import type { Logger } from "./logging/logger.js";
import { PricingCatalog } from "./pricing/catalog.js";
import { HttpChatClient } from "./translation/client.js";
import { TranslationEngine, resolveModel } from "./translation/engine.js";
import { createTranslationPrompts } from "./translation/prompt.js";
import type { ChatClient, LanguagePair, OutputFormat } from "./translation/types.js";
import { UsageLedger } from "./usage/ledger.js";

export interface AccountingContext {
  readonly credentials: ResolvedCredentials;
  readonly pricing: PricingCatalog;
  readonly ledger: UsageLedger;
}

export interface TranslationSession extends AccountingContext {
  readonly engine: TranslationEngine;
  readonly model: string;
}

export interface SessionOptions {
  readonly config: TranslatorConfig;
  readonly logger: Logger;
  readonly env: Record<string, string | undefined>;
  readonly user?: string;
  /** Replaces the HTTP client, mainly for tests. */
  readonly client?: ChatClient;
}

export async function openLedger(
  config: TranslatorConfig,
  logger: Logger,
  ledgerName: string,
): Promise<{ pricing: PricingCatalog; ledger: UsageLedger }> {
  const pricing = await PricingCatalog.load(
    getPricingPath(config),
    logger.child({ component: "pricing" }),
  );
  const ledger = await UsageLedger.open(getLedgerPath(config, ledgerName), pricing, {
    logger: logger.child({ component: "ledger" }),
  });
  return { pricing, ledger };
}

/** Resolve the user's key, load pricing and open the user's ledger. */
export async function openAccounting(opts: SessionOptions): Promise<AccountingContext> {
  const { config, logger } = opts;

  const credentials = resolveCredentials(opts.env, {
    user: opts.user,
    configApiKey: config.backend.apiKey,
  });
  if (credentials.usedBackupKey) {
    logger.warn({ user: credentials.displayName }, "Primary API key not set, using backup key");
  }

  const { pricing, ledger } = await openLedger(config, logger, credentials.ledgerName);
  return { credentials, pricing, ledger };
}

export async function createTranslationSession(
  opts: SessionOptions & { languages: LanguagePair; format: OutputFormat },
): Promise<TranslationSession> {
  const { config, logger } = opts;
  const accounting = await openAccounting(opts);
  const model = resolveModel(config.translation);

  const client =
    opts.client ??
    new HttpChatClient({
      config: config.backend,
      apiKey: accounting.credentials.apiKey,
      logger: logger.child({ component: "backend" }),
    });

  const engine = new TranslationEngine({
    client,
    ledger: accounting.ledger,
    logger,
    prompts: createTranslationPrompts(opts.languages, opts.format),
    model,
    settings: config.translation,
  });

  logger.info(
    { user: accounting.credentials.displayName, model, ...opts.languages },
    "Translation session ready",
  );
  return { ...accounting, engine, model };
}
