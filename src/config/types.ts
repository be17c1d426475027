export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export type BackendProvider = "azure" | "openai";

export interface TranslatorConfig {
  readonly backend: BackendConfig;
  readonly translation: TranslationConfig;
  readonly pricing: PricingConfig;
  readonly usage: UsageConfig;
  readonly logging: LoggingConfig;
}

export interface BackendConfig {
  readonly provider: BackendProvider;
  readonly endpoint: string;
  readonly apiVersion: string;
  readonly timeoutMs: number;
  /** Extra attempts for rate limits, 5xx responses and network failures. */
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly apiKey?: string;
}

export interface TranslationConfig {
  readonly model: string;
  readonly availableModels: string[];
  readonly temperature: number;
  readonly topP: number;
  readonly maxTokens: number;
  /** Fraction of the previous page skipped before its tail is used as context. */
  readonly contextPercentage: number;
  readonly maxRetries: number;
  readonly baseRetryDelayMs: number;
  readonly retryJitterMs: number;
  readonly interPageDelayMs: number;
  /** Target characters per logical page for flowing-text documents. */
  readonly pageSize: number;
}

export interface PricingConfig {
  readonly path?: string;
}

export interface UsageConfig {
  readonly dir?: string;
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}
