import type { TranslatorError } from "../errors.js";

export interface Chunk {
  /** 0-based page number in the source document. */
  readonly index: number;
  readonly text: string;
  /** Overrides the rolling previous-page context for this chunk. */
  readonly abstract?: string;
}

export type OutputFormat = "console" | "file";

export interface LanguagePair {
  readonly source: Language;
  readonly target: Language;
}

export type Language = "Chinese" | "Japanese" | "Korean" | "English";

export type TranslationOutcome =
  | { readonly status: "success"; readonly text: string }
  | { readonly status: "context_too_long" }
  | { readonly status: "content_filtered"; readonly attempts: number }
  | { readonly status: "fatal"; readonly error: TranslatorError };

export interface ChatRequest {
  readonly model: string;
  readonly systemPrompt: string;
  readonly userPrompt: string;
  readonly temperature: number;
  readonly topP: number;
  readonly maxTokens: number;
}

export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

export interface ChatCompletion {
  readonly id: string;
  /** Model name as echoed by the provider, which is what gets billed. */
  readonly model: string;
  readonly text: string;
  readonly usage?: TokenUsage;
}

export type ChatErrorKind =
  | "context_length"
  | "content_filter"
  | "rate_limit"
  | "auth"
  | "invalid_request"
  | "api"
  | "network";

export interface ChatError {
  readonly kind: ChatErrorKind;
  readonly message: string;
  readonly status?: number;
  /** Server-requested wait before the next attempt, from `retry-after`. */
  readonly retryAfterMs?: number;
}

export type ChatResult =
  | { readonly ok: true; readonly completion: ChatCompletion }
  | { readonly ok: false; readonly error: ChatError };

export interface ChatClient {
  complete(request: ChatRequest): Promise<ChatResult>;
}
