export type TranslatorErrorKind =
  | "context_length"
  | "content_filter"
  | "rate_limit"
  | "auth"
  | "invalid_request"
  | "api"
  | "network"
  | "config"
  | "pricing_config"
  | "pricing"
  | "budget_exceeded"
  | "unsupported_document"
  | "invalid_page_range"
  | "invalid_language";

/**
 * Error raised for conditions the translator cannot recover from on its own.
 * Anything thrown as a TranslatorError aborts the current document run.
 */
export class TranslatorError extends Error {
  readonly kind: TranslatorErrorKind;

  constructor(kind: TranslatorErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TranslatorError";
    this.kind = kind;
  }
}

export function isTranslatorError(err: unknown): err is TranslatorError {
  return err instanceof TranslatorError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
