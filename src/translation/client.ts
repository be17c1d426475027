import { z } from "zod";
import type { BackendConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { retryWhile } from "../utils/retry.js";
import type { ChatClient, ChatError, ChatRequest, ChatResult } from "./types.js";

type FetchFn = typeof fetch;

export interface HttpChatClientOptions {
  readonly config: BackendConfig;
  readonly apiKey: string;
  readonly logger: Logger;
  readonly fetch?: FetchFn;
  readonly sleep?: (ms: number) => Promise<void>;
}

const completionSchema = z.object({
  id: z.string().default(""),
  model: z.string(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative(),
      completion_tokens: z.number().int().nonnegative(),
      total_tokens: z.number().int().nonnegative(),
    })
    .nullable()
    .optional(),
});

const errorBodySchema = z.object({
  error: z
    .object({
      code: z.union([z.string(), z.number()]).nullable().optional(),
      message: z.string().optional(),
      type: z.string().nullable().optional(),
    })
    .optional(),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Map a non-2xx response onto the error categories the engine branches on. */
export function classifyHttpError(status: number, bodyText: string): ChatError {
  const parsed = errorBodySchema.safeParse(parseJson(bodyText));
  const error = parsed.success ? parsed.data.error : undefined;
  const code = String(error?.code ?? "").toLowerCase();
  const message = error?.message ?? bodyText;
  const lowered = message.toLowerCase();

  if (code === "context_length_exceeded" || lowered.includes("maximum context length")) {
    return { kind: "context_length", message, status };
  }
  if (code === "content_filter" || lowered.includes("content management policy")) {
    return { kind: "content_filter", message, status };
  }
  if (status === 429) {
    return { kind: "rate_limit", message: `Rate limit exceeded: ${message}`, status };
  }
  if (status === 401 || status === 403) {
    return { kind: "auth", message: `Authentication error: ${message}`, status };
  }
  if (status === 400) {
    return { kind: "invalid_request", message: `Invalid request: ${message}`, status };
  }
  return { kind: "api", message: `API error ${status}: ${message}`, status };
}

/** Rate limits, server errors and network failures are worth another attempt. */
export function isTransientError(error: ChatError): boolean {
  switch (error.kind) {
    case "rate_limit":
    case "network":
      return true;
    case "api":
      return (error.status ?? 0) >= 500;
    default:
      return false;
  }
}

/** `retry-after` in seconds or as an HTTP date, converted to milliseconds. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number.parseInt(header, 10);
  if (Number.isFinite(seconds) && String(seconds) === header.trim()) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/** Chat-completions client for OpenAI and Azure OpenAI deployments. */
export class HttpChatClient implements ChatClient {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: HttpChatClientOptions) {
    this.fetchFn = options.fetch ?? fetch;
  }

  /** One chat completion, retrying transient failures up to `backend.maxRetries` times. */
  async complete(request: ChatRequest): Promise<ChatResult> {
    const { config, logger } = this.options;
    const { value } = await retryWhile(() => this.send(request), {
      maxAttempts: config.maxRetries + 1,
      baseDelayMs: config.retryDelayMs,
      sleep: this.options.sleep,
      shouldRetry: (result) => !result.ok && isTransientError(result.error),
      delayFor: (result) => (result.ok ? undefined : result.error.retryAfterMs),
      onRetry: (attempt, delayMs) => {
        logger.warn({ attempt, delayMs: Math.round(delayMs) }, "Transient backend failure, retrying");
      },
    });
    return value;
  }

  private async send(request: ChatRequest): Promise<ChatResult> {
    const { config, apiKey, logger } = this.options;

    let response: Response;
    try {
      response = await this.fetchFn(this.urlFor(request.model), {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...(config.provider === "azure"
            ? { "api-key": apiKey }
            : { Authorization: `Bearer ${apiKey}` }),
        },
        body: JSON.stringify({
          model: request.model,
          temperature: request.temperature,
          top_p: request.topP,
          max_tokens: request.maxTokens,
          messages: [
            { role: "system", content: request.systemPrompt },
            { role: "user", content: request.userPrompt },
          ],
        }),
        signal: AbortSignal.timeout(config.timeoutMs),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, error: { kind: "network", message: `Network error: ${message}` } };
    }

    const bodyText = await response.text();
    if (!response.ok) {
      const classified = classifyHttpError(response.status, bodyText);
      const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
      const error = retryAfterMs === undefined ? classified : { ...classified, retryAfterMs };
      logger.debug({ status: response.status, kind: error.kind }, "Chat completion failed");
      return { ok: false, error };
    }

    const parsed = completionSchema.safeParse(parseJson(bodyText));
    if (!parsed.success) {
      return {
        ok: false,
        error: { kind: "api", message: `Unexpected response shape: ${parsed.error.message}` },
      };
    }

    const data = parsed.data;
    const choice = data.choices[0];
    if (choice?.finish_reason === "content_filter") {
      return {
        ok: false,
        error: { kind: "content_filter", message: "Response withheld by content filter" },
      };
    }

    logger.debug({ id: data.id, model: data.model }, "Chat completion received");
    return {
      ok: true,
      completion: {
        id: data.id,
        model: data.model,
        text: choice?.message?.content ?? "",
        ...(data.usage
          ? {
              usage: {
                promptTokens: data.usage.prompt_tokens,
                completionTokens: data.usage.completion_tokens,
                totalTokens: data.usage.total_tokens,
              },
            }
          : {}),
      },
    };
  }

  private urlFor(model: string): string {
    const { config } = this.options;
    const base = config.endpoint.replace(/\/+$/, "");
    if (config.provider === "azure") {
      const deployment = encodeURIComponent(model);
      const version = encodeURIComponent(config.apiVersion);
      return `${base}/openai/deployments/${deployment}/chat/completions?api-version=${version}`;
    }
    return `${base}/chat/completions`;
  }
}
