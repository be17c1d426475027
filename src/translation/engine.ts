import type { TranslationConfig } from "../config/types.js";
import { TranslatorError, errorMessage, isTranslatorError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { bisectText } from "../text/bisect.js";
import { WorkQueue } from "../text/work-queue.js";
import type { UsageLedger } from "../usage/ledger.js";
import { retryWhile, sleep as defaultSleep } from "../utils/retry.js";
import { buildPromptContext } from "./context.js";
import type { TranslationPrompts } from "./prompt.js";
import type { ChatClient, ChatResult, Chunk, TranslationOutcome } from "./types.js";

export type EngineSettings = Pick<
  TranslationConfig,
  | "temperature"
  | "topP"
  | "maxTokens"
  | "contextPercentage"
  | "maxRetries"
  | "baseRetryDelayMs"
  | "retryJitterMs"
  | "interPageDelayMs"
>;

export interface TranslationEngineOptions {
  readonly client: ChatClient;
  readonly ledger: UsageLedger;
  readonly logger: Logger;
  readonly prompts: TranslationPrompts;
  readonly model: string;
  readonly settings: EngineSettings;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
}

export interface PartLocation {
  /** 1-based page number. */
  readonly page: number;
  /** 1-based sequence number of the part within the page. */
  readonly part: number;
}

export interface PageContext {
  readonly abstractText?: string;
  readonly previousPageText?: string;
  readonly previousTranslatedText?: string;
}

export interface DocumentOptions {
  readonly abstractText?: string;
  readonly onPage?: (text: string, chunk: Chunk) => void;
}

export function pageBanner(page: number): string {
  return `\n\n-- Page ${page} -- \n\n`;
}

export function contentFilteredPlaceholder(location: PartLocation, attempts: number): string {
  return `[Content filtered: page ${location.page}, part ${location.part} skipped after ${attempts} attempts]`;
}

/** The configured model when it is offered, else the first offered model. */
export function resolveModel(config: Pick<TranslationConfig, "model" | "availableModels">): string {
  if (config.availableModels.includes(config.model)) return config.model;
  const first = config.availableModels[0];
  if (!first) {
    throw new TranslatorError("config", "No models configured in translation.availableModels");
  }
  return first;
}

export class TranslationEngine {
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: TranslationEngineOptions) {
    this.logger = options.logger.child({ component: "engine" });
    this.sleep = options.sleep ?? ((ms) => defaultSleep(ms));
  }

  get model(): string {
    return this.options.model;
  }

  /**
   * One logical model call. Content-filter rejections are retried with
   * exponential backoff; every other failure ends the call.
   */
  async translateText(userPrompt: string, location: PartLocation): Promise<TranslationOutcome> {
    const { settings } = this.options;

    const { value, attempts } = await retryWhile(
      (attempt) => this.attempt(userPrompt, attempt),
      {
        maxAttempts: settings.maxRetries,
        baseDelayMs: settings.baseRetryDelayMs,
        jitterMs: settings.retryJitterMs,
        random: this.options.random,
        sleep: (ms) => this.sleep(ms),
        shouldRetry: (outcome) => outcome.status === "content_filtered",
        onRetry: (attempt, delayMs) => {
          this.logger.warn(
            { ...location, attempt, delayMs: Math.round(delayMs) },
            "Content filter triggered, retrying",
          );
        },
      },
    );

    if (value.status === "content_filtered") {
      return { status: "content_filtered", attempts };
    }
    return value;
  }

  /** Translate one page, bisecting parts that overflow the model context. */
  async generateText(chunk: Chunk, context: PageContext = {}): Promise<string> {
    const page = chunk.index + 1;
    const queue = new WorkQueue<string>([chunk.text]);
    const fragments: string[] = [];
    let part = 0;

    for (let text = queue.shift(); text !== undefined; text = queue.shift()) {
      part += 1;
      const location = { page, part };
      const outcome = await this.translateText(this.userPromptFor(text, chunk, context), location);

      switch (outcome.status) {
        case "success":
          fragments.push(outcome.text || `***Translation error on page ${page}.***`);
          break;
        case "context_too_long": {
          const halves = bisectText(text);
          if (!halves) {
            fragments.push(`***Page ${page} part ${part} exceeds the model context and cannot be split.***`);
            break;
          }
          this.logger.info(
            { ...location, length: text.length, boundary: halves.boundary },
            "Context length exceeded, splitting text",
          );
          queue.pushFront(halves.left, halves.right);
          break;
        }
        case "content_filtered":
          this.logger.warn({ ...location, attempts: outcome.attempts }, "Skipping filtered text");
          fragments.push(contentFilteredPlaceholder(location, outcome.attempts));
          break;
        case "fatal":
          throw outcome.error;
      }
    }

    return pageBanner(page) + fragments.join("\n");
  }

  /**
   * Translate pages in order, threading each page's source and translation
   * into the next page's context. Pages that fail with an unexpected error get
   * an inline marker; TranslatorErrors end the run.
   */
  async translateDocument(chunks: readonly Chunk[], opts: DocumentOptions = {}): Promise<string[]> {
    const { ledger, settings } = this.options;
    if (ledger.isMonthlyLimitExceeded()) {
      throw new TranslatorError(
        "budget_exceeded",
        `Monthly budget of $${ledger.getMonthlyLimit().toFixed(2)} has been reached`,
      );
    }

    const pages: string[] = [];
    let previousPageText: string | undefined;
    let previousTranslatedText: string | undefined;

    for (const [position, chunk] of chunks.entries()) {
      if (position > 0 && settings.interPageDelayMs > 0) {
        await this.sleep(settings.interPageDelayMs);
      }

      const page = chunk.index + 1;
      this.logger.info({ page, position: position + 1, total: chunks.length }, "Translating page");

      let text: string;
      try {
        text = await this.generateText(chunk, {
          abstractText: opts.abstractText,
          previousPageText,
          previousTranslatedText,
        });
      } catch (err) {
        if (isTranslatorError(err)) throw err;
        this.logger.error({ page, err }, "Page translation failed");
        text = `${pageBanner(page)}***Translation error on page ${page}: ${errorMessage(err)}***`;
      }

      pages.push(text);
      opts.onPage?.(text, chunk);
      previousPageText = chunk.text;
      previousTranslatedText = text;
    }

    return pages;
  }

  private userPromptFor(text: string, chunk: Chunk, context: PageContext): string {
    return (
      this.options.prompts.userPromptPrefix +
      buildPromptContext({
        abstractText: chunk.abstract ?? context.abstractText,
        currentPageText: text,
        previousPageText: context.previousPageText,
        previousTranslatedText: context.previousTranslatedText,
        contextPercentage: this.options.settings.contextPercentage,
      })
    );
  }

  private async attempt(userPrompt: string, attempt: number): Promise<TranslationOutcome> {
    const { client, prompts, model, settings } = this.options;
    const result: ChatResult = await client.complete({
      model,
      systemPrompt: prompts.systemPrompt,
      userPrompt,
      temperature: settings.temperature,
      topP: settings.topP,
      maxTokens: settings.maxTokens,
    });

    if (!result.ok) {
      const { error } = result;
      switch (error.kind) {
        case "content_filter":
          return { status: "content_filtered", attempts: attempt + 1 };
        case "context_length":
          return { status: "context_too_long" };
        default:
          return { status: "fatal", error: new TranslatorError(error.kind, error.message) };
      }
    }

    const { completion } = result;
    if (completion.usage) {
      await this.options.ledger.recordUsage(
        completion.model,
        completion.usage.promptTokens,
        completion.usage.completionTokens,
        completion.usage.totalTokens,
        model,
      );
    } else {
      this.logger.warn({ model: completion.model }, "Response carried no token usage, not recorded");
    }

    return { status: "success", text: completion.text.trim() };
  }
}
