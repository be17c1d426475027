import { detectNumberedContent, lastNumberedLine } from "../text/numbering.js";

export const DEFAULT_CONTEXT_PERCENTAGE = 0.65;

export interface PromptContextInput {
  readonly abstractText?: string;
  readonly currentPageText: string;
  readonly previousPageText?: string;
  readonly previousTranslatedText?: string;
  /** Leading fraction of the previous page that is dropped. */
  readonly contextPercentage?: number;
}

/** Trailing `(1 - contextPercentage)` share of the previous page, counted in code points. */
export function previousPageTail(previousPage: string, contextPercentage: number): string {
  const codePoints = Array.from(previousPage);
  return codePoints.slice(Math.floor(codePoints.length * contextPercentage)).join("");
}

/**
 * Compose the text sent for one page: the page itself, then a context block
 * built from the abstract (or the previous page's tail) and, for numbered
 * content, where the previous page's numbering stopped.
 */
export function buildPromptContext(input: PromptContextInput): string {
  const contextPercentage = input.contextPercentage ?? DEFAULT_CONTEXT_PERCENTAGE;
  const parts: string[] = [];

  const sourceContext = input.abstractText
    ? input.abstractText
    : previousPageTail(input.previousPageText ?? "", contextPercentage);
  if (sourceContext) {
    parts.push(sourceContext);
  }

  if (input.previousTranslatedText && detectNumberedContent(input.currentPageText)) {
    const lastLine = lastNumberedLine(input.previousTranslatedText);
    if (lastLine) {
      parts.push(`Previous numbering ended with: ${lastLine}`);
    }
  }

  const context = parts.length > 0 ? `--Context: \n${parts.join("\n")}` : "";
  return `--Current Page: \n${input.currentPageText}\n${context}`;
}
