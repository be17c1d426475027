import { TranslatorError } from "../errors.js";
import type { Chunk } from "../translation/types.js";

export interface PageRange {
  /** 0-based, inclusive. */
  readonly start: number;
  /** 0-based, inclusive. */
  readonly end: number;
}

const RANGE_PATTERN = /^(\d+)(?:-(\d+))?$/;

/** Parse "3" or "2-5" (1-based, inclusive). */
export function parsePageRange(value: string): PageRange {
  const match = RANGE_PATTERN.exec(value.trim());
  if (!match?.[1]) {
    throw new TranslatorError(
      "invalid_page_range",
      `Invalid page range '${value}'. Use a single page (3) or a range (2-5).`,
    );
  }

  const start = Number.parseInt(match[1], 10);
  const end = match[2] === undefined ? start : Number.parseInt(match[2], 10);
  if (start < 1) {
    throw new TranslatorError("invalid_page_range", "Page numbers start at 1.");
  }
  if (end < start) {
    throw new TranslatorError(
      "invalid_page_range",
      `Invalid page range '${value}': end page is before start page.`,
    );
  }
  return { start: start - 1, end: end - 1 };
}

export function selectPages(chunks: readonly Chunk[], range: PageRange): Chunk[] {
  const selected = chunks.filter((chunk) => chunk.index >= range.start && chunk.index <= range.end);
  if (selected.length === 0) {
    throw new TranslatorError(
      "invalid_page_range",
      `Page range ${range.start + 1}-${range.end + 1} is outside the document (${chunks.length} pages).`,
    );
  }
  return selected;
}
