export const DEFAULT_PAGE_SIZE = 2000;

const PARAGRAPH_SEPARATOR = "\n\n";
const BLANK_LINE = /\n[ \t\r\f\v]*\n/;

function splitTrimmed(content: string, separator: RegExp | string): string[] {
  return content
    .split(separator)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Split raw text into paragraphs: on blank lines, else on single line breaks,
 * else the whole trimmed content as one paragraph.
 */
export function parseParagraphs(content: string): string[] {
  const trimmed = content.trim();
  if (trimmed.length === 0) return [];

  const byBlankLine = splitTrimmed(trimmed, BLANK_LINE);
  if (byBlankLine.length > 1) return byBlankLine;

  const byLine = splitTrimmed(trimmed, "\n");
  if (byLine.length > 1) return byLine;

  return [trimmed];
}

/**
 * Group paragraphs into logical pages of roughly `targetPageSize` characters.
 * A paragraph longer than the target is kept whole on its own page.
 */
export function groupIntoPages(
  paragraphs: readonly string[],
  targetPageSize = DEFAULT_PAGE_SIZE,
): string[] {
  if (paragraphs.length === 0) return [""];

  const pages: string[] = [];
  let current: string[] = [];
  let currentSize = 0;

  for (const paragraph of paragraphs) {
    if (current.length > 0 && currentSize + paragraph.length > targetPageSize) {
      pages.push(current.join(PARAGRAPH_SEPARATOR));
      current = [paragraph];
      currentSize = paragraph.length;
    } else {
      current.push(paragraph);
      currentSize += paragraph.length + PARAGRAPH_SEPARATOR.length;
    }
  }

  if (current.length > 0) {
    pages.push(current.join(PARAGRAPH_SEPARATOR));
  }

  return pages;
}

export function paginateText(content: string, targetPageSize = DEFAULT_PAGE_SIZE): string[] {
  return groupIntoPages(parseParagraphs(content), targetPageSize);
}
