// Numbered lists, citations and footnote markers across Latin and CJK typography.
const NUMBERED_CONTENT_PATTERNS: readonly RegExp[] = [
  /\d+\.\s+\D/,
  /\d+　/,
  /\d+\s+\D/,
  /\[\d+\]/,
  /\(\d+\)/,
  /（\d+）/,
  /\d+）/,
  /[①②③④⑤⑥⑦⑧⑨⑩]/,
  /[一二三四五]、/,
  /^\d+$/m,
];

const NUMBERED_LINE_PATTERNS: readonly RegExp[] = [
  /\d+\./,
  /\d+\)/,
  /（\d+）/,
  /\[\d+\]/,
  /\d+　/,
  /^\d+\s/,
];

const TRAILING_LINES = 5;

export function detectNumberedContent(text: string): boolean {
  return NUMBERED_CONTENT_PATTERNS.some((pattern) => pattern.test(text));
}

/** Last numbered line among the final few lines of a translated page. */
export function lastNumberedLine(translated: string): string | undefined {
  const lines = translated.trim().split("\n").slice(-TRAILING_LINES);
  let last: string | undefined;
  for (const line of lines) {
    if (NUMBERED_LINE_PATTERNS.some((pattern) => pattern.test(line))) {
      last = line;
    }
  }
  return last;
}
