const PARAGRAPH_BREAK = "\n\n";
const SENTENCE_END = /[.!?。！？]/g;
const MIN_WINDOW = 32;
const WINDOW_RATIO = 0.1;

export interface Bisection {
  readonly left: string;
  readonly right: string;
  readonly boundary: "paragraph" | "sentence" | "midpoint";
}

/** True when `index` falls between the two halves of a surrogate pair. */
export function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  const high = text.charCodeAt(index - 1);
  const low = text.charCodeAt(index);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

function nearest(candidates: number[], target: number): number | undefined {
  let best: number | undefined;
  for (const candidate of candidates) {
    if (best === undefined || Math.abs(candidate - target) < Math.abs(best - target)) {
      best = candidate;
    }
  }
  return best;
}

function paragraphSplitPoints(text: string, from: number, to: number): number[] {
  const points: number[] = [];
  let idx = text.indexOf(PARAGRAPH_BREAK, from);
  while (idx !== -1 && idx <= to) {
    points.push(idx + PARAGRAPH_BREAK.length);
    idx = text.indexOf(PARAGRAPH_BREAK, idx + 1);
  }
  return points;
}

function sentenceSplitPoints(text: string, from: number, to: number): number[] {
  const points: number[] = [];
  for (const match of text.slice(from, to + 1).matchAll(SENTENCE_END)) {
    points.push(from + (match.index ?? 0) + 1);
  }
  return points;
}

/**
 * Cut text in two near its middle. Prefers a paragraph break, then a
 * sentence end, within the search window; otherwise the exact midpoint.
 * Returns null when the text is too short to yield two non-empty halves.
 */
export function bisectText(text: string): Bisection | null {
  if (text.length < 2) return null;

  let mid = Math.floor(text.length / 2);
  if (splitsSurrogatePair(text, mid)) {
    mid = mid - 1 > 0 ? mid - 1 : mid + 1;
  }
  if (mid >= text.length) return null;
  const window = Math.max(MIN_WINDOW, Math.floor(text.length * WINDOW_RATIO));
  const from = Math.max(0, mid - window);
  const to = Math.min(text.length - 1, mid + window);
  const valid = (point: number): boolean => point > 0 && point < text.length;

  const paragraph = nearest(paragraphSplitPoints(text, from, to).filter(valid), mid);
  if (paragraph !== undefined) {
    return { left: text.slice(0, paragraph), right: text.slice(paragraph), boundary: "paragraph" };
  }

  const sentence = nearest(sentenceSplitPoints(text, from, to).filter(valid), mid);
  if (sentence !== undefined) {
    return { left: text.slice(0, sentence), right: text.slice(sentence), boundary: "sentence" };
  }

  return { left: text.slice(0, mid), right: text.slice(mid), boundary: "midpoint" };
}
