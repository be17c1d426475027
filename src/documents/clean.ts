/** Normalize text pulled out of a PDF page. */
export function cleanExtractedText(text: string): string {
  return text
    .replace(/[\u0000\uFEFF]/g, "")
    .replace(/\(cid:\d+\)/g, "")
    .replace(/[ \t]+/g, " ")
    .replace(/\r\n?/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
