import { readFile } from "node:fs/promises";
import { cleanExtractedText } from "./clean.js";

/** One string per native page, in page order. */
export async function readPdfPages(filePath: string): Promise<string[]> {
  const { extractText, getDocumentProxy } = await import("unpdf");
  const buffer = await readFile(filePath);
  const pdf = await getDocumentProxy(new Uint8Array(buffer));
  const { text } = await extractText(pdf, { mergePages: false });
  return text.map(cleanExtractedText);
}
