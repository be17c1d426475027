import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { TranslatorError } from "../errors.js";
import { DEFAULT_PAGE_SIZE, paginateText } from "../text/paragraphs.js";
import type { Chunk } from "../translation/types.js";
import { readDocxText } from "./docx.js";
import { readPdfPages } from "./pdf.js";

export const SUPPORTED_EXTENSIONS = [".pdf", ".docx", ".txt"] as const;

export interface ExtractOptions {
  readonly pageSize?: number;
}

function toChunks(pages: readonly string[]): Chunk[] {
  if (pages.length === 0) return [{ index: 0, text: "" }];
  return pages.map((text, index) => ({ index, text }));
}

/** Split a document into page chunks, in source order. Never returns an empty list. */
export async function extractDocument(filePath: string, opts: ExtractOptions = {}): Promise<Chunk[]> {
  const pageSize = opts.pageSize ?? DEFAULT_PAGE_SIZE;
  const extension = extname(filePath).toLowerCase();

  switch (extension) {
    case ".pdf":
      return toChunks(await readPdfPages(filePath));
    case ".docx":
      return toChunks(paginateText(await readDocxText(filePath), pageSize));
    case ".txt":
      return toChunks(paginateText(await readFile(filePath, "utf-8"), pageSize));
    default:
      throw new TranslatorError(
        "unsupported_document",
        `Unsupported file type '${extension || filePath}'. Supported: ${SUPPORTED_EXTENSIONS.join(", ")}`,
      );
  }
}

/** Text supplied directly (for example on stdin) is a single chunk. */
export function extractText(text: string): Chunk[] {
  return [{ index: 0, text: text.trim() }];
}
