import { mkdir, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import type { Logger } from "../logging/logger.js";
import { languageCode } from "../translation/languages.js";
import type { LanguagePair } from "../translation/types.js";

const RENDERED_FORMATS = new Set([".pdf", ".docx"]);

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function timestamp(now: Date): string {
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}-` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

export function isRenderedFormat(outputPath: string): boolean {
  return RENDERED_FORMATS.has(extname(outputPath).toLowerCase());
}

/** Where a plain-text copy of the requested output ends up. */
export function resolveOutputPath(outputPath: string): string {
  const extension = extname(outputPath).toLowerCase();
  if (extension === "") return `${outputPath}.txt`;
  if (RENDERED_FORMATS.has(extension)) {
    return outputPath.slice(0, -extension.length) + ".txt";
  }
  return outputPath;
}

/**
 * Name for an automatically saved translation, placed beside the input:
 * `<stem>_<S><T>_<YYYYMMDD-HHmmss>.txt`. Text without an input file lands in
 * the working directory.
 */
export function autoSavePath(
  inputPath: string | undefined,
  languages: LanguagePair,
  now: Date = new Date(),
): string {
  const dir = inputPath ? dirname(inputPath) : ".";
  const stem = inputPath ? basename(inputPath, extname(inputPath)) : "custom_text";
  const codes = languageCode(languages.source) + languageCode(languages.target);
  return join(dir, `${stem}_${codes}_${timestamp(now)}.txt`);
}

/** Write the translation as UTF-8 text. Returns the written path, or undefined for blank content. */
export async function saveTranslation(
  content: string,
  outputPath: string,
  logger: Logger,
): Promise<string | undefined> {
  if (content.trim().length === 0) {
    logger.warn({ path: outputPath }, "Translation is empty, nothing saved");
    return undefined;
  }

  const target = resolveOutputPath(outputPath);
  if (isRenderedFormat(outputPath)) {
    logger.warn({ requested: outputPath, path: target }, "Rendered output is not supported, saving plain text");
  }

  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content, "utf-8");
  logger.info({ path: target }, "Translation saved");
  return target;
}
