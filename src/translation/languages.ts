import { TranslatorError } from "../errors.js";
import type { Language, LanguagePair } from "./types.js";

export const LANGUAGE_CODES: Readonly<Record<string, Language>> = {
  C: "Chinese",
  J: "Japanese",
  K: "Korean",
  E: "English",
};

function lookup(code: string, role: "source" | "target"): Language {
  const language = LANGUAGE_CODES[code];
  if (!language) {
    throw new TranslatorError(
      "invalid_language",
      `Invalid ${role} language code '${code}'. Use C, J, K, or E.`,
    );
  }
  return language;
}

/** Parse a two-letter code such as "CE" (Chinese to English). */
export function parseLanguagePair(value: string): LanguagePair {
  if (value.length !== 2) {
    throw new TranslatorError(
      "invalid_language",
      "Language code must be exactly 2 characters (e.g., CE, JK).",
    );
  }

  const sourceCode = value.charAt(0).toUpperCase();
  const targetCode = value.charAt(1).toUpperCase();
  const source = lookup(sourceCode, "source");
  const target = lookup(targetCode, "target");

  if (source === target) {
    throw new TranslatorError("invalid_language", "Source and target languages cannot be the same.");
  }
  return { source, target };
}

export function languageCode(language: Language): string {
  return language.charAt(0);
}
