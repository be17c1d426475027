import type { LanguagePair, OutputFormat } from "./types.js";

export interface TranslationPrompts {
  readonly systemPrompt: string;
  /** Prefix placed before the page text and its context. */
  readonly userPromptPrefix: string;
}

function formattingInstruction(format: OutputFormat): string {
  if (format === "file") {
    return (
      "Use proper paragraph breaks and standard text formatting suitable for file output. " +
      "Use actual line breaks (not \\n characters) to separate paragraphs and sections naturally."
    );
  }
  return 'You can format and line break the output yourself using "\\n" for line breaks in console output.';
}

export function createTranslationPrompts(
  languages: LanguagePair,
  format: OutputFormat,
): TranslationPrompts {
  const { source, target } = languages;

  const systemPrompt =
    `Follow the instructions carefully. Please act as a professional translator from ${source} ` +
    `to ${target}. I will provide you with text from a document, and your task is to translate it ` +
    `from ${source} to ${target}. Please only output the translation and do not output any ` +
    "irrelevant content. If there are garbled characters or other non-standard text content, " +
    `delete the garbled characters. ${formattingInstruction(format)} ` +
    'You may be provided with "--Context: " and the text from either the document\'s abstract or ' +
    'a sample of text from the previous page. You will also be provided with "--Current Page: " ' +
    `which includes the characters of the current page. Only output the ${target} translation of ` +
    'the "--Current Page: ". Do not output the context, nor the "--Context: " and "--Current Page: " labels.';

  const userPromptPrefix =
    `Translate only the ${source} text of the "--Current Page: " to ${target}, without outputting ` +
    'any other content, and without outputting anything related to "--Context: ", if provided. ' +
    'Do not provide any prompts to the user, for example: "This is the translation of the current page.":\n';

  return { systemPrompt, userPromptPrefix };
}

export function outputFormatFor(outputPath: string | undefined, autoSave: boolean): OutputFormat {
  return outputPath || autoSave ? "file" : "console";
}
