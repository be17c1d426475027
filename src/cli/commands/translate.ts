import { Command, Option } from "clipanion";
import { text } from "node:stream/consumers";
import { createTranslationSession } from "../../app.js";
import { loadConfig } from "../../config/loader.js";
import { extractDocument, extractText } from "../../documents/extractor.js";
import { parsePageRange, selectPages } from "../../documents/page-range.js";
import { TranslatorError } from "../../errors.js";
import { createLogger } from "../../logging/logger.js";
import { autoSavePath, isRenderedFormat, saveTranslation } from "../../output/writer.js";
import { parseLanguagePair } from "../../translation/languages.js";
import { outputFormatFor } from "../../translation/prompt.js";
import type { ChatClient } from "../../translation/types.js";
import { formatCost, reportFailure } from "../shared.js";

export class TranslateCommand extends Command {
  static override paths = [["translate"]];

  static override usage = Command.Usage({
    description: "Translate a document or text between Chinese, Japanese, Korean and English",
    details: `
      LANG_CODE is two letters, source then target: C (Chinese), J (Japanese),
      K (Korean), E (English). Read a document with \`-i\` or text from stdin
      with \`-c\`.
    `,
    examples: [
      ["Translate a PDF from Chinese to English", "cjk-translate translate CE -i paper.pdf"],
      ["Translate pages 2-5 and save", "cjk-translate translate JE -i book.pdf -p 2-5 -o book_en.txt"],
      ["Translate text from stdin", "echo 안녕하세요 | cjk-translate translate KE -c"],
    ],
  });

  languageCode = Option.String({ name: "LANG_CODE" });

  input = Option.String("-i,--input", {
    description: "Document to translate (.pdf, .docx or .txt)",
  });

  custom = Option.Boolean("-c,--custom", false, {
    description: "Read the text to translate from stdin",
  });

  pages = Option.String("-p,--pages", {
    description: "Page or page range, e.g. 3 or 2-5",
  });

  abstract = Option.String("--abstract", {
    description: "Abstract used as context for every page",
  });

  output = Option.String("-o,--output", {
    description: "Save the translation to this file",
  });

  autoSave = Option.Boolean("--auto-save", false, {
    description: "Save beside the input with a timestamped name",
  });

  user = Option.String("-u,--user", {
    description: "User profile whose key and ledger are used",
  });

  /** Backend override; the HTTP client is used when undefined. */
  protected chatClient(): ChatClient | undefined {
    return undefined;
  }

  async execute(): Promise<void> {
    try {
      await this.run();
    } catch (err) {
      reportFailure(this.context, err);
    }
  }

  private async run(): Promise<void> {
    const languages = parseLanguagePair(this.languageCode);
    if (Boolean(this.input) === this.custom) {
      throw new TranslatorError("config", "Use exactly one of --input <file> or --custom");
    }

    const config = loadConfig();
    const logger = createLogger(config.logging);

    let chunks = this.input
      ? await extractDocument(this.input, { pageSize: config.translation.pageSize })
      : extractText(await text(this.context.stdin));
    if (this.pages) {
      chunks = selectPages(chunks, parsePageRange(this.pages));
    }

    const format = outputFormatFor(this.output, this.autoSave);
    const session = await createTranslationSession({
      config,
      logger,
      env: process.env,
      user: this.user,
      languages,
      format,
      client: this.chatClient(),
    });

    const pages = await session.engine.translateDocument(chunks, {
      abstractText: this.abstract,
      onPage: (page) => {
        if (format === "console") this.context.stdout.write(page);
      },
    });
    const content = pages.join("");
    if (format === "console") this.context.stdout.write("\n");

    if (this.output) {
      const saved = await saveTranslation(content, this.output, logger);
      if (saved) {
        const note = isRenderedFormat(this.output) ? ` (plain text in place of ${this.output})` : "";
        this.context.stdout.write(`Saved translation to ${saved}${note}\n`);
      }
    }
    if (this.autoSave) {
      const saved = await saveTranslation(content, autoSavePath(this.input, languages), logger);
      if (saved) this.context.stdout.write(`Saved translation to ${saved}\n`);
    }

    const { ledger } = session;
    const month = ledger.getMonthlyUsage();
    logger.info(
      {
        monthlyCost: formatCost(month.totalCost),
        remaining: formatCost(ledger.remainingMonthlyBudget()),
        percentUsed: Number(ledger.monthlyUsagePercentage().toFixed(1)),
      },
      "Translation finished",
    );
  }
}
