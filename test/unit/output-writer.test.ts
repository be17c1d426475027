import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  autoSavePath,
  isRenderedFormat,
  resolveOutputPath,
  saveTranslation,
} from "../../src/output/writer.js";
import { silentLogger } from "../helpers/fixtures.js";

describe("resolveOutputPath", () => {
  it("keeps text paths and adds a missing extension", () => {
    expect(resolveOutputPath("out.txt")).toBe("out.txt");
    expect(resolveOutputPath("out")).toBe("out.txt");
  });

  it("swaps rendered formats for a text sibling", () => {
    expect(resolveOutputPath("report.pdf")).toBe("report.txt");
    expect(resolveOutputPath("report.DOCX")).toBe("report.txt");
  });
});

describe("autoSavePath", () => {
  const at = new Date(2025, 2, 14, 9, 5, 7);

  it("names the file after the input and language pair", () => {
    expect(autoSavePath(join("docs", "paper.pdf"), { source: "Chinese", target: "English" }, at)).toBe(
      join("docs", "paper_CE_20250314-090507.txt"),
    );
  });

  it("uses a generic stem for custom text", () => {
    expect(autoSavePath(undefined, { source: "Korean", target: "Japanese" }, at)).toBe(
      "custom_text_KJ_20250314-090507.txt",
    );
  });
});

describe("isRenderedFormat", () => {
  it("recognizes PDF and Word targets", () => {
    expect(isRenderedFormat("report.pdf")).toBe(true);
    expect(isRenderedFormat("report.DOCX")).toBe(true);
    expect(isRenderedFormat("report.txt")).toBe(false);
    expect(isRenderedFormat("report")).toBe(false);
  });
});

describe("saveTranslation", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "cjk-output-test-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("writes UTF-8 text", async () => {
    const path = join(tempDir, "out", "result.txt");
    expect(await saveTranslation("译文 translated", path, silentLogger())).toBe(path);
    expect(readFileSync(path, "utf-8")).toBe("译文 translated");
  });

  it("writes a text sibling for PDF requests", async () => {
    const saved = await saveTranslation("content", join(tempDir, "result.pdf"), silentLogger());
    expect(saved).toBe(join(tempDir, "result.txt"));
    expect(existsSync(join(tempDir, "result.pdf"))).toBe(false);
  });

  it("skips blank content", async () => {
    const path = join(tempDir, "blank.txt");
    expect(await saveTranslation(" \n ", path, silentLogger())).toBeUndefined();
    expect(existsSync(path)).toBe(false);
  });
});
