import { describe, it, expect } from "vitest";
import { buildPromptContext, previousPageTail } from "../../src/translation/context.js";

describe("previousPageTail", () => {
  it("keeps the trailing share of the previous page", () => {
    expect(previousPageTail("0123456789", 0.65)).toBe("6789");
    expect(previousPageTail("0123456789", 0)).toBe("0123456789");
    expect(previousPageTail("", 0.65)).toBe("");
  });

  it("counts supplementary-plane characters as one character each", () => {
    const tail = previousPageTail("𠀀".repeat(10), 0.65);
    expect(tail).toBe("𠀀".repeat(4));
    expect(/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/.test(tail)).toBe(false);
  });
});

describe("buildPromptContext", () => {
  it("sends only the current page when there is no context", () => {
    expect(buildPromptContext({ currentPageText: "当前页" })).toBe("--Current Page: \n当前页\n");
  });

  it("uses the tail of the previous page", () => {
    expect(
      buildPromptContext({ currentPageText: "page two", previousPageText: "0123456789" }),
    ).toBe("--Current Page: \npage two\n--Context: \n6789");
  });

  it("prefers the abstract over the previous page", () => {
    expect(
      buildPromptContext({
        abstractText: "An abstract",
        currentPageText: "page two",
        previousPageText: "0123456789",
      }),
    ).toBe("--Current Page: \npage two\n--Context: \nAn abstract");
  });

  it("honors a custom context percentage", () => {
    expect(
      buildPromptContext({
        currentPageText: "p",
        previousPageText: "abcdefghij",
        contextPercentage: 0.5,
      }),
    ).toBe("--Current Page: \np\n--Context: \nfghij");
  });

  it("adds where the previous numbering ended for numbered pages", () => {
    expect(
      buildPromptContext({
        currentPageText: "3. 第三项",
        previousPageText: "0123456789",
        previousTranslatedText: "\n\n-- Page 1 -- \n\n1. First\n2. Second",
      }),
    ).toBe("--Current Page: \n3. 第三项\n--Context: \n6789\nPrevious numbering ended with: 2. Second");
  });

  it("skips the numbering hint for pages without numbering", () => {
    expect(
      buildPromptContext({
        currentPageText: "普通文字",
        previousTranslatedText: "1. First\n2. Second",
      }),
    ).toBe("--Current Page: \n普通文字\n");
  });
});
