import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { TranslatorError } from "../../src/errors.js";
import {
  TranslationEngine,
  resolveModel,
  type EngineSettings,
} from "../../src/translation/engine.js";
import { createTranslationPrompts } from "../../src/translation/prompt.js";
import type { UsageLedger } from "../../src/usage/ledger.js";
import {
  FakeChatClient,
  currentPageOf,
  echoClient,
  failure,
  success,
  usage,
} from "../helpers/fake-chat.js";
import { makeEngineSettings, openTestLedger, silentLogger } from "../helpers/fixtures.js";

const prompts = createTranslationPrompts({ source: "Chinese", target: "English" }, "console");

describe("TranslationEngine", () => {
  let tempDir: string;
  let ledger: UsageLedger;
  let sleeps: number[];

  beforeEach(async () => {
    tempDir = mkdtempSync(join(tmpdir(), "cjk-engine-test-"));
    ({ ledger } = await openTestLedger(tempDir, { now: () => new Date(2025, 2, 14, 10) }));
    sleeps = [];
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function makeEngine(client: FakeChatClient, settings: Partial<EngineSettings> = {}): TranslationEngine {
    return new TranslationEngine({
      client,
      ledger,
      logger: silentLogger(),
      prompts,
      model: "gpt-4o",
      settings: makeEngineSettings(settings),
      random: () => 0,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
  }

  describe("translateText", () => {
    it("returns the trimmed translation and bills the requested model's rates", async () => {
      const client = new FakeChatClient(() =>
        success("  Hello  ", { model: "gpt-4o-2024-08-06", usage: usage(100, 50) }),
      );
      const engine = makeEngine(client);

      const outcome = await engine.translateText("prompt", { page: 1, part: 1 });

      expect(outcome).toEqual({ status: "success", text: "Hello" });
      const [record] = ledger.getHistory();
      expect(record?.model).toBe("gpt-4o-2024-08-06");
      expect(record?.requestedModel).toBe("gpt-4o");
      expect(record?.totalCost).toBeCloseTo(0.000825, 10);
      expect(ledger.getModelUsage("gpt-4o-2024-08-06").totalTokens).toBe(150);
    });

    it("sends the configured sampling parameters and prompts", async () => {
      const client = echoClient();
      const engine = makeEngine(client, { temperature: 0.2, topP: 0.9, maxTokens: 500 });

      await engine.translateText("user prompt", { page: 1, part: 1 });

      expect(client.requests[0]).toEqual({
        model: "gpt-4o",
        systemPrompt: prompts.systemPrompt,
        userPrompt: "user prompt",
        temperature: 0.2,
        topP: 0.9,
        maxTokens: 500,
      });
    });

    it("does not record calls without token usage", async () => {
      const engine = makeEngine(new FakeChatClient(() => success("Hi")));
      await engine.translateText("prompt", { page: 1, part: 1 });
      expect(ledger.getHistory()).toHaveLength(0);
    });

    it("retries content filter rejections with exponential backoff", async () => {
      const client = new FakeChatClient((_request, call) =>
        call < 2 ? failure("content_filter") : success("Done", { usage: usage(1, 1) }),
      );
      const engine = makeEngine(client);

      const outcome = await engine.translateText("prompt", { page: 1, part: 1 });

      expect(outcome).toEqual({ status: "success", text: "Done" });
      expect(client.requests).toHaveLength(3);
      expect(sleeps).toEqual([10, 20]);
    });

    it("gives up after maxRetries content filter rejections", async () => {
      const client = new FakeChatClient(() => failure("content_filter"));
      const engine = makeEngine(client);

      const outcome = await engine.translateText("prompt", { page: 2, part: 1 });

      expect(outcome).toEqual({ status: "content_filtered", attempts: 10 });
      expect(client.requests).toHaveLength(10);
      expect(sleeps).toEqual([10, 20, 40, 80, 160, 320, 640, 1280, 2560]);
    });

    it("adds jitter that grows with the attempt number", async () => {
      const client = new FakeChatClient(() => failure("content_filter"));
      const engine = new TranslationEngine({
        client,
        ledger,
        logger: silentLogger(),
        prompts,
        model: "gpt-4o",
        settings: makeEngineSettings({ maxRetries: 3, baseRetryDelayMs: 100, retryJitterMs: 10 }),
        random: () => 0.5,
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      });

      await engine.translateText("prompt", { page: 1, part: 1 });

      expect(sleeps).toEqual([105, 210]);
    });

    it("reports context overflow without retrying", async () => {
      const client = new FakeChatClient(() => failure("context_length"));
      const outcome = await makeEngine(client).translateText("prompt", { page: 1, part: 1 });

      expect(outcome).toEqual({ status: "context_too_long" });
      expect(client.requests).toHaveLength(1);
      expect(sleeps).toEqual([]);
    });

    it("turns other backend errors into fatal outcomes", async () => {
      const client = new FakeChatClient(() => failure("auth", "Authentication error: bad key"));
      const outcome = await makeEngine(client).translateText("prompt", { page: 1, part: 1 });

      expect(outcome.status).toBe("fatal");
      if (outcome.status !== "fatal") return;
      expect(outcome.error.kind).toBe("auth");
      expect(outcome.error.message).toBe("Authentication error: bad key");
      expect(client.requests).toHaveLength(1);
    });
  });

  describe("generateText", () => {
    it("prefixes the page banner", async () => {
      const text = await makeEngine(echoClient()).generateText({ index: 2, text: "你好" });
      expect(text).toBe("\n\n-- Page 3 -- \n\n你好");
    });

    it("splits an overlong chunk at the paragraph break nearest the middle", async () => {
      const original = "A".repeat(2499) + "\n\n" + "B".repeat(2499);
      const client = new FakeChatClient((request) => {
        const page = currentPageOf(request.userPrompt);
        return page.length > 3000 ? failure("context_length") : success(page);
      });

      const text = await makeEngine(client).generateText({ index: 0, text: original });

      expect(client.pages()).toEqual([original, "A".repeat(2499) + "\n\n", "B".repeat(2499)]);
      expect(client.pages().slice(1).join("")).toBe(original);
      expect(text).toBe("\n\n-- Page 1 -- \n\n" + "A".repeat(2499) + "\n" + "B".repeat(2499));
    });

    it("keeps source order across repeated splits", async () => {
      const paragraphs = Array.from({ length: 8 }, (_, i) => `Section ${i + 1}. ` + "x".repeat(200));
      const original = paragraphs.join("\n\n");
      const accepted: string[] = [];
      const client = new FakeChatClient((request) => {
        const page = currentPageOf(request.userPrompt);
        if (page.length > 300) return failure("context_length");
        accepted.push(page);
        return success(page);
      });

      const text = await makeEngine(client).generateText({ index: 0, text: original });

      expect(accepted.join("")).toBe(original);
      expect(accepted.map((part) => part.trim())).toEqual(paragraphs);
      expect(text).toBe("\n\n-- Page 1 -- \n\n" + paragraphs.join("\n"));
    });

    it("replaces a filtered part with a placeholder and keeps the rest", async () => {
      const original = "good text.\n\nbad text.";
      const client = new FakeChatClient((request) => {
        const page = currentPageOf(request.userPrompt);
        if (page === original) return failure("context_length");
        return page.includes("bad") ? failure("content_filter") : success(page);
      });

      const text = await makeEngine(client, { maxRetries: 2 }).generateText({ index: 0, text: original });

      expect(text).toBe(
        "\n\n-- Page 1 -- \n\ngood text.\n[Content filtered: page 1, part 3 skipped after 2 attempts]",
      );
    });

    it("marks an empty translation as an error", async () => {
      const text = await makeEngine(new FakeChatClient(() => success("   "))).generateText({
        index: 4,
        text: "内容",
      });
      expect(text).toBe("\n\n-- Page 5 -- \n\n***Translation error on page 5.***");
    });

    it("marks a part that overflows and cannot be split", async () => {
      const text = await makeEngine(new FakeChatClient(() => failure("context_length"))).generateText({
        index: 0,
        text: "ab",
      });
      expect(text).toBe(
        "\n\n-- Page 1 -- \n\n" +
          "***Page 1 part 2 exceeds the model context and cannot be split.***\n" +
          "***Page 1 part 3 exceeds the model context and cannot be split.***",
      );
    });

    it("throws the error of a fatal outcome", async () => {
      const engine = makeEngine(new FakeChatClient(() => failure("rate_limit")));
      await expect(engine.generateText({ index: 0, text: "x" })).rejects.toBeInstanceOf(TranslatorError);
    });
  });

  describe("translateDocument", () => {
    it("passes the tail of the previous page as context", async () => {
      const client = echoClient();
      await makeEngine(client).translateDocument([
        { index: 0, text: "0123456789" },
        { index: 1, text: "second" },
      ]);

      expect(client.requests[0]?.userPrompt).toBe(prompts.userPromptPrefix + "--Current Page: \n0123456789\n");
      expect(client.requests[1]?.userPrompt).toBe(
        prompts.userPromptPrefix + "--Current Page: \nsecond\n--Context: \n6789",
      );
    });

    it("uses the abstract for every page", async () => {
      const client = echoClient();
      await makeEngine(client).translateDocument(
        [
          { index: 0, text: "first" },
          { index: 1, text: "second" },
        ],
        { abstractText: "Summary" },
      );

      expect(client.requests.map((r) => r.userPrompt)).toEqual([
        prompts.userPromptPrefix + "--Current Page: \nfirst\n--Context: \nSummary",
        prompts.userPromptPrefix + "--Current Page: \nsecond\n--Context: \nSummary",
      ]);
    });

    it("waits between pages but not before the first", async () => {
      await makeEngine(echoClient()).translateDocument([
        { index: 0, text: "one" },
        { index: 1, text: "two" },
        { index: 2, text: "three" },
      ]);
      expect(sleeps).toEqual([3000, 3000]);
    });

    it("continues to the next page after a filtered page", async () => {
      const client = new FakeChatClient((request) => {
        const page = currentPageOf(request.userPrompt);
        return page === "forbidden" ? failure("content_filter") : success(page);
      });
      const onPage = vi.fn();

      const pages = await makeEngine(client, { maxRetries: 3 }).translateDocument(
        [
          { index: 0, text: "forbidden" },
          { index: 1, text: "allowed" },
        ],
        { onPage },
      );

      expect(pages).toEqual([
        "\n\n-- Page 1 -- \n\n[Content filtered: page 1, part 1 skipped after 3 attempts]",
        "\n\n-- Page 2 -- \n\nallowed",
      ]);
      expect(client.requests).toHaveLength(4);
      expect(sleeps).toEqual([10, 20, 3000]);
      expect(onPage).toHaveBeenCalledTimes(2);
    });

    it("records an inline marker when a page fails unexpectedly", async () => {
      const client = new FakeChatClient((request) => {
        const page = currentPageOf(request.userPrompt);
        if (page === "broken") throw new Error("socket hang up");
        return success(page);
      });

      const pages = await makeEngine(client).translateDocument([
        { index: 0, text: "broken" },
        { index: 1, text: "fine" },
      ]);

      expect(pages).toEqual([
        "\n\n-- Page 1 -- \n\n***Translation error on page 1: socket hang up***",
        "\n\n-- Page 2 -- \n\nfine",
      ]);
    });

    it("aborts the run on a TranslatorError", async () => {
      const client = new FakeChatClient(() => failure("auth"));
      const engine = makeEngine(client);

      await expect(
        engine.translateDocument([
          { index: 0, text: "one" },
          { index: 1, text: "two" },
        ]),
      ).rejects.toMatchObject({ kind: "auth" });
      expect(client.requests).toHaveLength(1);
    });

    it("refuses to start when the monthly budget is spent", async () => {
      const dir = mkdtempSync(join(tmpdir(), "cjk-engine-budget-"));
      try {
        const { ledger: spent } = await openTestLedger(dir, { pricing: { monthlyLimit: 0 } });
        const client = echoClient();
        const engine = new TranslationEngine({
          client,
          ledger: spent,
          logger: silentLogger(),
          prompts,
          model: "gpt-4o",
          settings: makeEngineSettings(),
        });

        await expect(engine.translateDocument([{ index: 0, text: "one" }])).rejects.toMatchObject({
          kind: "budget_exceeded",
        });
        expect(client.requests).toHaveLength(0);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});

describe("resolveModel", () => {
  it("uses the configured model when it is available", () => {
    expect(resolveModel({ model: "gpt-4o", availableModels: ["o3-mini", "gpt-4o"] })).toBe("gpt-4o");
  });

  it("falls back to the first available model", () => {
    expect(resolveModel({ model: "unknown", availableModels: ["o3-mini", "gpt-4o"] })).toBe("o3-mini");
  });
});
