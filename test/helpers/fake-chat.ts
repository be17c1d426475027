import type {
  ChatClient,
  ChatErrorKind,
  ChatRequest,
  ChatResult,
  TokenUsage,
} from "../../src/translation/types.js";

const PAGE_MARKER = "--Current Page: \n";
const CONTEXT_MARKER = "\n--Context: \n";

/** The page text embedded in a user prompt. */
export function currentPageOf(userPrompt: string): string {
  const start = userPrompt.indexOf(PAGE_MARKER);
  if (start === -1) return userPrompt;
  const rest = userPrompt.slice(start + PAGE_MARKER.length);
  const end = rest.indexOf(CONTEXT_MARKER);
  return end === -1 ? rest.slice(0, -1) : rest.slice(0, end);
}

export function success(
  text: string,
  opts: { model?: string; usage?: TokenUsage } = {},
): ChatResult {
  return {
    ok: true,
    completion: {
      id: "cmpl-test",
      model: opts.model ?? "gpt-4o",
      text,
      ...(opts.usage ? { usage: opts.usage } : {}),
    },
  };
}

export function failure(kind: ChatErrorKind, message = `${kind} error`): ChatResult {
  return { ok: false, error: { kind, message } };
}

export function usage(promptTokens: number, completionTokens: number): TokenUsage {
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

/** In-process backend that answers from a callback and keeps every request. */
export class FakeChatClient implements ChatClient {
  readonly requests: ChatRequest[] = [];

  constructor(
    private readonly respond: (request: ChatRequest, call: number) => ChatResult | Promise<ChatResult>,
  ) {}

  async complete(request: ChatRequest): Promise<ChatResult> {
    this.requests.push(request);
    return this.respond(request, this.requests.length - 1);
  }

  /** Page texts sent so far, in order. */
  pages(): string[] {
    return this.requests.map((r) => currentPageOf(r.userPrompt));
  }
}

/** Echoes the page text back, metering one token per character. */
export function echoClient(): FakeChatClient {
  return new FakeChatClient((request) => {
    const page = currentPageOf(request.userPrompt);
    return success(page, { usage: usage(page.length, page.length) });
  });
}
