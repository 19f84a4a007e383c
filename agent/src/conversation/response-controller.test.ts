/**
 * Response Controller Tests
 *
 * Uses a scripted LLM client; no network.
 */

import { describe, it, expect, vi } from "vitest";
import { FALLBACK_REPLY, ResponseController, type ResponseControllerOptions } from "./response-controller.js";
import { EMPTY_REPLY, postProcess } from "./post-process.js";
import type { ILLMClient, LLMMessage, LLMRequestOptions, LLMResponse, LLMStreamChunk } from "../llm/types.js";
import type { HistoryEntry } from "../prompt/context-builder.js";

const ALL_ON = { removeAsterisks: true, rpSuppression: true, newlineCut: true };
const ALL_OFF = { removeAsterisks: false, rpSuppression: false, newlineCut: false };

class ScriptedClient implements ILLMClient {
  provider = "gemini" as const;
  replies: string[] = [];
  chunks: string[] = [];
  failWith: Error | null = null;
  calls: Array<{ messages: LLMMessage[]; options?: LLMRequestOptions }> = [];
  /** Runs after each yielded chunk */
  afterChunk: () => void = () => undefined;

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    this.calls.push({ messages, options });
    if (this.failWith) throw this.failWith;
    return { content: this.replies.shift() ?? "", model: "test-model", provider: "gemini" };
  }

  async *stream(messages: LLMMessage[], options?: LLMRequestOptions): AsyncGenerator<LLMStreamChunk, void, unknown> {
    this.calls.push({ messages, options });
    if (this.failWith) throw this.failWith;
    for (const content of this.chunks) {
      yield { content, done: false };
      this.afterChunk();
    }
    yield { content: "", done: true };
  }
}

function setup(overrides: Partial<ResponseControllerOptions> = {}) {
  const client = new ScriptedClient();
  const storeTurn = vi.fn((_userId: string, _userText: string, _aiText: string) => 1);
  const processMessage = vi.fn(async (_message: string) => []);
  const contextCalls: Array<{ input: string; history: readonly HistoryEntry[] }> = [];
  const controller = new ResponseController({
    client,
    context: {
      messages: (input, _userId, history) => {
        contextCalls.push({ input, history: [...history] });
        return [{ role: "system", content: "SYSTEM" }, { role: "user", content: input }];
      },
    },
    memory: { storeTurn },
    tags: { processMessage },
    userId: "u1",
    generation: { model: "test-model", temperature: 0.7, topP: 0.9, maxTokens: 300 },
    streaming: false,
    output: ALL_ON,
    ...overrides,
  });
  return { client, controller, storeTurn, processMessage, contextCalls };
}

describe("postProcess", () => {
  it("applies the cleanup steps in order", () => {
    expect(postProcess("Assistant: *waves* Hi there (smiles) [happy]\nSecond line", ALL_ON)).toBe("waves Hi there");
  });

  it("strips stacked role prefixes", () => {
    expect(postProcess("  Assistant: Response: hello", ALL_OFF)).toBe("hello");
  });

  it("keeps everything but prefixes when toggles are off", () => {
    expect(postProcess("AI: *hi* (x)\nmore", ALL_OFF)).toBe("*hi* (x)\nmore");
  });

  it("falls back when nothing is left", () => {
    expect(postProcess("", ALL_ON)).toBe(EMPTY_REPLY);
    expect(postProcess("[sighs]", ALL_ON)).toBe(EMPTY_REPLY);
  });
});

describe("sendMessage", () => {
  it("records the exchange in history, memory and tags", async () => {
    const { client, controller, storeTurn, processMessage } = setup();
    client.replies = ["Hello friend!"];

    const reply = await controller.sendMessage("hi");

    expect(reply).toBe("Hello friend!");
    expect(controller.getHistory()).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "Hello friend!" },
    ]);
    expect(controller.getLastResponse()).toBe("Hello friend!");
    expect(controller.state).toBe("idle");
    expect(storeTurn).toHaveBeenCalledWith("u1", "hi", "Hello friend!", "local", undefined);
    expect(processMessage).toHaveBeenCalledWith("hi");
    expect(client.calls[0].options).toEqual({ model: "test-model", temperature: 0.7, topP: 0.9, maxTokens: 300 });
  });

  it("passes prior history, without the current input, to the context", async () => {
    const { client, controller, contextCalls } = setup();
    client.replies = ["one", "two"];

    await controller.sendMessage("first");
    await controller.sendMessage("second");

    expect(contextCalls[1]).toEqual({
      input: "second",
      history: [
        { role: "user", content: "first" },
        { role: "assistant", content: "one" },
      ],
    });
  });

  it("replaces an empty completion", async () => {
    const { client, controller } = setup();
    client.replies = [""];
    expect(await controller.sendMessage("hi")).toBe(EMPTY_REPLY);
  });

  it("uses the fallback reply when the provider fails", async () => {
    const { client, controller, storeTurn } = setup();
    client.failWith = new Error("503 unavailable");

    const reply = await controller.sendMessage("hi");

    expect(reply).toBe(FALLBACK_REPLY);
    expect(controller.state).toBe("error");
    expect(controller.getHistory().at(-1)).toEqual({ role: "assistant", content: FALLBACK_REPLY });
    expect(storeTurn).toHaveBeenCalledWith("u1", "hi", FALLBACK_REPLY, "local", undefined);

    client.failWith = null;
    client.replies = ["better now"];
    expect(await controller.sendMessage("again")).toBe("better now");
    expect(controller.state).toBe("idle");
  });

  it("attaches images to the user message", async () => {
    const { client, controller } = setup();
    client.replies = ["a cat"];

    await controller.sendMessage("describe", { images: [{ base64: "AAAA", mediaType: "image/jpeg" }] });

    expect(client.calls[0].messages.at(-1)).toEqual({
      role: "user",
      content: "describe",
      images: [{ base64: "AAAA", mediaType: "image/jpeg" }],
    });
  });

  it("keeps going when tag processing fails", async () => {
    const { client, controller, processMessage } = setup();
    processMessage.mockRejectedValueOnce(new Error("disk full"));
    client.replies = ["ok"];
    expect(await controller.sendMessage("hi")).toBe("ok");
  });
});

describe("streaming", () => {
  it("emits chunks and marks the reply as streamed", async () => {
    const { client, controller } = setup({ streaming: true });
    client.chunks = ["Hel", "lo", " there"];
    const seen: string[] = [];

    const reply = await controller.sendMessage("hi", { onChunk: chunk => seen.push(chunk) });

    expect(seen).toEqual(["Hel", "lo", " there"]);
    expect(reply).toBe("Hello there");
    expect(controller.lastMessageStreamed).toBe(true);
  });

  it("stops at the next chunk boundary", async () => {
    const { client, controller } = setup({ streaming: true });
    client.chunks = ["one ", "two ", "three"];
    client.afterChunk = () => controller.stopGeneration();

    expect(await controller.sendMessage("count")).toBe("one");
    expect(controller.state).toBe("idle");
  });

  it("does not report a failed stream as streamed", async () => {
    const { client, controller } = setup({ streaming: true });
    client.failWith = new Error("boom");

    expect(await controller.sendMessage("hi")).toBe(FALLBACK_REPLY);
    expect(controller.lastMessageStreamed).toBe(false);
  });
});

describe("regenerateLast", () => {
  it("replaces the last reply without duplicating the user turn", async () => {
    const { client, controller } = setup();
    client.replies = ["first try", "second try"];

    await controller.sendMessage("tell me a joke");
    const reply = await controller.regenerateLast();

    expect(reply).toBe("second try");
    expect(controller.getHistory()).toEqual([
      { role: "user", content: "tell me a joke" },
      { role: "assistant", content: "second try" },
    ]);
  });

  it("keeps a reply whose user turn was cleared away", async () => {
    const { client, controller } = setup({ streaming: true });
    client.chunks = ["Still here"];
    client.afterChunk = () => controller.clearHistory();
    await controller.sendMessage("hi");

    expect(await controller.regenerateLast()).toBeNull();
    expect(controller.getHistory()).toEqual([{ role: "assistant", content: "Still here" }]);
    expect(client.calls).toHaveLength(1);
  });

  it("does nothing with too little history", async () => {
    const { client, controller } = setup();
    expect(await controller.regenerateLast()).toBeNull();
    expect(client.calls).toHaveLength(0);
  });
});

describe("settings and stats", () => {
  it("updates max tokens and ignores invalid values", async () => {
    const { client, controller } = setup();
    controller.setMaxTokens(120);
    controller.setMaxTokens(-5);
    client.replies = ["ok"];

    await controller.sendMessage("hi");

    expect(client.calls[0].options?.maxTokens).toBe(120);
    expect(controller.getStats()).toEqual({
      totalExchanges: 1,
      state: "idle",
      isGenerating: false,
      lastMessageStreamed: false,
      model: "test-model",
      maxTokens: 120,
    });
  });

  it("clears history", async () => {
    const { client, controller } = setup();
    client.replies = ["ok"];
    await controller.sendMessage("hi");
    controller.clearHistory();
    expect(controller.getHistory()).toEqual([]);
  });
});
