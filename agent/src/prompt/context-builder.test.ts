/**
 * Context Builder Tests
 */

import { describe, it, expect, vi } from "vitest";
import {
  ContextBuilder,
  fitToBudget,
  render,
  renderHistory,
  type ContextSources,
  type HistoryEntry,
} from "./context-builder.js";
import type { MemoryFact, RelevantMemory, SimilarTurn } from "../memory/types.js";

const FACT: MemoryFact = {
  id: 1,
  userId: "u1",
  kind: "preference",
  text: "User love pizza",
  importance: 0.8,
  confidence: 0.8,
  accessCount: 0,
  createdAt: "2026-01-01T00:00:00.000Z",
};

const SIMILAR: SimilarTurn = {
  similarity: 0.9,
  turn: {
    id: 7,
    userId: "u1",
    userText: "I love pizza",
    aiText: "Yum",
    timestamp: "2026-01-01T00:00:00.000Z",
    platform: "local",
    context: { topics: ["personal"], sentiment: "positive" },
  },
};

function fullSources(): ContextSources {
  const memories: RelevantMemory[] = [{ fact: FACT, similarity: 0.9, score: 0.87 }];
  return {
    persona: { prompt: () => "PERSONA" },
    tasks: { prompt: () => "TASK" },
    tags: { getContext: () => "TAGS" },
    lorebook: { getContext: () => "LORE" },
    memory: {
      getRelevantMemories: () => memories,
      searchSimilarTurns: () => [SIMILAR],
    },
    characterName: () => "Lily",
  };
}

describe("ContextBuilder.build", () => {
  it("renders sections in the fixed order", () => {
    const builder = new ContextBuilder(fullSources());
    const history: HistoryEntry[] = [
      { role: "user", content: "hi" },
      { role: "assistant", content: "hello" },
    ];

    const bundle = builder.build("pizza?", "u1", history);

    expect(bundle.sections.map(s => s.name)).toEqual([
      "persona", "task", "tags", "lore", "memories", "turns", "history",
    ]);
    expect(bundle.truncated).toBe(false);
    expect(render(bundle)).toBe(
      "PERSONA\n\nTASK\n\nTAGS\n\nLORE\n\n" +
        "Relevant memories about this user:\n- User love pizza (confidence: 0.8)\n\n" +
        "Similar past conversations:\n- User: I love pizza...\n  Response: Yum...\n\n" +
        "Recent conversation:\nUser: hi\nLily: hello",
    );
  });

  it("adds relevant insights under the memories section", () => {
    const sources: ContextSources = {
      persona: { prompt: () => "PERSONA" },
      insights: { getRelevant: () => ["User shows interest in: music"] },
    };
    const builder = new ContextBuilder(sources);

    expect(render(builder.build("music", "u1"))).toBe(
      "PERSONA\n\nInsights from past conversations:\n- User shows interest in: music",
    );
  });

  it("skips retrieval for blank input", () => {
    const getRelevantMemories = vi.fn((): RelevantMemory[] => []);
    const searchSimilarTurns = vi.fn((): SimilarTurn[] => []);
    const builder = new ContextBuilder({
      persona: { prompt: () => "PERSONA" },
      memory: { getRelevantMemories, searchSimilarTurns },
    });

    expect(render(builder.build("   ", "u1"))).toBe("PERSONA");
    expect(getRelevantMemories).not.toHaveBeenCalled();
    expect(searchSimilarTurns).not.toHaveBeenCalled();
  });
});

describe("fitToBudget", () => {
  const sections = () => [
    { name: "persona" as const, text: "p".repeat(10) },
    { name: "task" as const, text: "t".repeat(10) },
    { name: "history" as const, text: "Recent conversation:\nUser: hello" },
  ];

  it("leaves a bundle within budget untouched", () => {
    const bundle = fitToBudget(sections(), 56);
    expect(bundle.truncated).toBe(false);
    expect(render(bundle)).toHaveLength(56);
  });

  it("tail-truncates the lowest-priority section first", () => {
    const bundle = fitToBudget(sections(), 40);

    expect(bundle.truncated).toBe(true);
    expect(render(bundle)).toBe("pppppppppp\n\ntttttttttt\n\nRecent conver...");
  });

  it("empties sections that cannot fit and moves up the priority list", () => {
    const bundle = fitToBudget(sections(), 20);

    expect(render(bundle)).toBe("pppppppppp\n\nttttt...");
    expect(bundle.sections.find(s => s.name === "history")?.text).toBe("");
  });
});

describe("renderHistory", () => {
  it("keeps the last 20 entries", () => {
    const history: HistoryEntry[] = Array.from({ length: 24 }, (_, i): HistoryEntry => ({
      role: i % 2 === 0 ? "user" : "assistant",
      content: `m${i}`,
    }));

    const lines = renderHistory(history, "Lily").split("\n");
    expect(lines).toHaveLength(21);
    expect(lines[1]).toBe("User: m4");
    expect(lines[20]).toBe("Lily: m23");
  });
});

describe("ContextBuilder.messages", () => {
  it("sends the rendered context as the system message", () => {
    const builder = new ContextBuilder({ persona: { prompt: () => "PERSONA" }, tags: { getContext: () => "TAGS" } });
    expect(builder.messages("hello", "u1")).toEqual([
      { role: "system", content: "PERSONA\n\nTAGS" },
      { role: "user", content: "hello" },
    ]);
  });

  it("omits the system message when every section is empty", () => {
    const builder = new ContextBuilder({ persona: { prompt: () => "" } });
    expect(builder.messages("hello", "u1")).toEqual([{ role: "user", content: "hello" }]);
  });
});
