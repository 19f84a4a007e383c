import { describe, it, expect } from "vitest";
import { loadSettings, validateSettings } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadSettings", () => {
  it("applies defaults for an empty environment", () => {
    const settings = loadSettings({});

    expect(settings.llm.model).toBe("gemini-2.0-flash-exp");
    expect(settings.llm.temperature).toBe(0.7);
    expect(settings.llm.topP).toBe(0.9);
    expect(settings.llm.maxOutputTokens).toBe(300);
    expect(settings.llm.streamChats).toBe(true);
    expect(settings.memory.embeddingScheme).toBe("tfidf");
    expect(settings.memory.contextBudgetChars).toBe(8000);
    expect(settings.web.port).toBe(5000);
    expect(settings.features.vtube).toBe(false);
    expect(settings.paths.characterCard).toBe("Configurables/CharacterCards/default.json");
    expect(settings.paths.databaseFile).toBe("data/companion.db");
  });

  it("reads booleans case-insensitively and numbers strictly", () => {
    const settings = loadSettings({
      STREAM_CHATS: "FALSE",
      NEWLINE_CUT: "True",
      TEMPERATURE: "not-a-number",
      MAX_TOKENS: "47",
      EMBEDDING_SCHEME: "features",
    });

    expect(settings.llm.streamChats).toBe(false);
    expect(settings.output.newlineCut).toBe(true);
    expect(settings.llm.temperature).toBe(0.7);
    expect(settings.llm.maxOutputTokens).toBe(47);
    expect(settings.memory.embeddingScheme).toBe("features");
  });

  it("falls back to tfidf for an unknown embedding scheme", () => {
    expect(loadSettings({ EMBEDDING_SCHEME: "word2vec" }).memory.embeddingScheme).toBe("tfidf");
  });
});

describe("validateSettings", () => {
  it("rejects a missing API key", () => {
    expect(() => validateSettings(loadSettings({}))).toThrow(ConfigError);
  });

  it("accepts a complete configuration", () => {
    expect(() => validateSettings(loadSettings({ GEMINI_API_KEY: "test-key" }))).not.toThrow();
  });

  it("rejects an out-of-range similarity threshold", () => {
    const settings = loadSettings({ GEMINI_API_KEY: "test-key", SIMILARITY_THRESHOLD: "1.5" });
    expect(() => validateSettings(settings)).toThrow(/SIMILARITY_THRESHOLD/);
  });
});
