/**
 * Memory Store Tests
 *
 * Uses in-memory SQLite with a pre-fitted TF-IDF embedder.
 *
 * Covers:
 * - storeTurn: monotonic ids, log round-trip, fact extraction, profile updates
 * - searchSimilarTurns: threshold, ordering, recency tie-break, user filter
 * - getRelevantMemories: blended ranking, access bumps
 * - buildContext: exact rendering, empty when nothing qualifies, budget
 * - Degradation to memory-only mode on storage failure
 * - syncFromLog, importLegacyLog, warm-up fit
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { openDatabase, type CompanionDatabase } from "../db/index.js";
import { TfidfEmbedder } from "../embedding/tfidf.js";
import { MemoryStore, WARMUP_TURNS } from "./memory-store.js";
import { SqliteMemoryRepository } from "./sqlite-repository.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

const CORPUS = [
  "i love pizza a lot",
  "user notes",
  "weather is cold today",
  "music and songs",
];

let db: CompanionDatabase;

function fittedEmbedder(corpus: string[] = CORPUS): TfidfEmbedder {
  const embedder = new TfidfEmbedder();
  embedder.fit(corpus);
  return embedder;
}

function createStore(options: { embedder?: TfidfEmbedder; budget?: number; database?: CompanionDatabase } = {}): MemoryStore {
  const store = new MemoryStore({
    embedder: options.embedder ?? fittedEmbedder(),
    repository: new SqliteMemoryRepository(options.database ?? db),
    contextBudgetChars: options.budget,
    now: () => NOW,
  });
  store.initialize();
  return store;
}

beforeEach(() => {
  db = openDatabase(":memory:");
});

afterEach(() => {
  if (db.open) db.close();
});

// ============================================
// STORE
// ============================================

describe("storeTurn", () => {
  it("assigns increasing ids and round-trips the log as pairs", () => {
    const store = createStore();

    const first = store.storeTurn("u1", "hello", "hi there");
    const second = store.storeTurn("u1", "how are you", "great, thanks");

    expect(second).toBeGreaterThan(first);
    expect(store.readPairs()).toEqual([
      ["hello", "hi there"],
      ["how are you", "great, thanks"],
    ]);
    expect(store.readPairs(1)).toEqual([["how are you", "great, thanks"]]);
  });

  it("extracts facts through the rule table and skips duplicates", () => {
    const store = createStore();
    const repo = new SqliteMemoryRepository(db);

    store.storeTurn("u1", "I love pizza", "Pizza is great");
    store.storeTurn("u1", "I love pizza", "You said that already");

    const facts = repo.topFacts("u1", 10);
    expect(facts).toHaveLength(1);
    expect(facts[0]).toMatchObject({
      kind: "preference",
      text: "User love pizza",
      importance: 0.8,
      confidence: 0.8,
      accessCount: 0,
    });
  });

  it("counts topics and interactions in the user profile", () => {
    const store = createStore();

    store.storeTurn("u1", "I like this song", "Me too");
    store.storeTurn("u1", "what game should I play", "Try a puzzle");

    const profile = store.getUserProfile("u1");
    expect(profile.preferences.topics).toEqual({ music: 1, personal: 1, gaming: 1 });
    expect(profile.interactionHistory).toEqual({
      lastInteraction: NOW.toISOString(),
      totalInteractions: 2,
    });
  });

  it("reports stats for the last seven days", () => {
    const store = createStore();
    store.storeTurn("u1", "I am a student", "Nice");

    expect(store.getStats()).toMatchObject({
      totalTurns: 1,
      recentTurns: 1,
      totalMemories: 1,
      mode: "persistent",
    });
  });
});

// ============================================
// SEARCH
// ============================================

describe("searchSimilarTurns", () => {
  it("never returns results at or below the threshold and sorts descending", () => {
    const store = createStore();
    store.storeTurn("u1", "i love pizza", "pizza a lot");
    store.storeTurn("u1", "weather is cold", "cold today");
    store.storeTurn("u1", "music and songs", "songs");

    for (const query of ["pizza", "cold weather", "songs and music", "notes"]) {
      const results = store.searchSimilarTurns(query, "u1", 5);
      for (const r of results) expect(r.similarity).toBeGreaterThan(0.3);
      for (let i = 1; i < results.length; i++) {
        expect(results[i - 1].similarity).toBeGreaterThanOrEqual(results[i].similarity);
      }
    }

    expect(store.searchSimilarTurns("pizza", "u1")[0].turn.userText).toBe("i love pizza");
    expect(store.searchSimilarTurns("notes", "u1")).toEqual([]);
  });

  it("breaks similarity ties by recency", () => {
    const store = createStore();
    const older = store.storeTurn("u1", "music", "songs");
    const newer = store.storeTurn("u1", "music", "songs");

    const results = store.searchSimilarTurns("music songs", "u1");
    expect(results.map(r => r.turn.id)).toEqual([newer, older]);
  });

  it("filters by user when one is given", () => {
    const store = createStore();
    store.storeTurn("u1", "music", "songs");
    store.storeTurn("u2", "music", "songs");

    expect(store.searchSimilarTurns("music", "u2").map(r => r.turn.userId)).toEqual(["u2"]);
    expect(store.searchSimilarTurns("music")).toHaveLength(2);
  });
});

// ============================================
// FACTS
// ============================================

describe("getRelevantMemories", () => {
  it("ranks by the blended score and bumps access counts of returned facts", () => {
    const store = createStore();
    const repo = new SqliteMemoryRepository(db);
    store.storeTurn("u1", "I love pizza", "yum");
    store.storeTurn("u1", "I hate cold weather", "brr");
    store.storeTurn("u1", "My name is pizza lover", "cute");

    const results = store.getRelevantMemories("love pizza", "u1", 5);

    expect(results.length).toBeGreaterThan(0);
    for (let i = 1; i < results.length; i++) {
      expect(results[i - 1].score).toBeGreaterThanOrEqual(results[i].score);
    }
    for (const r of results) {
      expect(r.score).toBeCloseTo(0.7 * r.similarity + 0.3 * r.fact.importance, 10);
    }

    const returned = new Set(results.map(r => r.fact.id));
    for (const fact of repo.topFacts("u1", 10)) {
      expect(fact.accessCount).toBe(returned.has(fact.id) ? 1 : 0);
      expect(fact.lastAccessed).toBe(returned.has(fact.id) ? NOW.toISOString() : undefined);
    }
  });
});

// ============================================
// CONTEXT
// ============================================

describe("buildContext", () => {
  it("renders memories, similar turns and preferences", () => {
    const store = createStore();
    store.storeTurn("u1", "I love pizza", "Pizza is great");

    expect(store.buildContext("I love pizza", "u1")).toBe(
      "CONTEXT FOR PERSONALIZED RESPONSE:\n" +
        "Relevant memories about this user:\n" +
        "- User love pizza (confidence: 0.8)\n" +
        "\n" +
        "Similar past conversations:\n" +
        "- User: I love pizza...\n" +
        "  Response: Pizza is great...\n" +
        "\n" +
        'User preferences: {"topics":{"personal":1}}\n' +
        "\n",
    );
  });

  it("returns an empty string when nothing qualifies", () => {
    const store = createStore();
    expect(store.buildContext("anything at all", "u1")).toBe("");
  });

  it("truncates to the character budget", () => {
    const store = createStore({ budget: 40 });
    store.storeTurn("u1", "I love pizza", "Pizza is great");

    expect(store.buildContext("I love pizza", "u1")).toBe(
      "CONTEXT FOR PERSONALIZED RESPONSE:\nRelev" + "...\n",
    );
  });
});

// ============================================
// DEGRADATION
// ============================================

describe("storage failure", () => {
  it("switches to memory-only mode and keeps ids increasing", () => {
    const store = createStore();
    store.storeTurn("u1", "first", "one");
    const second = store.storeTurn("u1", "second", "two");

    db.close();
    const third = store.storeTurn("u1", "third", "three");

    expect(store.mode).toBe("memory-only");
    expect(third).toBe(second + 1);
    expect(store.readPairs()).toEqual([
      ["first", "one"],
      ["second", "two"],
      ["third", "three"],
    ]);
  });
});

// ============================================
// SYNC / IMPORT / WARM-UP
// ============================================

describe("syncFromLog", () => {
  it("picks up turns written by another writer exactly once", () => {
    const reader = createStore();
    const writer = createStore();
    writer.storeTurn("u1", "music and songs", "songs");

    expect(reader.searchSimilarTurns("music", "u1")).toEqual([]);
    expect(reader.syncFromLog()).toBe(1);
    expect(reader.searchSimilarTurns("music", "u1")).toHaveLength(1);
    expect(reader.syncFromLog()).toBe(0);
  });
});

describe("importLegacyLog", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "companion-legacy-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("imports valid pairs once and skips malformed entries", async () => {
    const file = path.join(dir, "LiveLog.json");
    await fs.writeFile(file, JSON.stringify([["hello", "hi there"], ["bad"], ["how are you", "great"]]), "utf-8");
    const store = createStore();

    expect(await store.importLegacyLog(file, "u1")).toBe(2);
    expect(await store.importLegacyLog(file, "u1")).toBe(0);
    expect(store.readPairs()).toEqual([
      ["hello", "hi there"],
      ["how are you", "great"],
    ]);
    expect(new SqliteMemoryRepository(db).turnsAfter(0).map(t => t.platform)).toEqual(["legacy", "legacy"]);
  });

  it("returns 0 when the file does not exist", async () => {
    const store = createStore();
    expect(await store.importLegacyLog(path.join(dir, "missing.json"), "u1")).toBe(0);
  });
});

describe("warm-up fit", () => {
  it("fits an unfitted embedder once the log is large enough", () => {
    const embedder = new TfidfEmbedder();
    const store = createStore({ embedder });

    for (let i = 0; i < WARMUP_TURNS - 1; i++) store.storeTurn("u1", `music number ${i}`, "songs");
    expect(embedder.ready).toBe(false);
    expect(store.searchSimilarTurns("music", "u1")).toEqual([]);

    store.storeTurn("u1", "music number last", "songs");
    expect(embedder.ready).toBe(true);
    expect(store.searchSimilarTurns("music songs", "u1").length).toBeGreaterThan(0);
  });
});
