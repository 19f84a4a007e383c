/**
 * Lorebook Tests
 *
 * Covers:
 * - calculateRelevance: exact vs substring hits, priority boost, no-hit rule
 * - getRelevant / getContext: threshold, ordering, cap, disabled entries
 * - Loading: default seeding, extra files
 * - Editing: add / remove / update persist to the owning file
 * - search, stats, toggle
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { readJson, writeJson } from "../core/json-store.js";
import { Lorebook, calculateRelevance, parseLorebookFile, type LoreEntry } from "./lorebook.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "companion-lore-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

function entry(overrides: Partial<LoreEntry> = {}): LoreEntry {
  return {
    id: "e1",
    title: "Cats",
    content: "Cats nap a lot.",
    keywords: ["cat", "kitten"],
    priority: 0,
    enabled: true,
    ...overrides,
  };
}

describe("calculateRelevance", () => {
  it("counts whole words as 1 and substrings as 0.5", () => {
    expect(calculateRelevance(entry(), "I have a cat")).toBe(0.5);
    expect(calculateRelevance(entry(), "so many cats")).toBe(0.25);
    expect(calculateRelevance(entry(), "a cat and a kitten")).toBe(1);
  });

  it("adds a priority boost capped at 0.3", () => {
    expect(calculateRelevance(entry({ priority: 2 }), "I have a cat")).toBeCloseTo(0.7, 10);
    expect(calculateRelevance(entry({ priority: 9 }), "I have a cat")).toBeCloseTo(0.8, 10);
    expect(calculateRelevance(entry({ priority: 9 }), "a cat and a kitten")).toBe(1);
  });

  it("scores 0 without any keyword hit, whatever the priority", () => {
    expect(calculateRelevance(entry({ priority: 10 }), "dogs only")).toBe(0);
    expect(calculateRelevance(entry({ keywords: [] }), "cat")).toBe(0);
  });

  it("treats keywords literally", () => {
    expect(calculateRelevance(entry({ keywords: ["c++"] }), "i write c++ daily")).toBe(0.5);
  });
});

describe("Lorebook", () => {
  it("seeds the default lorebook and matches against it", async () => {
    const lorebook = new Lorebook(dir);
    await lorebook.load();

    expect(lorebook.stats()).toEqual({ totalEntries: 4, enabledEntries: 4, disabledEntries: 0, lorebookEnabled: true });
    expect(lorebook.getContext("are you into streaming games?")).toBe(
      "Relevant knowledge:\n" +
        "- Streaming Knowledge: You understand streaming, VTubing, and online content creation. You can discuss games, technology, and entertainment topics.",
    );
  });

  it("orders by priority, then relevance", async () => {
    const lorebook = new Lorebook(dir);
    await lorebook.load();

    const relevant = lorebook.getRelevant("who are you and how do you work with ai technology");
    expect(relevant.map(e => e.id)).toEqual(["personality_core", "ai_knowledge"]);
    expect(relevant[0].relevance).toBeCloseTo(0.55, 10);
    expect(relevant[1].relevance).toBe(1);
  });

  it("caps the number of entries and skips disabled ones", async () => {
    const entries = Array.from({ length: 7 }, (_, i) => entry({ id: `c${i}`, priority: i }));
    entries[6].enabled = false;
    await writeJson(path.join(dir, "lorebook.json"), { metadata: {}, entries });

    const lorebook = new Lorebook(dir);
    await lorebook.load();

    expect(lorebook.getRelevant("a cat").map(e => e.id)).toEqual(["c5", "c4", "c3", "c2", "c1"]);
  });

  it("loads extra files and writes edits back to their own file", async () => {
    await writeJson(path.join(dir, "lorebook.json"), { metadata: { name: "Main" }, entries: [entry()] });
    await writeJson(path.join(dir, "pets.json"), { metadata: {}, entries: [entry({ id: "d1", title: "Dogs", keywords: ["dog"] })] });

    const lorebook = new Lorebook(dir);
    await lorebook.load();
    expect(lorebook.list().map(e => e.id)).toEqual(["e1", "d1"]);

    expect(await lorebook.update("d1", { content: "Dogs fetch." })).toBe(true);
    const pets = parseLorebookFile(await readJson(path.join(dir, "pets.json")));
    const main = parseLorebookFile(await readJson(path.join(dir, "lorebook.json")));
    expect(pets?.entries.map(e => e.content)).toEqual(["Dogs fetch."]);
    expect(main?.entries.map(e => e.id)).toEqual(["e1"]);
    expect(main?.metadata.name).toBe("Main");
  });

  it("adds and removes entries with persistence", async () => {
    await writeJson(path.join(dir, "lorebook.json"), { metadata: {}, entries: [] });
    const lorebook = new Lorebook(dir, { now: () => new Date("2026-01-01T00:00:00.000Z") });
    await lorebook.load();

    const added = await lorebook.add({ title: "Tea", content: "Green tea is calming.", keywords: ["tea"] });
    expect(added).toMatchObject({ priority: 5, enabled: true, created: 1767225600 });
    expect(added.id).toMatch(/^entry_/);

    const reloaded = new Lorebook(dir);
    await reloaded.load();
    expect(reloaded.search("calming").map(e => e.title)).toEqual(["Tea"]);

    expect(await lorebook.remove(added.id)).toBe(true);
    expect(await lorebook.remove(added.id)).toBe(false);
    expect(parseLorebookFile(await readJson(path.join(dir, "lorebook.json")))?.entries).toEqual([]);
  });

  it("searches titles, content and keywords, and toggles off entirely", async () => {
    const lorebook = new Lorebook(dir);
    await lorebook.load();

    expect(lorebook.search("ASSIST").map(e => e.id)).toEqual(["helpful_assistant"]);
    expect(lorebook.search("")).toEqual([]);

    expect(lorebook.toggle()).toBe(false);
    expect(lorebook.getContext("streaming games")).toBe("");
    expect(lorebook.toggle(true)).toBe(true);
  });
});
