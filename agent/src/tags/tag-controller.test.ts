/**
 * Tag Controller Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { TagController, scoreTag, type TagControllerOptions } from "./tag-controller.js";

const T0 = 1_800_000_000_000;
const HOUR_MS = 3_600_000;

let dir: string;
let clock: number;

async function createController(options: Partial<TagControllerOptions> = {}): Promise<TagController> {
  const controller = new TagController({ dir, clock: () => clock, ...options });
  await controller.load();
  return controller;
}

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "companion-tags-"));
  clock = T0;
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("rules", () => {
  it("seeds the seven default rules", async () => {
    const controller = await createController();
    expect(controller.ruleNames()).toEqual([
      "gaming", "creative", "learning", "technical", "casual", "help", "emotional",
    ]);
    const written = JSON.parse(await fs.readFile(path.join(dir, "tag_rules.json"), "utf-8"));
    expect(Object.keys(written)).toHaveLength(7);
  });

  it("reseeds a corrupt rules file", async () => {
    await fs.writeFile(path.join(dir, "tag_rules.json"), "{not json", "utf-8");
    const controller = await createController();
    expect(controller.stats().totalRules).toBe(7);
  });

  it("skips invalid patterns and keeps the rest of the rule", async () => {
    await fs.writeFile(
      path.join(dir, "tag_rules.json"),
      JSON.stringify({ cooking: { keywords: ["cook"], patterns: ["(unclosed", "\\bbake\\b"], weight: 1, description: "Food" } }),
      "utf-8",
    );
    const controller = await createController();
    expect(controller.analyze("let's bake and cook")).toEqual(["cooking"]);
  });
});

describe("analyze", () => {
  it("scores keyword and pattern hits times the weight", () => {
    const rule = { keywords: ["game", "play"], patterns: [/\bgame\b/], weight: 1.5, description: "" };
    // (0.3 + 0.3 + 0.4) * 1.5
    expect(scoreTag(rule, "Play a GAME")).toBeCloseTo(1.5, 10);
    expect(scoreTag(rule, "nothing here")).toBe(0);
  });

  it("detects tags at or above the threshold", async () => {
    const controller = await createController();
    expect(controller.analyze("let's play a game")).toEqual(["gaming"]);
    expect(controller.analyze("i feel sad")).toEqual(["emotional"]);
    expect(controller.analyze("")).toEqual([]);
  });

  it("adds nothing when automatic tagging is off", async () => {
    const controller = await createController({ automaticTagging: false });
    expect(await controller.processMessage("let's play a game")).toEqual([]);
    expect(controller.getActiveTags()).toEqual([]);
  });
});

describe("active set", () => {
  it("keeps a tag active strictly before added + TTL", async () => {
    const controller = await createController();
    await controller.add(["gaming"]);

    expect(controller.getActiveTags(T0 + HOUR_MS - 1)).toEqual(["gaming"]);
    expect(controller.getActiveTags(T0 + HOUR_MS)).toEqual([]);
  });

  it("refreshes the TTL when a tag is added again", async () => {
    const controller = await createController();
    await controller.add(["gaming"]);
    clock = T0 + HOUR_MS / 2;
    expect(await controller.add(["gaming"])).toEqual([]);

    expect(controller.getActiveTags(T0 + HOUR_MS + 1)).toEqual(["gaming"]);
  });

  it("selects the task profile of newly added tags", async () => {
    const taskSelector = { setCurrent: vi.fn().mockReturnValue(true) };
    const controller = await createController({ taskSelector });

    await controller.processMessage("let's play a game");
    await controller.processMessage("let's play a game");

    expect(taskSelector.setCurrent).toHaveBeenCalledTimes(1);
    expect(taskSelector.setCurrent).toHaveBeenCalledWith("gaming");
  });

  it("evicts the oldest tag past the maximum", async () => {
    const controller = await createController({ maxActive: 2 });
    await controller.add(["gaming"]);
    clock += 1000;
    await controller.add(["creative"]);
    clock += 1000;
    await controller.add(["help"]);

    expect(controller.getActiveTags()).toEqual(["creative", "help"]);
    expect(controller.getHistory().at(-1)).toEqual({
      tag: "gaming",
      action: "removed",
      source: "evict",
      timestamp: (T0 + 2000) / 1000,
    });
  });

  it("decays expired tags and records the removal", async () => {
    const controller = await createController();
    await controller.add(["gaming"]);
    clock = T0 + HOUR_MS;

    expect(await controller.decay()).toEqual(["gaming"]);
    expect(controller.getHistory().at(-1)).toEqual({
      tag: "gaming",
      action: "removed",
      source: "decay",
      timestamp: (T0 + HOUR_MS) / 1000,
    });
  });

  it("clears every active tag", async () => {
    const controller = await createController();
    await controller.add(["gaming", "help"]);
    expect(await controller.clear()).toEqual(["gaming", "help"]);
    expect(controller.getActiveTags()).toEqual([]);
  });
});

describe("context", () => {
  it("renders active tags with their descriptions", async () => {
    const controller = await createController();
    expect(controller.getContext()).toBe("");

    await controller.add(["gaming", "mystery"]);
    expect(controller.getContext()).toBe(
      "Current context tags:\n- gaming: Gaming and video game related content\n- mystery",
    );
  });

  it("recommends the task with the largest summed weight", async () => {
    const controller = await createController();
    expect(controller.getRecommendedTask()).toBeNull();

    await controller.add(["gaming", "emotional"]);
    expect(controller.getRecommendedTask()).toBe("supportive");
  });
});

describe("history replay", () => {
  it("rebuilds the active set from entries within the TTL", async () => {
    const nowSec = T0 / 1000;
    await fs.writeFile(
      path.join(dir, "tag_history.json"),
      JSON.stringify([
        { tag: "creative", action: "added", source: "auto", timestamp: nowSec - 7200 },
        { tag: "gaming", action: "added", source: "auto", timestamp: nowSec - 100 },
        { tag: "help", action: "added", source: "manual", timestamp: nowSec - 50 },
        { tag: "help", action: "removed", source: "manual", timestamp: nowSec - 40 },
        { tag: "broken" },
      ]),
      "utf-8",
    );

    const controller = await createController();
    expect(controller.getActiveTags()).toEqual(["gaming"]);
    expect(controller.stats()).toEqual({
      activeTags: 1,
      totalRules: 7,
      historyEntries: 4,
      automaticTagging: true,
      decayTimeHours: 1,
    });
  });

  it("persists history across instances", async () => {
    const first = await createController();
    await first.add(["technical"]);

    const second = await createController();
    expect(second.getActiveTags()).toEqual(["technical"]);
  });
});
