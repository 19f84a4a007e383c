/**
 * Tag Controller
 *
 * Short-lived context labels inferred from conversation. Each tag stays
 * active for a TTL after its last add; adds and removals go to an
 * append-only history that is replayed at startup. Tags may point at a
 * task profile, which is selected when the tag is added.
 */

import * as path from "path";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../core/errors.js";
import { fileExists, loadOrSeed, readJson, readShippedDefault, writeJson } from "../core/json-store.js";
import { isRecord, numberField, stringArrayField, stringField } from "../core/validate.js";

const log = createComponentLogger("tags");

// ============================================
// TYPES
// ============================================

export interface TagRule {
  keywords: string[];
  patterns: RegExp[];
  weight: number;
  taskProfile?: string;
  description: string;
}

export type TagAction = "added" | "removed";
export type TagSource = "auto" | "manual" | "decay" | "clear" | "evict";

export interface TagHistoryEntry {
  tag: string;
  action: TagAction;
  source: string;
  /** Epoch seconds */
  timestamp: number;
}

export interface TagStats {
  activeTags: number;
  totalRules: number;
  historyEntries: number;
  automaticTagging: boolean;
  decayTimeHours: number;
}

/** Anything that can switch the current task profile */
export interface TaskSelector {
  setCurrent(name: string): boolean;
}

export interface TagControllerOptions {
  /** Directory holding tag_rules.json and tag_history.json */
  dir: string;
  automaticTagging?: boolean;
  ttlSeconds?: number;
  maxActive?: number;
  historyLimit?: number;
  /** Written as tag_rules.json when it is missing or malformed */
  defaultRules?: unknown;
  taskSelector?: TaskSelector;
  /** Epoch milliseconds */
  clock?: () => number;
}

const RULES_FILE = "tag_rules.json";
const HISTORY_FILE = "tag_history.json";
export const DETECTION_THRESHOLD = 0.5;

// ============================================
// PARSING / SCORING
// ============================================

export function parseTagRules(raw: unknown): Map<string, TagRule> | null {
  if (!isRecord(raw)) return null;
  const rules = new Map<string, TagRule>();
  for (const [tag, value] of Object.entries(raw)) {
    if (!isRecord(value)) continue;
    const patterns: RegExp[] = [];
    for (const source of stringArrayField(value, "patterns")) {
      try {
        patterns.push(new RegExp(source));
      } catch (err) {
        log.warn(`Invalid pattern for tag ${tag}; skipped`, { pattern: source, error: errorMessage(err) });
      }
    }
    const taskProfile = stringField(value, "task_profile");
    rules.set(tag, {
      keywords: stringArrayField(value, "keywords").map(k => k.toLowerCase()),
      patterns,
      weight: numberField(value, "weight", 1),
      taskProfile: taskProfile || undefined,
      description: stringField(value, "description", tag),
    });
  }
  return rules;
}

function parseHistory(raw: unknown): TagHistoryEntry[] {
  if (!Array.isArray(raw)) return [];
  const entries: TagHistoryEntry[] = [];
  for (const item of raw) {
    if (!isRecord(item)) continue;
    const action = item.action;
    const tag = stringField(item, "tag");
    const timestamp = numberField(item, "timestamp", Number.NaN);
    if (!tag || Number.isNaN(timestamp) || (action !== "added" && action !== "removed")) continue;
    entries.push({ tag, action, source: stringField(item, "source", "auto"), timestamp });
  }
  return entries;
}

/** 0.3 per keyword substring hit plus 0.4 per pattern hit, times the rule weight */
export function scoreTag(rule: TagRule, message: string): number {
  const lower = message.toLowerCase();
  let score = 0;
  for (const keyword of rule.keywords) {
    if (lower.includes(keyword)) score += 0.3;
  }
  for (const pattern of rule.patterns) {
    if (pattern.test(lower)) score += 0.4;
  }
  return score * rule.weight;
}

// ============================================
// CONTROLLER
// ============================================

export class TagController {
  private rules = new Map<string, TagRule>();
  private history: TagHistoryEntry[] = [];
  /** tag → epoch ms of its last add */
  private active = new Map<string, number>();
  private automatic: boolean;
  private readonly dir: string;
  private readonly ttlMs: number;
  private readonly maxActive: number;
  private readonly historyLimit: number;
  private readonly defaultRules: unknown;
  private readonly taskSelector?: TaskSelector;
  private readonly clock: () => number;

  constructor(options: TagControllerOptions) {
    this.dir = options.dir;
    this.automatic = options.automaticTagging ?? true;
    this.ttlMs = (options.ttlSeconds ?? 3600) * 1000;
    this.maxActive = options.maxActive ?? 10;
    this.historyLimit = options.historyLimit ?? 500;
    this.defaultRules = options.defaultRules ?? readShippedDefault("tag-rules.json");
    this.taskSelector = options.taskSelector;
    this.clock = options.clock ?? (() => Date.now());
  }

  async load(): Promise<void> {
    this.rules = await loadOrSeed(path.join(this.dir, RULES_FILE), this.defaultRules, parseTagRules);

    const historyPath = path.join(this.dir, HISTORY_FILE);
    this.history = [];
    if (await fileExists(historyPath)) {
      try {
        this.history = parseHistory(await readJson(historyPath));
      } catch (err) {
        log.warn("Tag history unreadable; starting empty", { error: errorMessage(err) });
      }
    }

    this.rebuildFromHistory();
    log.info(`Loaded ${this.rules.size} tag rules`, { active: this.active.size, history: this.history.length });
  }

  /** Replay history: the last add within the TTL wins unless a later removal follows it */
  private rebuildFromHistory(): void {
    const now = this.clock();
    this.active.clear();
    for (const entry of this.history) {
      const at = entry.timestamp * 1000;
      if (now - at >= this.ttlMs) continue;
      if (entry.action === "added") {
        this.active.delete(entry.tag);
        this.active.set(entry.tag, at);
      } else {
        this.active.delete(entry.tag);
      }
    }
    this.evictOverflow(false);
  }

  // ============================================
  // DETECTION
  // ============================================

  analyze(message: string): string[] {
    if (!message) return [];
    const detected: string[] = [];
    for (const [tag, rule] of this.rules) {
      if (scoreTag(rule, message) >= DETECTION_THRESHOLD) detected.push(tag);
    }
    return detected;
  }

  /** Detect and add tags for one message when automatic tagging is on */
  async processMessage(message: string): Promise<string[]> {
    if (!this.automatic) return [];
    const detected = this.analyze(message);
    if (detected.length > 0) await this.add(detected, "auto");
    return detected;
  }

  // ============================================
  // MUTATION
  // ============================================

  /**
   * Add tags, or refresh the TTL of tags already active. Returns the tags
   * that were not active before.
   */
  async add(tags: string[], source: TagSource = "manual"): Promise<string[]> {
    const now = this.clock();
    const fresh: string[] = [];

    for (const tag of tags) {
      const wasActive = this.isActive(tag, now);
      // Re-insert so Map order follows last-add time
      this.active.delete(tag);
      this.active.set(tag, now);
      this.record(tag, "added", source, now);

      if (!wasActive) {
        fresh.push(tag);
        const taskProfile = this.rules.get(tag)?.taskProfile;
        if (taskProfile) this.taskSelector?.setCurrent(taskProfile);
        log.debug(`Added tag: ${tag}`, { source });
      }
    }

    this.evictOverflow(true);
    await this.saveHistory();
    return fresh;
  }

  async remove(tags: string[], source: TagSource = "manual"): Promise<string[]> {
    const now = this.clock();
    const removed: string[] = [];
    for (const tag of tags) {
      if (!this.active.delete(tag)) continue;
      this.record(tag, "removed", source, now);
      removed.push(tag);
      log.debug(`Removed tag: ${tag}`, { source });
    }
    if (removed.length > 0) await this.saveHistory();
    return removed;
  }

  async clear(): Promise<string[]> {
    return this.remove([...this.active.keys()], "clear");
  }

  /** Drop tags whose TTL has run out. Run periodically. */
  async decay(): Promise<string[]> {
    const now = this.clock();
    const expired = [...this.active].filter(([, at]) => now - at >= this.ttlMs).map(([tag]) => tag);
    if (expired.length === 0) return [];
    const removed = await this.remove(expired, "decay");
    log.debug(`Decayed ${removed.length} old tags`);
    return removed;
  }

  private evictOverflow(recordHistory: boolean): void {
    while (this.active.size > this.maxActive) {
      let oldestTag: string | null = null;
      let oldestAt = Infinity;
      for (const [tag, at] of this.active) {
        if (at < oldestAt) {
          oldestAt = at;
          oldestTag = tag;
        }
      }
      if (oldestTag === null) return;
      this.active.delete(oldestTag);
      if (recordHistory) this.record(oldestTag, "removed", "evict", this.clock());
    }
  }

  private record(tag: string, action: TagAction, source: string, atMs: number): void {
    this.history.push({ tag, action, source, timestamp: atMs / 1000 });
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }

  private async saveHistory(): Promise<void> {
    try {
      await writeJson(path.join(this.dir, HISTORY_FILE), this.history);
    } catch (err) {
      log.error("Error saving tag history", err);
    }
  }

  // ============================================
  // QUERIES
  // ============================================

  private isActive(tag: string, now: number): boolean {
    const at = this.active.get(tag);
    return at !== undefined && now - at < this.ttlMs;
  }

  /** Tags whose last add is less than the TTL before `now` */
  getActiveTags(now: number = this.clock()): string[] {
    return [...this.active.keys()].filter(tag => this.isActive(tag, now));
  }

  getContext(now: number = this.clock()): string {
    const tags = this.getActiveTags(now);
    if (tags.length === 0) return "";
    return [
      "Current context tags:",
      ...tags.map(tag => {
        const rule = this.rules.get(tag);
        return rule ? `- ${tag}: ${rule.description}` : `- ${tag}`;
      }),
    ].join("\n");
  }

  /** Task profile with the highest summed weight across active tags */
  getRecommendedTask(now: number = this.clock()): string | null {
    const scores = new Map<string, number>();
    for (const tag of this.getActiveTags(now)) {
      const rule = this.rules.get(tag);
      if (!rule?.taskProfile) continue;
      scores.set(rule.taskProfile, (scores.get(rule.taskProfile) ?? 0) + rule.weight);
    }

    let best: string | null = null;
    let bestScore = -Infinity;
    for (const [task, score] of scores) {
      if (score > bestScore) {
        best = task;
        bestScore = score;
      }
    }
    return best;
  }

  getHistory(): TagHistoryEntry[] {
    return this.history.map(entry => ({ ...entry }));
  }

  ruleNames(): string[] {
    return [...this.rules.keys()];
  }

  setAutomaticTagging(enabled: boolean): void {
    this.automatic = enabled;
  }

  stats(): TagStats {
    return {
      activeTags: this.getActiveTags().length,
      totalRules: this.rules.size,
      historyEntries: this.history.length,
      automaticTagging: this.automatic,
      decayTimeHours: this.ttlMs / 3_600_000,
    };
  }
}
