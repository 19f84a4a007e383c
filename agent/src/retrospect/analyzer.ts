/**
 * Retrospect Analyzer
 *
 * Idle-time pass over the conversation log. New turns since the last pass
 * yield an LLM-written summary and a few heuristic insights about the user;
 * both are kept in `Retrospect/` under the configuration directory and fed
 * back into prompts through getRelevant().
 */

import * as path from "path";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../core/errors.js";
import { fileExists, readJson, writeJson } from "../core/json-store.js";
import { isRecord, numberField, stringField } from "../core/validate.js";
import type { ILLMClient } from "../llm/types.js";
import type { ConversationTurn } from "../memory/types.js";
import type { PeriodicTaskDef } from "../periodic/manager.js";

const log = createComponentLogger("retrospect");

// ============================================
// CONSTANTS
// ============================================

const ANALYSIS_INTERVAL_MS = 60 * 60 * 1000;
const MIN_TURNS = 3;
const CONSIDERED_TURNS = 20;
const SUMMARIZED_TURNS = 10;
const MAX_INSIGHTS = 100;
const MAX_SUMMARIES = 30;
const MAX_RELEVANT = 3;

const TOPIC_KEYWORDS: Array<[string, string[]]> = [
  ["gaming", ["game", "gaming", "play"]],
  ["music", ["music", "song", "sing"]],
  ["help-seeking", ["help", "question", "how"]],
];

// ============================================
// TYPES
// ============================================

export type RetrospectKind = "insight" | "summary";

export interface RetrospectRecord {
  content: string;
  /** Epoch seconds */
  timestamp: number;
  /** ISO 8601 */
  date: string;
  type: RetrospectKind;
}

export interface RetrospectStats {
  enabled: boolean;
  totalInsights: number;
  totalSummaries: number;
  /** Epoch ms of the last completed analysis, 0 if none */
  lastAnalysis: number;
  nextAnalysis: number;
  lastTurnId: number;
}

/** The slice of the memory store the analyzer reads */
export interface TurnLog {
  turnsAfter(afterId: number, limit?: number): ConversationTurn[];
}

export interface RetrospectOptions {
  dir: string;
  client: ILLMClient;
  turns: TurnLog;
  enabled?: boolean;
  clock?: () => number;
}

// ============================================
// HEURISTICS
// ============================================

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/** Pattern-based observations about the user over a batch of turns */
export function extractInsights(turns: Array<Pick<ConversationTurn, "userText" | "aiText">>): string[] {
  const insights: string[] = [];
  if (turns.length === 0) return insights;

  const topics = new Set<string>();
  let questions = 0;
  let totalWords = 0;

  for (const turn of turns) {
    const userText = turn.userText.toLowerCase();
    for (const [topic, keywords] of TOPIC_KEYWORDS) {
      if (keywords.some(keyword => userText.includes(keyword))) topics.add(topic);
    }
    if (userText.includes("?")) questions++;
    totalWords += wordCount(userText) + wordCount(turn.aiText);
  }

  if (topics.size > 0) {
    insights.push(`User shows interest in: ${[...topics].join(", ")}`);
  }
  if (questions > turns.length * 0.3) {
    insights.push("User frequently asks questions - enjoys learning and exploring topics");
  }
  const averageWords = totalWords / turns.length;
  if (averageWords > 50) {
    insights.push("User engages in detailed, lengthy conversations");
  } else if (averageWords < 20) {
    insights.push("User prefers brief, concise interactions");
  }

  return insights;
}

export function summaryPrompt(turns: Array<Pick<ConversationTurn, "userText" | "aiText">>): string {
  const transcript = turns.map(t => `User: ${t.userText}\nAI: ${t.aiText}`).join("\n\n");
  return [
    "Please provide a brief summary of these recent conversations, focusing on:",
    "1. Main topics discussed",
    "2. User's interests and preferences",
    "3. Any recurring themes",
    "4. Notable moments or interactions",
    "",
    "Conversations:",
    transcript,
    "",
    "Provide a concise summary in 2-3 sentences.",
  ].join("\n");
}

function parseRecords(raw: unknown, type: RetrospectKind): RetrospectRecord[] {
  if (!Array.isArray(raw)) return [];
  const records: RetrospectRecord[] = [];
  for (const item of raw) {
    if (!isRecord(item)) continue;
    const content = stringField(item, "content");
    if (!content) continue;
    records.push({
      content,
      timestamp: numberField(item, "timestamp", 0),
      date: stringField(item, "date"),
      type,
    });
  }
  return records;
}

function toFileForm(record: RetrospectRecord): Record<string, unknown> {
  return { content: record.content, timestamp: record.timestamp, date: record.date, type: record.type };
}

// ============================================
// ANALYZER
// ============================================

export class RetrospectAnalyzer {
  private insights: RetrospectRecord[] = [];
  private summaries: RetrospectRecord[] = [];
  private lastTurnId = 0;
  private lastAnalysis = 0;
  private enabled: boolean;
  private readonly clock: () => number;

  constructor(private readonly options: RetrospectOptions) {
    this.enabled = options.enabled ?? true;
    this.clock = options.clock ?? (() => Date.now());
  }

  private file(name: string): string {
    return path.join(this.options.dir, name);
  }

  async load(): Promise<void> {
    this.insights = parseRecords(await this.readOptional("insights.json"), "insight");
    this.summaries = parseRecords(await this.readOptional("summaries.json"), "summary");
    const state = await this.readOptional("state.json");
    if (isRecord(state)) {
      this.lastTurnId = numberField(state, "last_turn_id", 0);
      this.lastAnalysis = numberField(state, "last_analysis", 0);
    }
    log.info(`Loaded ${this.insights.length} insights and ${this.summaries.length} summaries`);
  }

  private async readOptional(name: string): Promise<unknown> {
    const filePath = this.file(name);
    if (!(await fileExists(filePath))) return null;
    try {
      return await readJson(filePath);
    } catch (err) {
      log.warn(`Ignoring unreadable ${name}`, { error: errorMessage(err) });
      return null;
    }
  }

  private async save(): Promise<void> {
    try {
      await writeJson(this.file("insights.json"), this.insights.map(toFileForm));
      await writeJson(this.file("summaries.json"), this.summaries.map(toFileForm));
      await writeJson(this.file("state.json"), { last_turn_id: this.lastTurnId, last_analysis: this.lastAnalysis });
    } catch (err) {
      log.error("Error saving retrospect data", err);
    }
  }

  /**
   * Analyze turns logged since the previous pass. Returns false when there
   * were too few new turns to say anything.
   */
  async analyze(): Promise<boolean> {
    const fresh = this.options.turns.turnsAfter(this.lastTurnId);
    if (fresh.length < MIN_TURNS) {
      log.debug(`Not enough new turns for analysis (${fresh.length})`);
      return false;
    }

    const considered = fresh.slice(-CONSIDERED_TURNS);
    const summary = await this.summarize(considered.slice(-SUMMARIZED_TURNS));
    if (summary) this.push("summary", summary);
    for (const insight of extractInsights(considered)) this.push("insight", insight);

    this.lastTurnId = fresh[fresh.length - 1].id;
    this.lastAnalysis = this.clock();
    await this.save();

    log.info(`Analyzed ${considered.length} recent turns`, { lastTurnId: this.lastTurnId });
    return true;
  }

  /** Runs even when disabled; false when the pass failed */
  async forceAnalysis(): Promise<boolean> {
    try {
      await this.analyze();
      return true;
    } catch (err) {
      log.error("Forced analysis failed", err);
      return false;
    }
  }

  private async summarize(turns: ConversationTurn[]): Promise<string | null> {
    try {
      const response = await this.options.client.chat([{ role: "user", content: summaryPrompt(turns) }]);
      return response.content.trim() || null;
    } catch (err) {
      log.warn("Summary generation failed", { error: errorMessage(err) });
      return null;
    }
  }

  private push(type: RetrospectKind, content: string): void {
    const now = this.clock();
    const record: RetrospectRecord = {
      content,
      timestamp: Math.floor(now / 1000),
      date: new Date(now).toISOString(),
      type,
    };
    if (type === "insight") {
      this.insights = [...this.insights, record].slice(-MAX_INSIGHTS);
    } else {
      this.summaries = [...this.summaries, record].slice(-MAX_SUMMARIES);
    }
  }

  /**
   * Recent insights (then summaries) sharing a word longer than three
   * characters with the context; at most three.
   */
  getRelevant(context: string): string[] {
    if (!this.enabled) return [];
    const words = context.toLowerCase().split(/\s+/).filter(word => word.length > 3);
    if (words.length === 0) return [];

    const candidates = [...this.insights.slice(-20), ...this.summaries.slice(-5)];
    return candidates
      .filter(record => {
        const content = record.content.toLowerCase();
        return words.some(word => content.includes(word));
      })
      .slice(0, MAX_RELEVANT)
      .map(record => record.content);
  }

  getInsights(): RetrospectRecord[] {
    return [...this.insights];
  }

  getSummaries(): RetrospectRecord[] {
    return [...this.summaries];
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  getStats(): RetrospectStats {
    return {
      enabled: this.enabled,
      totalInsights: this.insights.length,
      totalSummaries: this.summaries.length,
      lastAnalysis: this.lastAnalysis,
      nextAnalysis: this.lastAnalysis + ANALYSIS_INTERVAL_MS,
      lastTurnId: this.lastTurnId,
    };
  }

  getPeriodicTaskDef(): PeriodicTaskDef {
    return {
      id: "retrospect",
      name: "Retrospect",
      intervalMs: ANALYSIS_INTERVAL_MS,
      initialDelayMs: 0,
      enabled: this.enabled,
      canRun: () => this.enabled,
      run: async () => {
        await this.analyze();
      },
    };
  }
}
