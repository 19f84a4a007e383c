/**
 * Context Builder
 *
 * Gathers everything the LLM sees for one reply into an ordered bundle of
 * named sections and renders it under a character budget. No LLM calls.
 *
 * Section order is fixed: persona, task, tags, lore, memories, turns,
 * history. When the rendered text is over budget, sections are cut from
 * the tail, lowest priority first (turns, memories, history, lore, tags,
 * task, persona).
 */

import { createComponentLogger } from "../logging.js";
import type { LLMMessage } from "../llm/types.js";
import type { RelevantMemory, SimilarTurn } from "../memory/types.js";

const log = createComponentLogger("prompt");

// ============================================
// TYPES
// ============================================

export type SectionName = "persona" | "task" | "tags" | "lore" | "memories" | "turns" | "history";

export const SECTION_ORDER: readonly SectionName[] = [
  "persona", "task", "tags", "lore", "memories", "turns", "history",
];

/** First entry is cut first */
export const TRUNCATION_ORDER: readonly SectionName[] = [
  "turns", "memories", "history", "lore", "tags", "task", "persona",
];

export interface ContextSection {
  name: SectionName;
  text: string;
}

export interface ContextBundle {
  sections: ContextSection[];
  /** True when at least one section was cut to fit the budget */
  truncated: boolean;
}

export interface HistoryEntry {
  role: "user" | "assistant";
  content: string;
}

/** Literal history entries included (10 exchanges) */
export const HISTORY_ENTRIES = 20;
const SECTION_SEPARATOR = "\n\n";
const ELLIPSIS = "...";

/**
 * Where each section comes from. Only the persona is required; a source
 * left out contributes nothing (for example when retrieval is disabled).
 */
export interface ContextSources {
  persona: { prompt(): string };
  tasks?: { prompt(): string };
  tags?: { getContext(): string };
  lorebook?: { getContext(message: string): string };
  memory?: {
    getRelevantMemories(query: string, userId: string, k?: number): RelevantMemory[];
    searchSimilarTurns(query: string, userId?: string, k?: number): SimilarTurn[];
  };
  insights?: { getRelevant(context: string): string[] };
  /** Display name used for the AI side of the literal history */
  characterName?: () => string;
}

export interface ContextBuilderOptions {
  budgetChars?: number;
  memoryCount?: number;
  similarTurnCount?: number;
}

// ============================================
// SECTION RENDERERS
// ============================================

export function renderMemories(memories: RelevantMemory[], insights: string[] = []): string {
  const lines: string[] = [];
  if (memories.length > 0) {
    lines.push("Relevant memories about this user:");
    for (const m of memories) lines.push(`- ${m.fact.text} (confidence: ${m.fact.confidence.toFixed(1)})`);
  }
  if (insights.length > 0) {
    lines.push("Insights from past conversations:");
    for (const insight of insights) lines.push(`- ${insight}`);
  }
  return lines.join("\n");
}

export function renderSimilarTurns(turns: SimilarTurn[]): string {
  if (turns.length === 0) return "";
  return [
    "Similar past conversations:",
    ...turns.map(s => `- User: ${s.turn.userText.slice(0, 100)}...\n  Response: ${s.turn.aiText.slice(0, 100)}...`),
  ].join("\n");
}

export function renderHistory(history: readonly HistoryEntry[], characterName = "Assistant"): string {
  const recent = history.slice(-HISTORY_ENTRIES);
  if (recent.length === 0) return "";
  return [
    "Recent conversation:",
    ...recent.map(entry => `${entry.role === "user" ? "User" : characterName}: ${entry.content}`),
  ].join("\n");
}

// ============================================
// RENDER / FIT
// ============================================

export function render(bundle: ContextBundle): string {
  return bundle.sections
    .map(section => section.text)
    .filter(text => text.length > 0)
    .join(SECTION_SEPARATOR);
}

/**
 * Cut sections, lowest priority first, until the rendered bundle fits.
 * A section that cannot keep more than the ellipsis is emptied.
 */
export function fitToBudget(sections: ContextSection[], budget: number): ContextBundle {
  const bundle: ContextBundle = { sections: sections.map(s => ({ ...s })), truncated: false };

  for (const name of TRUNCATION_ORDER) {
    const overflow = render(bundle).length - budget;
    if (overflow <= 0) break;

    const section = bundle.sections.find(s => s.name === name);
    if (!section || section.text.length === 0) continue;

    bundle.truncated = true;
    const keep = section.text.length - overflow;
    section.text = keep > ELLIPSIS.length ? section.text.slice(0, keep - ELLIPSIS.length) + ELLIPSIS : "";
  }

  return bundle;
}

// ============================================
// BUILDER
// ============================================

export class ContextBuilder {
  private readonly budget: number;
  private readonly memoryCount: number;
  private readonly similarTurnCount: number;

  constructor(private readonly sources: ContextSources, options: ContextBuilderOptions = {}) {
    this.budget = options.budgetChars ?? 8000;
    this.memoryCount = options.memoryCount ?? 3;
    this.similarTurnCount = options.similarTurnCount ?? 2;
  }

  build(input: string, userId: string, history: readonly HistoryEntry[] = []): ContextBundle {
    const { sources } = this;
    const query = input.trim();

    const memories = query && sources.memory
      ? sources.memory.getRelevantMemories(query, userId, this.memoryCount)
      : [];
    const insights = query && sources.insights ? sources.insights.getRelevant(query) : [];
    const turns = query && sources.memory
      ? sources.memory.searchSimilarTurns(query, userId, this.similarTurnCount)
      : [];

    const texts: Record<SectionName, string> = {
      persona: sources.persona.prompt(),
      task: sources.tasks?.prompt() ?? "",
      tags: sources.tags?.getContext() ?? "",
      lore: query && sources.lorebook ? sources.lorebook.getContext(query) : "",
      memories: renderMemories(memories, insights),
      turns: renderSimilarTurns(turns),
      history: renderHistory(history, sources.characterName?.()),
    };

    const bundle = fitToBudget(
      SECTION_ORDER.map(name => ({ name, text: texts[name] })),
      this.budget,
    );
    if (bundle.truncated) {
      log.debug("Context truncated to fit budget", { budget: this.budget });
    }
    return bundle;
  }

  /** System prompt from the rendered bundle, followed by the user input */
  messages(input: string, userId: string, history: readonly HistoryEntry[] = []): LLMMessage[] {
    const system = render(this.build(input, userId, history));
    const messages: LLMMessage[] = [];
    if (system) messages.push({ role: "system", content: system });
    messages.push({ role: "user", content: input });
    return messages;
  }
}
