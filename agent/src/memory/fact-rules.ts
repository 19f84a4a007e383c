/**
 * Fact Rules
 *
 * Pattern table that turns a user message into zero or more MemoryFacts.
 * Patterns run against the lowercased message; every match yields one
 * candidate.
 */

import type { FactKind } from "./types.js";

export interface FactRule {
  pattern: RegExp;
  kind: FactKind;
  importance: (match: RegExpMatchArray) => number;
  template: (match: RegExpMatchArray) => string;
}

export interface ExtractedFact {
  kind: FactKind;
  text: string;
  importance: number;
}

export const FACT_CONFIDENCE = 0.8;

const POSITIVE_VERBS = new Set(["love", "like", "enjoy"]);

function group(match: RegExpMatchArray, index: number): string {
  return (match[index] ?? "").trim();
}

function fixed(value: number): () => number {
  return () => value;
}

export const DEFAULT_FACT_RULES: readonly FactRule[] = [
  {
    pattern: /\bi (love|like|enjoy|prefer|hate|dislike) (.+)/g,
    kind: "preference",
    importance: m => (POSITIVE_VERBS.has(group(m, 1)) ? 0.8 : 0.6),
    template: m => `User ${group(m, 1)} ${group(m, 2)}`,
  },
  {
    pattern: /\bmy favorite (.+) is (.+)/g,
    kind: "preference",
    importance: fixed(0.8),
    template: m => `User favorite ${group(m, 1)} is ${group(m, 2)}`,
  },
  {
    pattern: /\bi'm (into|interested in) (.+)/g,
    kind: "preference",
    importance: fixed(0.8),
    template: m => `User is into ${group(m, 2)}`,
  },
  ...[/\bi am (.+)/g, /\bi work (.+)/g, /\bi live (.+)/g, /\bmy name is (.+)/g].map((pattern): FactRule => ({
    pattern,
    kind: "fact",
    importance: fixed(0.9),
    template: m => `User is/has ${group(m, 1)}`,
  })),
];

/**
 * Apply the rule table. Candidates with an empty capture are skipped;
 * duplicates within one message collapse to the first.
 */
export function extractFacts(message: string, rules: readonly FactRule[] = DEFAULT_FACT_RULES): ExtractedFact[] {
  const lower = message.toLowerCase();
  const seen = new Set<string>();
  const facts: ExtractedFact[] = [];

  for (const rule of rules) {
    for (const match of lower.matchAll(rule.pattern)) {
      const text = rule.template(match);
      if (seen.has(text) || match.slice(1).some(g => g === undefined || g.trim() === "")) {
        continue;
      }
      seen.add(text);
      facts.push({ kind: rule.kind, text, importance: rule.importance(match) });
    }
  }

  return facts;
}
