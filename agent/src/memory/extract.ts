/**
 * Turn Context Extraction
 *
 * Keyword heuristics run on every stored turn: topics feed the user
 * profile and tag controller, sentiment is kept on the turn.
 */

import type { Sentiment, TurnContext } from "./types.js";

export const TOPIC_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  technology: ["tech", "computer", "ai", "programming", "code", "software"],
  gaming: ["game", "play", "gaming", "stream", "twitch"],
  music: ["music", "song", "sing", "dance", "melody"],
  art: ["art", "draw", "paint", "creative", "design"],
  personal: ["feel", "think", "like", "love", "hate", "prefer"],
};

const POSITIVE_WORDS = ["good", "great", "awesome", "love", "like", "happy", "amazing"];
const NEGATIVE_WORDS = ["bad", "hate", "sad", "angry", "terrible", "awful", "frustrated"];

/** Substring matching, so "playing" counts for gaming */
export function extractTopics(text: string): string[] {
  const lower = text.toLowerCase();
  return Object.entries(TOPIC_KEYWORDS)
    .filter(([, keywords]) => keywords.some(keyword => lower.includes(keyword)))
    .map(([topic]) => topic);
}

export function extractSentiment(text: string): Sentiment {
  const lower = text.toLowerCase();
  const positive = POSITIVE_WORDS.filter(word => lower.includes(word)).length;
  const negative = NEGATIVE_WORDS.filter(word => lower.includes(word)).length;
  if (positive > negative) return "positive";
  if (negative > positive) return "negative";
  return "neutral";
}

export function extractContext(userText: string): TurnContext {
  return {
    topics: extractTopics(userText),
    sentiment: extractSentiment(userText),
  };
}
