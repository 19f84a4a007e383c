/**
 * Memory Types
 *
 * Shapes owned by the memory store: the append-only conversation log,
 * extracted facts and per-user profiles.
 */

import type { EmbeddingVector } from "../embedding/types.js";

export type Sentiment = "positive" | "negative" | "neutral";

export interface TurnContext {
  topics: string[];
  sentiment: Sentiment;
}

export interface ConversationTurn {
  /** Monotonic, never reused */
  id: number;
  userId: string;
  userText: string;
  aiText: string;
  /** ISO 8601 */
  timestamp: string;
  platform: string;
  sessionId?: string;
  embedding?: EmbeddingVector;
  embeddingModel?: string;
  context: TurnContext;
}

export type NewTurn = Omit<ConversationTurn, "id">;

export type FactKind = "fact" | "preference";

export interface MemoryFact {
  id: number;
  userId: string;
  kind: FactKind;
  text: string;
  importance: number;
  confidence: number;
  accessCount: number;
  lastAccessed?: string;
  turnId?: number;
  createdAt: string;
  embedding?: EmbeddingVector;
  embeddingModel?: string;
}

export type NewFact = Omit<MemoryFact, "id" | "accessCount" | "lastAccessed">;

export interface UserProfile {
  userId: string;
  preferences: {
    topics: Record<string, number>;
  };
  interactionHistory: {
    lastInteraction?: string;
    totalInteractions: number;
  };
}

export interface SimilarTurn {
  turn: ConversationTurn;
  similarity: number;
}

export interface RelevantMemory {
  fact: MemoryFact;
  similarity: number;
  /** 0.7 * similarity + 0.3 * importance */
  score: number;
}

export type StoreMode = "persistent" | "memory-only";

export interface MemoryStats {
  totalTurns: number;
  recentTurns: number;
  totalMemories: number;
  mode: StoreMode;
  embeddingModel: string;
  windowSize: number;
}
