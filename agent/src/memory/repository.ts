/**
 * Memory Repository
 *
 * Storage seam under the memory store. The SQLite implementation is the
 * normal backend; the in-memory one takes over when SQLite fails and
 * continues the id sequence where it left off.
 */

import type { EmbeddingVector } from "../embedding/types.js";
import type { ConversationTurn, MemoryFact, NewFact, NewTurn, UserProfile } from "./types.js";

export interface MemoryRepository {
  readonly kind: "sqlite" | "memory";

  appendTurn(turn: NewTurn): number;
  /** Appends in one transaction; returns the assigned ids in order */
  appendTurns(turns: NewTurn[]): number[];
  /** Turns with id > afterId, ascending */
  turnsAfter(afterId: number, limit?: number): ConversationTurn[];
  /** The newest `count` turns, ascending */
  recentTurns(count: number): ConversationTurn[];
  countTurns(): number;
  countTurnsSince(iso: string): number;
  maxTurnId(): number;
  setTurnEmbedding(id: number, embedding: EmbeddingVector, model: string): void;

  /** Returns null when the same user already has a fact with this text */
  insertFact(fact: NewFact): MemoryFact | null;
  /** A user's facts by importance, highest first */
  topFacts(userId: string, limit: number): MemoryFact[];
  touchFacts(ids: number[], at: string): void;
  setFactEmbedding(id: number, embedding: EmbeddingVector, model: string): void;
  countFacts(userId?: string): number;
  /** Evict least recently used facts until the user has at most `max`; returns evicted count */
  evictFacts(userId: string, max: number): number;

  getProfile(userId: string): UserProfile | null;
  saveProfile(profile: UserProfile): void;

  getMeta(key: string): string | null;
  setMeta(key: string, value: string): void;
}

export function emptyProfile(userId: string): UserProfile {
  return {
    userId,
    preferences: { topics: {} },
    interactionHistory: { totalInteractions: 0 },
  };
}

/** Recency key for eviction: last access, else creation */
export function lastUsed(fact: MemoryFact): string {
  return fact.lastAccessed ?? fact.createdAt;
}
