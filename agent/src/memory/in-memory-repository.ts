/**
 * In-Memory Repository
 *
 * Process-lifetime fallback used after a storage failure. Nothing here
 * survives a restart.
 */

import type { EmbeddingVector } from "../embedding/types.js";
import { lastUsed, type MemoryRepository } from "./repository.js";
import type { ConversationTurn, MemoryFact, NewFact, NewTurn, UserProfile } from "./types.js";

export class InMemoryRepository implements MemoryRepository {
  readonly kind = "memory";
  private turns: ConversationTurn[] = [];
  private facts: MemoryFact[] = [];
  private profiles = new Map<string, UserProfile>();
  private meta = new Map<string, string>();
  private nextTurnId: number;
  private nextFactId = 1;

  /**
   * @param lastTurnId highest id already handed out, so ids keep increasing
   * @param seed turns to carry over (e.g. the search window)
   */
  constructor(lastTurnId = 0, seed: ConversationTurn[] = []) {
    this.nextTurnId = lastTurnId + 1;
    this.turns = [...seed].sort((a, b) => a.id - b.id);
  }

  appendTurn(turn: NewTurn): number {
    const id = this.nextTurnId++;
    this.turns.push({ ...turn, id });
    return id;
  }

  appendTurns(turns: NewTurn[]): number[] {
    return turns.map(turn => this.appendTurn(turn));
  }

  turnsAfter(afterId: number, limit?: number): ConversationTurn[] {
    const after = this.turns.filter(t => t.id > afterId);
    return limit === undefined ? after : after.slice(0, limit);
  }

  recentTurns(count: number): ConversationTurn[] {
    return count <= 0 ? [] : this.turns.slice(-count);
  }

  countTurns(): number {
    return this.turns.length;
  }

  countTurnsSince(iso: string): number {
    return this.turns.filter(t => t.timestamp >= iso).length;
  }

  maxTurnId(): number {
    return this.nextTurnId - 1;
  }

  setTurnEmbedding(id: number, embedding: EmbeddingVector, model: string): void {
    const turn = this.turns.find(t => t.id === id);
    if (turn) {
      turn.embedding = embedding;
      turn.embeddingModel = model;
    }
  }

  insertFact(fact: NewFact): MemoryFact | null {
    if (this.facts.some(f => f.userId === fact.userId && f.text === fact.text)) return null;
    const stored: MemoryFact = { ...fact, id: this.nextFactId++, accessCount: 0 };
    this.facts.push(stored);
    return { ...stored };
  }

  topFacts(userId: string, limit: number): MemoryFact[] {
    return this.facts
      .filter(f => f.userId === userId)
      .sort((a, b) => b.importance - a.importance || a.id - b.id)
      .slice(0, limit)
      .map(f => ({ ...f }));
  }

  touchFacts(ids: number[], at: string): void {
    for (const fact of this.facts) {
      if (ids.includes(fact.id)) {
        fact.accessCount += 1;
        fact.lastAccessed = at;
      }
    }
  }

  setFactEmbedding(id: number, embedding: EmbeddingVector, model: string): void {
    const fact = this.facts.find(f => f.id === id);
    if (fact) {
      fact.embedding = embedding;
      fact.embeddingModel = model;
    }
  }

  countFacts(userId?: string): number {
    return userId === undefined ? this.facts.length : this.facts.filter(f => f.userId === userId).length;
  }

  evictFacts(userId: string, max: number): number {
    const owned = this.facts.filter(f => f.userId === userId);
    const excess = owned.length - max;
    if (excess <= 0) return 0;

    const victims = new Set(
      [...owned]
        .sort((a, b) => lastUsed(a).localeCompare(lastUsed(b)) || a.id - b.id)
        .slice(0, excess)
        .map(f => f.id),
    );
    this.facts = this.facts.filter(f => !victims.has(f.id));
    return victims.size;
  }

  getProfile(userId: string): UserProfile | null {
    const profile = this.profiles.get(userId);
    return profile ? structuredClone(profile) : null;
  }

  saveProfile(profile: UserProfile): void {
    this.profiles.set(profile.userId, structuredClone(profile));
  }

  getMeta(key: string): string | null {
    return this.meta.get(key) ?? null;
  }

  setMeta(key: string, value: string): void {
    this.meta.set(key, value);
  }
}
