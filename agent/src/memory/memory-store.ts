/**
 * Memory Store
 *
 * Retrieval layer over the conversation log. Every completed exchange is
 * appended under a monotonic id, embedded, mined for facts and folded into
 * the user's profile. Reads scan a bounded window of recent turns and the
 * user's most important facts.
 *
 * Storage failures never reach callers: the store logs them and carries on
 * in memory-only mode, keeping the id sequence.
 */

import * as path from "path";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../core/errors.js";
import { fileExists, readJson } from "../core/json-store.js";
import type { Embedder, EmbeddingVector } from "../embedding/types.js";
import { extractContext } from "./extract.js";
import { DEFAULT_FACT_RULES, FACT_CONFIDENCE, extractFacts, type FactRule } from "./fact-rules.js";
import { InMemoryRepository } from "./in-memory-repository.js";
import { emptyProfile, type MemoryRepository } from "./repository.js";
import type {
  ConversationTurn,
  MemoryFact,
  MemoryStats,
  NewTurn,
  RelevantMemory,
  SimilarTurn,
  StoreMode,
  UserProfile,
} from "./types.js";

const log = createComponentLogger("memory");

/** Hard cap on turns scanned by similarity search */
export const SEARCH_WINDOW = 100;
/** Facts considered per retrieval, by importance */
export const FACT_CANDIDATES = 50;
export const MAX_FACTS_PER_USER = 500;
/** Log size at which an unfitted embedder is fitted */
export const WARMUP_TURNS = 10;
/** Turns used to fit the embedder at startup */
const FIT_CORPUS_TURNS = 1000;
const RECENT_DAYS = 7;
const LEGACY_MARKER_PREFIX = "legacy_import:";

export interface MemoryStoreOptions {
  embedder: Embedder;
  repository: MemoryRepository;
  similarityThreshold?: number;
  contextBudgetChars?: number;
  factRules?: readonly FactRule[];
  now?: () => Date;
}

export class MemoryStore {
  private repo: MemoryRepository;
  private readonly embedder: Embedder;
  private readonly threshold: number;
  private readonly budget: number;
  private readonly factRules: readonly FactRule[];
  private readonly now: () => Date;

  /** Most recent turns, ascending by id, at most SEARCH_WINDOW */
  private window: ConversationTurn[] = [];
  /** Highest id read by initialize/syncFromLog */
  private syncMark = 0;
  private lastTurnId = 0;
  private factCache = new Map<string, MemoryFact[]>();

  constructor(options: MemoryStoreOptions) {
    this.repo = options.repository;
    this.embedder = options.embedder;
    this.threshold = options.similarityThreshold ?? 0.3;
    this.budget = options.contextBudgetChars ?? 8000;
    this.factRules = options.factRules ?? DEFAULT_FACT_RULES;
    this.now = options.now ?? (() => new Date());
  }

  get mode(): StoreMode {
    return this.repo.kind === "sqlite" ? "persistent" : "memory-only";
  }

  get embeddingModel(): string {
    return this.embedder.modelId;
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  /**
   * Fit the embedder on the log (when it needs fitting), load the search
   * window and bring its vectors up to the current model.
   */
  initialize(): void {
    if (!this.embedder.ready) this.fitFromLog();

    this.window = this.guarded("load window", repo => repo.recentTurns(SEARCH_WINDOW), []);
    this.lastTurnId = this.guarded("read max id", repo => repo.maxTurnId(), 0);
    this.syncMark = this.lastTurnId;
    this.reembedWindow();

    log.info("Memory store ready", {
      mode: this.mode,
      window: this.window.length,
      model: this.embedder.modelId,
    });
  }

  // ============================================
  // WRITES
  // ============================================

  storeTurn(userId: string, userText: string, aiText: string, platform = "local", sessionId?: string): number {
    const now = this.now();
    const context = extractContext(userText);
    const embedding = this.safeEmbed(`${userText} ${aiText}`);

    const turn: NewTurn = {
      userId,
      userText,
      aiText,
      timestamp: now.toISOString(),
      platform,
      sessionId,
      embedding,
      embeddingModel: embedding ? this.embedder.modelId : undefined,
      context,
    };

    const id = this.guarded("append turn", repo => repo.appendTurn(turn), 0);
    if (id === 0) return 0;

    this.lastTurnId = Math.max(this.lastTurnId, id);
    this.addToWindow({ ...turn, id });
    this.storeFacts(userId, userText, id, now);
    this.updateUserProfile(userId, { topics: context.topics });
    this.maybeWarmUp();

    log.debug("Turn stored", { id, topics: context.topics, embedded: embedding !== undefined });
    return id;
  }

  updateUserProfile(userId: string, interaction: { topics: string[] }): void {
    this.guarded("update profile", repo => {
      const profile = repo.getProfile(userId) ?? emptyProfile(userId);
      for (const topic of interaction.topics) {
        profile.preferences.topics[topic] = (profile.preferences.topics[topic] ?? 0) + 1;
      }
      profile.interactionHistory.lastInteraction = this.now().toISOString();
      profile.interactionHistory.totalInteractions += 1;
      repo.saveProfile(profile);
    }, undefined);
  }

  private storeFacts(userId: string, userText: string, turnId: number, now: Date): void {
    const extracted = extractFacts(userText, this.factRules);
    if (extracted.length === 0) return;

    let inserted = 0;
    for (const candidate of extracted) {
      const embedding = this.safeEmbed(candidate.text);
      const stored = this.guarded("insert fact", repo => repo.insertFact({
        userId,
        kind: candidate.kind,
        text: candidate.text,
        importance: candidate.importance,
        confidence: FACT_CONFIDENCE,
        turnId,
        createdAt: now.toISOString(),
        embedding,
        embeddingModel: embedding ? this.embedder.modelId : undefined,
      }), null);
      if (stored) inserted++;
    }

    if (inserted === 0) return;
    this.factCache.delete(userId);

    const evicted = this.guarded("evict facts", repo => repo.evictFacts(userId, MAX_FACTS_PER_USER), 0);
    log.debug("Facts extracted", { userId, inserted, evicted });
  }

  // ============================================
  // READS
  // ============================================

  searchSimilarTurns(query: string, userId?: string, k = 5): SimilarTurn[] {
    const queryVector = this.safeEmbed(query);
    if (!queryVector) return [];

    const model = this.embedder.modelId;
    const results: SimilarTurn[] = [];
    for (const turn of this.window) {
      if (!turn.embedding || turn.embeddingModel !== model) continue;
      if (userId !== undefined && turn.userId !== userId) continue;
      const similarity = this.embedder.similarity(queryVector, turn.embedding);
      if (similarity > this.threshold) results.push({ turn, similarity });
    }

    return results
      .sort((a, b) => b.similarity - a.similarity || b.turn.id - a.turn.id)
      .slice(0, k);
  }

  getRelevantMemories(query: string, userId: string, k = 5): RelevantMemory[] {
    const queryVector = this.safeEmbed(query);
    if (!queryVector) return [];

    const results: RelevantMemory[] = [];
    for (const fact of this.factsFor(userId)) {
      const vector = this.factVector(fact);
      if (!vector) continue;
      const similarity = this.embedder.similarity(queryVector, vector);
      if (similarity > this.threshold) {
        results.push({ fact, similarity, score: 0.7 * similarity + 0.3 * fact.importance });
      }
    }

    const top = results
      .sort((a, b) => b.score - a.score || b.fact.id - a.fact.id)
      .slice(0, k);

    if (top.length > 0) {
      const at = this.now().toISOString();
      this.guarded("touch facts", repo => repo.touchFacts(top.map(r => r.fact.id), at), undefined);
      for (const { fact } of top) {
        fact.accessCount += 1;
        fact.lastAccessed = at;
      }
    }

    return top;
  }

  /**
   * Personalization block for the prompt. Empty when no memory, similar
   * turn or preference qualifies.
   */
  buildContext(query: string, userId: string): string {
    const parts: string[] = [];

    const memories = this.getRelevantMemories(query, userId, 3);
    if (memories.length > 0) {
      parts.push(
        "Relevant memories about this user:\n" +
          memories.map(m => `- ${m.fact.text} (confidence: ${m.fact.confidence.toFixed(1)})\n`).join(""),
      );
    }

    const similar = this.searchSimilarTurns(query, userId, 2);
    if (similar.length > 0) {
      parts.push(
        "Similar past conversations:\n" +
          similar
            .map(s => `- User: ${s.turn.userText.slice(0, 100)}...\n  Response: ${s.turn.aiText.slice(0, 100)}...\n`)
            .join(""),
      );
    }

    const profile = this.getUserProfile(userId);
    if (Object.keys(profile.preferences.topics).length > 0) {
      parts.push(`User preferences: ${JSON.stringify(profile.preferences)}\n`);
    }

    if (parts.length === 0) return "";

    const full = "CONTEXT FOR PERSONALIZED RESPONSE:\n" + parts.join("\n") + "\n";
    return full.length > this.budget ? full.slice(0, this.budget) + "...\n" : full;
  }

  getUserProfile(userId: string): UserProfile {
    return this.guarded("read profile", repo => repo.getProfile(userId), null) ?? emptyProfile(userId);
  }

  /** Most recent turns from the window, ascending */
  getRecentTurns(count: number): ConversationTurn[] {
    return count <= 0 ? [] : this.window.slice(-count);
  }

  /** Turns with id above `afterId`, ascending; used by background analyzers */
  turnsAfter(afterId: number, limit?: number): ConversationTurn[] {
    return this.guarded("read turns", repo => repo.turnsAfter(afterId, limit), []);
  }

  /** The log as [user, ai] pairs in id order; `limit` keeps the newest */
  readPairs(limit?: number): Array<[string, string]> {
    const turns = this.guarded(
      "read pairs",
      repo => (limit === undefined ? repo.turnsAfter(0) : repo.recentTurns(limit)),
      [],
    );
    return turns.map(t => [t.userText, t.aiText]);
  }

  /** Fact count is scoped to `userId` when given */
  getStats(userId?: string): MemoryStats {
    const since = new Date(this.now().getTime() - RECENT_DAYS * 24 * 60 * 60 * 1000).toISOString();
    return {
      totalTurns: this.guarded("count turns", repo => repo.countTurns(), 0),
      recentTurns: this.guarded("count recent turns", repo => repo.countTurnsSince(since), 0),
      totalMemories: this.guarded("count facts", repo => repo.countFacts(userId), 0),
      mode: this.mode,
      embeddingModel: this.embedder.modelId,
      windowSize: this.window.length,
    };
  }

  // ============================================
  // BACKGROUND SYNC / IMPORT
  // ============================================

  /**
   * Pull turns appended since the last sync into the search window,
   * embedding any that lack a current vector. Returns the number read.
   */
  syncFromLog(): number {
    const fresh = this.guarded("sync", repo => repo.turnsAfter(this.syncMark), []);
    if (fresh.length === 0) return 0;

    this.syncMark = fresh[fresh.length - 1].id;
    this.lastTurnId = Math.max(this.lastTurnId, this.syncMark);

    const known = new Set(this.window.map(t => t.id));
    let added = 0;
    for (const turn of fresh.slice(-SEARCH_WINDOW)) {
      if (known.has(turn.id)) continue;
      this.ensureTurnVector(turn);
      this.addToWindow(turn);
      added++;
    }

    log.info("Synced from log", { read: fresh.length, added, mark: this.syncMark });
    return fresh.length;
  }

  /**
   * Import a legacy JSON log (`[[user, ai], ...]`). Runs once per file;
   * later calls return 0.
   */
  async importLegacyLog(filePath: string, userId: string): Promise<number> {
    const marker = LEGACY_MARKER_PREFIX + path.resolve(filePath);
    if (this.guarded("read marker", repo => repo.getMeta(marker), null) !== null) {
      log.debug("Legacy log already imported", { filePath });
      return 0;
    }
    if (!(await fileExists(filePath))) return 0;

    let raw: unknown;
    try {
      raw = await readJson(filePath);
    } catch (err) {
      log.warn("Legacy log unreadable", { filePath, error: errorMessage(err) });
      return 0;
    }
    if (!Array.isArray(raw)) {
      log.warn("Legacy log is not an array", { filePath });
      return 0;
    }

    const timestamp = this.now().toISOString();
    const turns: NewTurn[] = [];
    for (const entry of raw) {
      if (!Array.isArray(entry)) continue;
      const userText: unknown = entry[0];
      const aiText: unknown = entry[1];
      if (typeof userText !== "string" || typeof aiText !== "string") continue;
      turns.push({ userId, userText, aiText, timestamp, platform: "legacy", context: extractContext(userText) });
    }

    const ids = this.guarded("import legacy", repo => repo.appendTurns(turns), []);
    this.guarded("write marker", repo => repo.setMeta(marker, JSON.stringify({ count: ids.length, at: timestamp })), undefined);

    log.info("Legacy log imported", { filePath, imported: ids.length, skipped: raw.length - turns.length });
    return ids.length;
  }

  // ============================================
  // EMBEDDING UPKEEP
  // ============================================

  private safeEmbed(text: string): EmbeddingVector | undefined {
    if (!this.embedder.ready) return undefined;
    try {
      return this.embedder.embed(text);
    } catch (err) {
      log.warn("Embedding failed", { error: errorMessage(err) });
      return undefined;
    }
  }

  private fitFromLog(): void {
    const corpus = this.guarded("read corpus", repo => repo.recentTurns(FIT_CORPUS_TURNS), [])
      .map(t => `${t.userText} ${t.aiText}`);
    this.embedder.fit(corpus);
  }

  private maybeWarmUp(): void {
    if (this.embedder.ready) return;
    if (this.guarded("count turns", repo => repo.countTurns(), 0) < WARMUP_TURNS) return;

    this.fitFromLog();
    if (!this.embedder.ready) return;
    this.factCache.clear();
    this.reembedWindow();
  }

  private reembedWindow(): void {
    let updated = 0;
    for (const turn of this.window) {
      if (this.ensureTurnVector(turn)) updated++;
    }
    if (updated > 0) log.info("Re-embedded window", { updated, model: this.embedder.modelId });
  }

  /** Returns true when the turn got a new vector */
  private ensureTurnVector(turn: ConversationTurn): boolean {
    if (turn.embedding && turn.embeddingModel === this.embedder.modelId) return false;
    const vector = this.safeEmbed(`${turn.userText} ${turn.aiText}`);
    if (!vector) return false;

    turn.embedding = vector;
    turn.embeddingModel = this.embedder.modelId;
    this.guarded("persist turn vector", repo => repo.setTurnEmbedding(turn.id, vector, this.embedder.modelId), undefined);
    return true;
  }

  private factVector(fact: MemoryFact): EmbeddingVector | undefined {
    if (fact.embedding && fact.embeddingModel === this.embedder.modelId) return fact.embedding;
    const vector = this.safeEmbed(fact.text);
    if (!vector) return undefined;

    fact.embedding = vector;
    fact.embeddingModel = this.embedder.modelId;
    this.guarded("persist fact vector", repo => repo.setFactEmbedding(fact.id, vector, this.embedder.modelId), undefined);
    return vector;
  }

  private factsFor(userId: string): MemoryFact[] {
    const cached = this.factCache.get(userId);
    if (cached) return cached;
    const facts = this.guarded("read facts", repo => repo.topFacts(userId, FACT_CANDIDATES), []);
    this.factCache.set(userId, facts);
    return facts;
  }

  private addToWindow(turn: ConversationTurn): void {
    const last = this.window[this.window.length - 1];
    this.window.push(turn);
    if (last && last.id > turn.id) this.window.sort((a, b) => a.id - b.id);
    if (this.window.length > SEARCH_WINDOW) this.window.splice(0, this.window.length - SEARCH_WINDOW);
  }

  // ============================================
  // FAILURE HANDLING
  // ============================================

  /**
   * Run a repository operation. The first failure of the persistent
   * backend switches the store to memory-only mode and retries there.
   */
  private guarded<T>(operation: string, fn: (repo: MemoryRepository) => T, fallback: T): T {
    try {
      return fn(this.repo);
    } catch (err) {
      if (this.repo.kind === "memory") {
        log.error(`Memory operation failed: ${operation}`, err);
        return fallback;
      }
      log.error(`Storage failed during ${operation}; switching to memory-only mode`, err);
      this.repo = new InMemoryRepository(this.lastTurnId, this.window);
      this.factCache.clear();
    }

    try {
      return fn(this.repo);
    } catch (err) {
      log.error(`Memory operation failed: ${operation}`, err);
      return fallback;
    }
  }
}
