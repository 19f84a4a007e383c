/**
 * SQLite Repository
 *
 * Durable backend for the memory store. Vectors and JSON blobs are stored
 * as TEXT and validated on the way out; a malformed column reads as
 * "no data".
 */

import type { CompanionDatabase } from "../db/index.js";
import { isRecord, numberField, stringArrayField, stringField } from "../core/validate.js";
import type { EmbeddingVector } from "../embedding/types.js";
import { emptyProfile, type MemoryRepository } from "./repository.js";
import type {
  ConversationTurn,
  FactKind,
  MemoryFact,
  NewFact,
  NewTurn,
  Sentiment,
  TurnContext,
  UserProfile,
} from "./types.js";

// ============================================
// ROW SHAPES
// ============================================

interface TurnRow {
  id: number;
  user_id: string;
  user_text: string;
  ai_text: string;
  timestamp: string;
  platform: string;
  session_id: string | null;
  embedding: string | null;
  embedding_model: string | null;
  context: string;
}

interface FactRow {
  id: number;
  user_id: string;
  kind: string;
  text: string;
  importance: number;
  confidence: number;
  access_count: number;
  last_accessed: string | null;
  turn_id: number | null;
  created_at: string;
  embedding: string | null;
  embedding_model: string | null;
}

interface ProfileRow {
  user_id: string;
  preferences: string;
  interaction_history: string;
}

type TurnParams = [string, string, string, string, string, string | null, string | null, string | null, string];

// ============================================
// REPOSITORY
// ============================================

export class SqliteMemoryRepository implements MemoryRepository {
  readonly kind = "sqlite";

  constructor(private readonly db: CompanionDatabase) {}

  appendTurn(turn: NewTurn): number {
    const result = this.db.prepare<TurnParams>(`
      INSERT INTO turns (user_id, user_text, ai_text, timestamp, platform, session_id, embedding, embedding_model, context)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(...turnParams(turn));
    return Number(result.lastInsertRowid);
  }

  appendTurns(turns: NewTurn[]): number[] {
    const txn = this.db.transaction((batch: NewTurn[]) => batch.map(turn => this.appendTurn(turn)));
    return txn(turns);
  }

  turnsAfter(afterId: number, limit?: number): ConversationTurn[] {
    const rows = limit === undefined
      ? this.db.prepare<[number], TurnRow>("SELECT * FROM turns WHERE id > ? ORDER BY id").all(afterId)
      : this.db.prepare<[number, number], TurnRow>("SELECT * FROM turns WHERE id > ? ORDER BY id LIMIT ?").all(afterId, limit);
    return rows.map(rowToTurn);
  }

  recentTurns(count: number): ConversationTurn[] {
    if (count <= 0) return [];
    const rows = this.db
      .prepare<[number], TurnRow>("SELECT * FROM turns ORDER BY id DESC LIMIT ?")
      .all(count);
    return rows.reverse().map(rowToTurn);
  }

  countTurns(): number {
    return this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM turns").get()?.n ?? 0;
  }

  countTurnsSince(iso: string): number {
    return this.db.prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM turns WHERE timestamp >= ?").get(iso)?.n ?? 0;
  }

  maxTurnId(): number {
    return this.db.prepare<[], { m: number | null }>("SELECT MAX(id) AS m FROM turns").get()?.m ?? 0;
  }

  setTurnEmbedding(id: number, embedding: EmbeddingVector, model: string): void {
    this.db
      .prepare<[string, string, number]>("UPDATE turns SET embedding = ?, embedding_model = ? WHERE id = ?")
      .run(JSON.stringify(embedding), model, id);
  }

  insertFact(fact: NewFact): MemoryFact | null {
    const result = this.db.prepare<[string, string, string, number, number, number | null, string, string | null, string | null]>(`
      INSERT OR IGNORE INTO memory_facts
        (user_id, kind, text, importance, confidence, turn_id, created_at, embedding, embedding_model)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      fact.userId,
      fact.kind,
      fact.text,
      fact.importance,
      fact.confidence,
      fact.turnId ?? null,
      fact.createdAt,
      fact.embedding ? JSON.stringify(fact.embedding) : null,
      fact.embeddingModel ?? null,
    );
    if (result.changes === 0) return null;
    return { ...fact, id: Number(result.lastInsertRowid), accessCount: 0 };
  }

  topFacts(userId: string, limit: number): MemoryFact[] {
    return this.db
      .prepare<[string, number], FactRow>(
        "SELECT * FROM memory_facts WHERE user_id = ? ORDER BY importance DESC, id ASC LIMIT ?",
      )
      .all(userId, limit)
      .map(rowToFact);
  }

  touchFacts(ids: number[], at: string): void {
    if (ids.length === 0) return;
    const stmt = this.db.prepare<[string, number]>(
      "UPDATE memory_facts SET access_count = access_count + 1, last_accessed = ? WHERE id = ?",
    );
    const txn = this.db.transaction((batch: number[]) => {
      for (const id of batch) stmt.run(at, id);
    });
    txn(ids);
  }

  setFactEmbedding(id: number, embedding: EmbeddingVector, model: string): void {
    this.db
      .prepare<[string, string, number]>("UPDATE memory_facts SET embedding = ?, embedding_model = ? WHERE id = ?")
      .run(JSON.stringify(embedding), model, id);
  }

  countFacts(userId?: string): number {
    const row = userId === undefined
      ? this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM memory_facts").get()
      : this.db.prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM memory_facts WHERE user_id = ?").get(userId);
    return row?.n ?? 0;
  }

  evictFacts(userId: string, max: number): number {
    const excess = this.countFacts(userId) - max;
    if (excess <= 0) return 0;
    const result = this.db.prepare<[string, number]>(`
      DELETE FROM memory_facts WHERE id IN (
        SELECT id FROM memory_facts WHERE user_id = ?
        ORDER BY COALESCE(last_accessed, created_at) ASC, id ASC
        LIMIT ?
      )
    `).run(userId, excess);
    return result.changes;
  }

  getProfile(userId: string): UserProfile | null {
    const row = this.db
      .prepare<[string], ProfileRow>("SELECT user_id, preferences, interaction_history FROM user_profiles WHERE user_id = ?")
      .get(userId);
    return row ? rowToProfile(row) : null;
  }

  saveProfile(profile: UserProfile): void {
    this.db.prepare<[string, string, string, string]>(`
      INSERT INTO user_profiles (user_id, preferences, interaction_history, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(user_id) DO UPDATE SET
        preferences = excluded.preferences,
        interaction_history = excluded.interaction_history,
        updated_at = excluded.updated_at
    `).run(
      profile.userId,
      JSON.stringify(profile.preferences),
      JSON.stringify(profile.interactionHistory),
      new Date().toISOString(),
    );
  }

  getMeta(key: string): string | null {
    return this.db.prepare<[string], { value: string }>("SELECT value FROM store_meta WHERE key = ?").get(key)?.value ?? null;
  }

  setMeta(key: string, value: string): void {
    this.db.prepare<[string, string]>(`
      INSERT INTO store_meta (key, value, updated_at) VALUES (?, ?, datetime('now'))
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `).run(key, value);
  }
}

// ============================================
// HELPERS
// ============================================

function turnParams(turn: NewTurn): TurnParams {
  return [
    turn.userId,
    turn.userText,
    turn.aiText,
    turn.timestamp,
    turn.platform,
    turn.sessionId ?? null,
    turn.embedding ? JSON.stringify(turn.embedding) : null,
    turn.embeddingModel ?? null,
    JSON.stringify(turn.context),
  ];
}

function parseJson(raw: string | null): unknown {
  if (raw === null) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function parseVector(raw: string | null): EmbeddingVector | undefined {
  const value = parseJson(raw);
  if (!Array.isArray(value)) return undefined;
  const vector: number[] = [];
  for (const item of value) {
    if (typeof item !== "number") return undefined;
    vector.push(item);
  }
  return vector;
}

function parseSentiment(value: string): Sentiment {
  return value === "positive" || value === "negative" ? value : "neutral";
}

function parseContext(raw: string): TurnContext {
  const value = parseJson(raw);
  if (!isRecord(value)) return { topics: [], sentiment: "neutral" };
  return {
    topics: stringArrayField(value, "topics"),
    sentiment: parseSentiment(stringField(value, "sentiment")),
  };
}

function rowToTurn(row: TurnRow): ConversationTurn {
  const embedding = parseVector(row.embedding);
  return {
    id: row.id,
    userId: row.user_id,
    userText: row.user_text,
    aiText: row.ai_text,
    timestamp: row.timestamp,
    platform: row.platform,
    sessionId: row.session_id ?? undefined,
    embedding,
    embeddingModel: embedding ? row.embedding_model ?? undefined : undefined,
    context: parseContext(row.context),
  };
}

function parseKind(value: string): FactKind {
  return value === "preference" ? "preference" : "fact";
}

function rowToFact(row: FactRow): MemoryFact {
  const embedding = parseVector(row.embedding);
  return {
    id: row.id,
    userId: row.user_id,
    kind: parseKind(row.kind),
    text: row.text,
    importance: row.importance,
    confidence: row.confidence,
    accessCount: row.access_count,
    lastAccessed: row.last_accessed ?? undefined,
    turnId: row.turn_id ?? undefined,
    createdAt: row.created_at,
    embedding,
    embeddingModel: embedding ? row.embedding_model ?? undefined : undefined,
  };
}

function rowToProfile(row: ProfileRow): UserProfile {
  const profile = emptyProfile(row.user_id);

  const preferences = parseJson(row.preferences);
  if (isRecord(preferences) && isRecord(preferences.topics)) {
    for (const [topic, count] of Object.entries(preferences.topics)) {
      if (typeof count === "number") profile.preferences.topics[topic] = count;
    }
  }

  const history = parseJson(row.interaction_history);
  if (isRecord(history)) {
    const last = stringField(history, "lastInteraction");
    profile.interactionHistory = {
      lastInteraction: last || undefined,
      totalInteractions: numberField(history, "totalInteractions", 0),
    };
  }

  return profile;
}
