/**
 * Database Migrations
 *
 * Sequential, numbered migrations that bring the companion database from
 * any prior version to the current one. Runs right after the file opens.
 *
 * Rules:
 * - Migrations are append-only. Never edit a shipped migration.
 * - Each migration runs inside a transaction.
 * - To evolve the schema, add a new function to the `migrations` array.
 */

import type Database from "better-sqlite3";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("db");

// ============================================
// MIGRATION RUNNER
// ============================================

type Migration = (db: Database.Database) => void;

/**
 * Run all pending migrations. Safe on every startup: applied
 * migrations are skipped.
 */
export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db.prepare<[], { v: number | null }>("SELECT MAX(version) AS v FROM schema_version").get();
  const currentVersion = row?.v ?? -1;
  const target = migrations.length - 1;

  if (currentVersion >= target) return;

  log.info(`Schema at v${currentVersion}, target v${target}`, { pending: target - currentVersion });

  const stamp = db.prepare<[number]>(
    "INSERT INTO schema_version (version, applied_at) VALUES (?, datetime('now'))",
  );

  for (let i = currentVersion + 1; i < migrations.length; i++) {
    const txn = db.transaction(() => {
      migrations[i](db);
      stamp.run(i);
    });
    txn();
    log.debug(`Applied migration ${i}`);
  }
}

export function schemaVersion(db: Database.Database): number {
  const row = db.prepare<[], { v: number | null }>("SELECT MAX(version) AS v FROM schema_version").get();
  return row?.v ?? -1;
}

// ============================================
// MIGRATIONS
// ============================================

const migrations: Migration[] = [
  // ── v0: Baseline ──────────────────────────────────────────────────
  function v0_baseline(db) {
    db.exec(`
      -- Append-only conversation log; ids are never reused
      CREATE TABLE IF NOT EXISTS turns (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL,
        user_text TEXT NOT NULL,
        ai_text TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        platform TEXT NOT NULL,
        session_id TEXT,
        embedding TEXT,
        embedding_model TEXT,
        context TEXT NOT NULL DEFAULT '{}'
      );
      CREATE INDEX IF NOT EXISTS idx_turns_user ON turns(user_id);
      CREATE INDEX IF NOT EXISTS idx_turns_timestamp ON turns(timestamp);

      CREATE TABLE IF NOT EXISTS memory_facts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL,
        kind TEXT NOT NULL CHECK (kind IN ('fact', 'preference')),
        text TEXT NOT NULL,
        importance REAL NOT NULL,
        confidence REAL NOT NULL,
        access_count INTEGER NOT NULL DEFAULT 0,
        last_accessed TEXT,
        turn_id INTEGER REFERENCES turns(id),
        created_at TEXT NOT NULL,
        embedding TEXT,
        embedding_model TEXT,
        UNIQUE (user_id, text)
      );
      CREATE INDEX IF NOT EXISTS idx_facts_user_importance ON memory_facts(user_id, importance DESC);

      CREATE TABLE IF NOT EXISTS user_profiles (
        user_id TEXT PRIMARY KEY,
        preferences TEXT NOT NULL DEFAULT '{}',
        interaction_history TEXT NOT NULL DEFAULT '{}',
        updated_at TEXT NOT NULL
      );
    `);
  },

  // ── v1: Key/value markers (legacy import, analyzer high-water marks) ──
  function v1_store_meta(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS store_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);
  },
];
