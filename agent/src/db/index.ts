/**
 * Database Manager
 *
 * Opens the companion's SQLite file (or `:memory:` in tests), applies
 * pragmas and runs migrations. The handle is owned by the bootstrap and
 * passed to the stores that need it.
 */

import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { createComponentLogger } from "../logging.js";
import { runMigrations } from "./migrations.js";

const log = createComponentLogger("db");

export type CompanionDatabase = Database.Database;

export function openDatabase(file: string): CompanionDatabase {
  const inMemory = file === ":memory:";
  if (!inMemory) fs.mkdirSync(path.dirname(file), { recursive: true });

  const db = new Database(file);
  if (!inMemory) db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  runMigrations(db);

  log.info("Database ready", { file });
  return db;
}

export function closeDatabase(db: CompanionDatabase): void {
  if (db.open) db.close();
}
