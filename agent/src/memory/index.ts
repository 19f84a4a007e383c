/**
 * Memory Module
 *
 * Conversation log, fact extraction and similarity retrieval:
 * - MemoryStore (the only type callers construct)
 * - SQLite and in-memory repositories
 * - Topic, sentiment and fact rule tables
 */

export * from "./types.js";
export * from "./memory-store.js";
export * from "./repository.js";
export * from "./sqlite-repository.js";
export * from "./in-memory-repository.js";
export * from "./extract.js";
export * from "./fact-rules.js";
