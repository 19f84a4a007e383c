/**
 * Lorebook
 *
 * Keyword-triggered knowledge snippets injected into the prompt. Entries
 * come from `lorebook.json` plus any other `*.json` file in the lorebook
 * directory; edits are written back to the file an entry came from.
 */

import { promises as fs } from "fs";
import * as path from "path";
import { nanoid } from "nanoid";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../core/errors.js";
import { loadOrSeed, readJson, readShippedDefault, writeJson } from "../core/json-store.js";
import { booleanField, isRecord, numberField, stringArrayField, stringField } from "../core/validate.js";

const log = createComponentLogger("lorebook");

const MAIN_FILE = "lorebook.json";

export interface LoreEntry {
  id: string;
  title: string;
  content: string;
  keywords: string[];
  priority: number;
  enabled: boolean;
  /** Epoch seconds */
  created?: number;
}

export interface ScoredLoreEntry extends LoreEntry {
  relevance: number;
}

export interface LorebookStats {
  totalEntries: number;
  enabledEntries: number;
  disabledEntries: number;
  lorebookEnabled: boolean;
}

export interface LorebookOptions {
  enabled?: boolean;
  maxEntries?: number;
  threshold?: number;
  /** Written as lorebook.json when it is missing or malformed */
  defaults?: unknown;
  now?: () => Date;
}

interface LorebookFile {
  metadata: Record<string, unknown>;
  entries: LoreEntry[];
}

// ============================================
// PARSING
// ============================================

export function parseLoreEntry(raw: unknown): LoreEntry | null {
  if (!isRecord(raw)) return null;
  const id = stringField(raw, "id");
  if (!id) return null;
  const created = raw.created;
  return {
    id,
    title: stringField(raw, "title", "Knowledge Entry"),
    content: stringField(raw, "content"),
    keywords: stringArrayField(raw, "keywords"),
    priority: numberField(raw, "priority", 0),
    enabled: booleanField(raw, "enabled", true),
    created: typeof created === "number" ? created : undefined,
  };
}

export function parseLorebookFile(raw: unknown): LorebookFile | null {
  if (!isRecord(raw) || !Array.isArray(raw.entries)) return null;
  const entries: LoreEntry[] = [];
  for (const item of raw.entries) {
    const entry = parseLoreEntry(item);
    if (entry) entries.push(entry);
  }
  return {
    metadata: isRecord(raw.metadata) ? raw.metadata : {},
    entries,
  };
}

// ============================================
// SCORING
// ============================================

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whole-word keyword hits count 1, substring hits 0.5, averaged over the
 * keyword list, plus a priority boost of up to 0.3. Capped at 1. An entry
 * with no keyword hit scores 0 regardless of priority.
 */
export function calculateRelevance(entry: LoreEntry, message: string): number {
  if (entry.keywords.length === 0) return 0;
  const lower = message.toLowerCase();

  let matches = 0;
  for (const keyword of entry.keywords) {
    const k = keyword.toLowerCase();
    if (new RegExp(`\\b${escapeRegExp(k)}\\b`).test(lower)) matches += 1;
    else if (lower.includes(k)) matches += 0.5;
  }
  if (matches === 0) return 0;

  const boost = Math.min(entry.priority / 10, 0.3);
  return Math.min(matches / entry.keywords.length + boost, 1);
}

// ============================================
// LOREBOOK
// ============================================

export class Lorebook {
  private entries: LoreEntry[] = [];
  /** entry id → file name it was loaded from */
  private sources = new Map<string, string>();
  private metadata = new Map<string, Record<string, unknown>>();
  private enabled: boolean;
  private readonly maxEntries: number;
  private readonly threshold: number;
  private readonly defaults: unknown;
  private readonly now: () => Date;

  constructor(private readonly dir: string, options: LorebookOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.maxEntries = options.maxEntries ?? 5;
    this.threshold = options.threshold ?? 0.3;
    this.defaults = options.defaults ?? readShippedDefault("lorebook.json");
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    this.entries = [];
    this.sources.clear();
    this.metadata.clear();

    const main = await loadOrSeed(path.join(this.dir, MAIN_FILE), this.defaults, parseLorebookFile);
    this.addFile(MAIN_FILE, main);

    const extras = (await fs.readdir(this.dir)).filter(f => f.endsWith(".json") && f !== MAIN_FILE).sort();
    for (const file of extras) {
      try {
        const parsed = parseLorebookFile(await readJson(path.join(this.dir, file)));
        if (parsed) this.addFile(file, parsed);
        else log.warn(`Lorebook file ${file} has no entries array; skipped`);
      } catch (err) {
        log.warn(`Error loading lorebook file ${file}`, { error: errorMessage(err) });
      }
    }

    log.info(`Loaded ${this.entries.length} lorebook entries`, { files: 1 + extras.length });
  }

  private addFile(file: string, parsed: LorebookFile): void {
    this.metadata.set(file, parsed.metadata);
    for (const entry of parsed.entries) {
      this.entries.push(entry);
      this.sources.set(entry.id, file);
    }
  }

  // ============================================
  // RETRIEVAL
  // ============================================

  getRelevant(message: string, maxEntries = this.maxEntries): ScoredLoreEntry[] {
    if (!this.enabled) return [];

    const scored: ScoredLoreEntry[] = [];
    for (const entry of this.entries) {
      if (!entry.enabled) continue;
      const relevance = calculateRelevance(entry, message);
      if (relevance >= this.threshold) scored.push({ ...entry, relevance });
    }

    return scored
      .sort((a, b) => b.priority - a.priority || b.relevance - a.relevance)
      .slice(0, maxEntries);
  }

  getContext(message: string): string {
    const relevant = this.getRelevant(message).filter(entry => entry.content);
    if (relevant.length === 0) return "";
    return ["Relevant knowledge:", ...relevant.map(e => `- ${e.title}: ${e.content}`)].join("\n");
  }

  search(query: string): LoreEntry[] {
    if (!query) return [];
    const q = query.toLowerCase();
    return this.entries.filter(entry =>
      entry.enabled &&
      (entry.title.toLowerCase().includes(q) ||
        entry.content.toLowerCase().includes(q) ||
        entry.keywords.some(k => k.toLowerCase().includes(q))),
    );
  }

  list(): LoreEntry[] {
    return this.entries.map(entry => ({ ...entry, keywords: [...entry.keywords] }));
  }

  // ============================================
  // EDITING
  // ============================================

  async add(input: { title: string; content: string; keywords: string[]; priority?: number }): Promise<LoreEntry> {
    const entry: LoreEntry = {
      id: `entry_${nanoid(10)}`,
      title: input.title,
      content: input.content,
      keywords: input.keywords,
      priority: input.priority ?? 5,
      enabled: true,
      created: Math.floor(this.now().getTime() / 1000),
    };
    this.entries.push(entry);
    this.sources.set(entry.id, MAIN_FILE);
    await this.save(MAIN_FILE);
    log.info(`Added lorebook entry: ${entry.title}`, { id: entry.id });
    return entry;
  }

  async remove(id: string): Promise<boolean> {
    const index = this.entries.findIndex(entry => entry.id === id);
    if (index < 0) return false;
    this.entries.splice(index, 1);
    const source = this.sources.get(id) ?? MAIN_FILE;
    this.sources.delete(id);
    await this.save(source);
    log.info(`Removed lorebook entry: ${id}`);
    return true;
  }

  async update(id: string, patch: Partial<Omit<LoreEntry, "id">>): Promise<boolean> {
    const entry = this.entries.find(e => e.id === id);
    if (!entry) return false;
    Object.assign(entry, patch);
    await this.save(this.sources.get(id) ?? MAIN_FILE);
    log.debug(`Updated lorebook entry: ${id}`);
    return true;
  }

  /** Flip the whole lorebook, or set it when `enabled` is given */
  toggle(enabled?: boolean): boolean {
    this.enabled = enabled ?? !this.enabled;
    log.info(`Lorebook ${this.enabled ? "enabled" : "disabled"}`);
    return this.enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  stats(): LorebookStats {
    const enabledEntries = this.entries.filter(e => e.enabled).length;
    return {
      totalEntries: this.entries.length,
      enabledEntries,
      disabledEntries: this.entries.length - enabledEntries,
      lorebookEnabled: this.enabled,
    };
  }

  private async save(file: string): Promise<void> {
    const entries = this.entries.filter(e => (this.sources.get(e.id) ?? MAIN_FILE) === file);
    const metadata = { ...(this.metadata.get(file) ?? {}), last_updated: Math.floor(this.now().getTime() / 1000) };
    this.metadata.set(file, metadata);
    try {
      await writeJson(path.join(this.dir, file), { metadata, entries });
    } catch (err) {
      log.error(`Error saving lorebook file ${file}`, err);
    }
  }
}
