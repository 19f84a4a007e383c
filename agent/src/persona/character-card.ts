/**
 * Character Card
 *
 * The persona the companion speaks as. Loaded from a user-editable JSON
 * file that is re-seeded from the shipped default when missing or
 * malformed.
 */

import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../core/errors.js";
import { loadOrSeed, readShippedDefault, writeJson } from "../core/json-store.js";
import { isRecord, stringArrayField, stringField } from "../core/validate.js";

const log = createComponentLogger("persona");

export interface CharacterCard {
  name: string;
  description: string;
  personality: string[];
  background: string;
  speakingStyle: string[];
  interests: string[];
  guidelines: string[];
}

/** On-disk shape */
interface CharacterCardFile {
  name: string;
  description: string;
  personality: string[];
  background: string;
  speaking_style: string[];
  interests: string[];
  guidelines: string[];
}

// ============================================
// PARSING
// ============================================

/** Null for anything that is not a non-empty object */
export function parseCharacterCard(raw: unknown): CharacterCard | null {
  if (!isRecord(raw) || Object.keys(raw).length === 0) return null;
  return {
    name: stringField(raw, "name", "AI"),
    description: stringField(raw, "description", "An AI assistant"),
    personality: stringArrayField(raw, "personality"),
    background: stringField(raw, "background"),
    speakingStyle: stringArrayField(raw, "speaking_style"),
    interests: stringArrayField(raw, "interests"),
    guidelines: stringArrayField(raw, "guidelines"),
  };
}

function toFile(card: CharacterCard): CharacterCardFile {
  return {
    name: card.name,
    description: card.description,
    personality: card.personality,
    background: card.background,
    speaking_style: card.speakingStyle,
    interests: card.interests,
    guidelines: card.guidelines,
  };
}

export function defaultCharacterCard(): CharacterCard {
  const card = parseCharacterCard(readShippedDefault("character-card.json"));
  if (!card) throw new Error("Shipped character card default is malformed");
  return card;
}

// ============================================
// PROMPT
// ============================================

function bulleted(heading: string, items: string[]): string[] {
  return items.length > 0 ? [heading, ...items.map(item => `- ${item}`)] : [];
}

export function buildCharacterPrompt(card: CharacterCard | null): string {
  if (!card) return "You are a helpful AI assistant.";

  return [
    `You are ${card.name}, ${card.description}.`,
    ...bulleted("Your personality traits:", card.personality),
    ...(card.background ? [`Background: ${card.background}`] : []),
    ...bulleted("Your speaking style:", card.speakingStyle),
    ...bulleted("Your interests include:", card.interests),
    ...bulleted("Important guidelines:", card.guidelines),
  ].join("\n");
}

// ============================================
// STORE
// ============================================

export class CharacterCardStore {
  private card: CharacterCard | null = null;
  private cachedPrompt = buildCharacterPrompt(null);

  constructor(
    private readonly filePath: string,
    private readonly defaults: CharacterCard = defaultCharacterCard(),
  ) {}

  async load(): Promise<CharacterCard> {
    const card = await loadOrSeed(this.filePath, toFile(this.defaults), parseCharacterCard);
    this.set(card);
    log.info(`Character loaded: ${card.name}`, { path: this.filePath });
    return card;
  }

  reload(): Promise<CharacterCard> {
    return this.load();
  }

  /** Merge and save. A failed save keeps the in-memory update. */
  async update(patch: Partial<CharacterCard>): Promise<CharacterCard> {
    const next = { ...(this.card ?? this.defaults), ...patch };
    this.set(next);
    try {
      await writeJson(this.filePath, toFile(next));
      log.debug("Character card saved", { path: this.filePath });
    } catch (err) {
      log.error("Failed to save character card", err, { path: this.filePath, reason: errorMessage(err) });
    }
    return next;
  }

  get(): CharacterCard | null {
    return this.card ? { ...this.card } : null;
  }

  name(): string {
    return this.card?.name ?? "AI";
  }

  prompt(): string {
    return this.cachedPrompt;
  }

  private set(card: CharacterCard): void {
    this.card = card;
    this.cachedPrompt = buildCharacterPrompt(card);
  }
}
