/**
 * Hangout Mode
 *
 * Casual conversation where the character does not answer every line.
 * Each round transcribes one utterance, decides whether and how to answer
 * (plainly, after "thinking", or by looking through the camera), waits a
 * personality-dependent delay and speaks the reply.
 *
 * Configuration lives in `Hangout/hangout_config.json` under the
 * configuration directory and is seeded from the shipped default.
 */

import * as path from "path";
import { setTimeout as sleep } from "timers/promises";
import { createComponentLogger } from "../logging.js";
import { loadOrSeed, readShippedDefault, writeJson } from "../core/json-store.js";
import { isRecord, numberField, stringArrayField, stringField } from "../core/validate.js";

const log = createComponentLogger("hangout");

const MIN_TRANSCRIPT_LENGTH = 2;
const CAMERA_UNAVAILABLE_REPLY = "I'd love to look, but I can't access the camera right now.";

// ============================================
// CONFIG
// ============================================

export interface PersonalitySettings {
  description: string;
  responseChance: number;
  delayMultiplier: number;
  thinkingChance: number;
}

export interface HangoutConfig {
  personality: string;
  /** Seconds */
  responseDelayMin: number;
  responseDelayMax: number;
  thinkingKeywords: string[];
  visionKeywords: string[];
  interruptPhrases: string[];
  personalitySettings: Record<string, PersonalitySettings>;
}

const FALLBACK_PERSONALITY: PersonalitySettings = {
  description: "",
  responseChance: 0.8,
  delayMultiplier: 1.0,
  thinkingChance: 0.2,
};

export function parseHangoutConfig(raw: unknown): HangoutConfig | null {
  if (!isRecord(raw)) return null;
  const settings = raw.personality_settings;
  if (!isRecord(settings)) return null;

  const personalitySettings: Record<string, PersonalitySettings> = {};
  for (const [name, value] of Object.entries(settings)) {
    if (!isRecord(value)) continue;
    personalitySettings[name] = {
      description: stringField(value, "description"),
      responseChance: numberField(value, "response_chance", FALLBACK_PERSONALITY.responseChance),
      delayMultiplier: numberField(value, "delay_multiplier", FALLBACK_PERSONALITY.delayMultiplier),
      thinkingChance: numberField(value, "thinking_chance", FALLBACK_PERSONALITY.thinkingChance),
    };
  }
  if (Object.keys(personalitySettings).length === 0) return null;

  const min = numberField(raw, "response_delay_min", 1.0);
  return {
    personality: stringField(raw, "personality") || "balanced",
    responseDelayMin: min,
    responseDelayMax: Math.max(min, numberField(raw, "response_delay_max", 5.0)),
    thinkingKeywords: stringArrayField(raw, "thinking_keywords").map(k => k.toLowerCase()),
    visionKeywords: stringArrayField(raw, "vision_keywords").map(k => k.toLowerCase()),
    interruptPhrases: stringArrayField(raw, "interrupt_phrases").map(k => k.toLowerCase()),
    personalitySettings,
  };
}

function toFileForm(config: HangoutConfig): Record<string, unknown> {
  const settings: Record<string, unknown> = {};
  for (const [name, s] of Object.entries(config.personalitySettings)) {
    settings[name] = {
      description: s.description,
      response_chance: s.responseChance,
      delay_multiplier: s.delayMultiplier,
      thinking_chance: s.thinkingChance,
    };
  }
  return {
    personality: config.personality,
    response_delay_min: config.responseDelayMin,
    response_delay_max: config.responseDelayMax,
    thinking_keywords: config.thinkingKeywords,
    vision_keywords: config.visionKeywords,
    interrupt_phrases: config.interruptPhrases,
    personality_settings: settings,
  };
}

export function hangoutConfigPath(configDir: string): string {
  return path.join(configDir, "Hangout", "hangout_config.json");
}

export async function loadHangoutConfig(configDir: string): Promise<HangoutConfig> {
  return loadOrSeed(hangoutConfigPath(configDir), readShippedDefault("hangout.json"), parseHangoutConfig);
}

// ============================================
// DECISIONS
// ============================================

export type ResponseType = "immediate" | "thinking" | "visual";

export interface HangoutDecision {
  shouldRespond: boolean;
  responseType: ResponseType;
  delayMs: number;
  shouldThink: boolean;
  shouldUseCamera: boolean;
}

export interface HangoutRound {
  transcript: string;
  decision: HangoutDecision | null;
  reply: string | null;
}

export interface HangoutStatus {
  enabled: boolean;
  personality: string;
  personalities: string[];
  rounds: number;
  thinkingKeywords: number;
  visionKeywords: number;
}

export interface HangoutDeps {
  transcribe: () => Promise<string>;
  /** Send a prompt through the conversation, optionally with an image file */
  send: (prompt: string, imagePath?: string) => Promise<string>;
  speak: (text: string) => Promise<void>;
  capture: () => Promise<string | null>;
  wait?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface HangoutOptions {
  config: HangoutConfig;
  /** Where setPersonality and keyword changes are saved; omitted means not saved */
  configPath?: string;
  enabled?: boolean;
  characterName?: string;
}

export class HangoutMode {
  private config: HangoutConfig;
  private enabled: boolean;
  private rounds = 0;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly deps: HangoutDeps, private readonly options: HangoutOptions) {
    this.config = options.config;
    this.enabled = options.enabled ?? true;
    this.wait = deps.wait ?? (async ms => { await sleep(ms); });
    this.random = deps.random ?? Math.random;
  }

  private personality(): PersonalitySettings {
    return this.config.personalitySettings[this.config.personality] ?? FALLBACK_PERSONALITY;
  }

  private uniform(min: number, max: number, random: () => number): number {
    return min + (max - min) * random();
  }

  /**
   * Whether and how to answer. Draws from `random` in a fixed order:
   * response chance, thinking delay (or thinking chance, then its delay),
   * vision delay, base delay.
   */
  decide(message: string, random: () => number = this.random): HangoutDecision {
    const decision: HangoutDecision = {
      shouldRespond: true,
      responseType: "immediate",
      delayMs: 0,
      shouldThink: false,
      shouldUseCamera: false,
    };
    const personality = this.personality();
    if (random() > personality.responseChance) {
      decision.shouldRespond = false;
      return decision;
    }

    const lower = message.toLowerCase();
    let delaySeconds = 0;

    if (this.config.thinkingKeywords.some(k => lower.includes(k))) {
      decision.shouldThink = true;
      decision.responseType = "thinking";
      delaySeconds = this.uniform(2, 5, random);
    } else if (random() < personality.thinkingChance) {
      decision.shouldThink = true;
      delaySeconds = this.uniform(1, 3, random);
    }

    if (this.config.visionKeywords.some(k => lower.includes(k))) {
      decision.shouldUseCamera = true;
      decision.responseType = "visual";
      delaySeconds = this.uniform(1, 2, random);
    }

    const base = this.uniform(this.config.responseDelayMin, this.config.responseDelayMax, random);
    delaySeconds = Math.max(delaySeconds, base * personality.delayMultiplier);
    decision.delayMs = Math.round(delaySeconds * 1000);
    return decision;
  }

  /** One listen/decide/answer cycle */
  async runRound(): Promise<HangoutRound> {
    if (!this.enabled) {
      log.debug("Hangout mode is disabled");
      return { transcript: "", decision: null, reply: null };
    }

    const transcript = (await this.deps.transcribe()).trim();
    if (transcript.length < MIN_TRANSCRIPT_LENGTH) {
      return { transcript, decision: null, reply: null };
    }
    this.rounds++;
    log.debug("Hangout input", { preview: transcript.slice(0, 80) });

    const decision = this.decide(transcript);
    if (!decision.shouldRespond) {
      log.debug("Staying quiet this round");
      return { transcript, decision, reply: null };
    }

    if (decision.delayMs > 0) await this.wait(decision.delayMs);

    const reply = await this.respond(transcript, decision);
    if (reply) await this.deps.speak(reply);
    return { transcript, decision, reply };
  }

  private async respond(message: string, decision: HangoutDecision): Promise<string> {
    if (decision.shouldThink) {
      return this.deps.send(`The user said: '${message}'. Think about this and provide a thoughtful response.`);
    }
    if (decision.shouldUseCamera) {
      const imagePath = await this.deps.capture();
      if (!imagePath) return CAMERA_UNAVAILABLE_REPLY;
      return this.deps.send(
        `The user said '${message}' and I'm looking at an image. Describe what I see and respond appropriately.`,
        imagePath,
      );
    }
    return this.deps.send(`In hangout mode, respond naturally to: '${message}'`);
  }

  /** An interrupt phrase addressed to the character by name */
  isInterruption(message: string): boolean {
    const name = this.options.characterName?.toLowerCase();
    if (!name) return false;
    const lower = message.toLowerCase();
    return lower.includes(name) && this.config.interruptPhrases.some(phrase => lower.includes(phrase));
  }

  async setPersonality(personality: string): Promise<boolean> {
    if (!Object.prototype.hasOwnProperty.call(this.config.personalitySettings, personality)) {
      log.warn(`Unknown hangout personality: ${personality}`);
      return false;
    }
    this.config = { ...this.config, personality };
    await this.save();
    log.info(`Hangout personality set to ${personality}`);
    return true;
  }

  async addKeyword(kind: "thinking" | "vision", keyword: string): Promise<boolean> {
    const normalized = keyword.trim().toLowerCase();
    const list = kind === "thinking" ? this.config.thinkingKeywords : this.config.visionKeywords;
    if (!normalized || list.includes(normalized)) return false;
    this.config = kind === "thinking"
      ? { ...this.config, thinkingKeywords: [...list, normalized] }
      : { ...this.config, visionKeywords: [...list, normalized] };
    await this.save();
    return true;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  getStatus(): HangoutStatus {
    return {
      enabled: this.enabled,
      personality: this.config.personality,
      personalities: Object.keys(this.config.personalitySettings),
      rounds: this.rounds,
      thinkingKeywords: this.config.thinkingKeywords.length,
      visionKeywords: this.config.visionKeywords.length,
    };
  }

  private async save(): Promise<void> {
    if (!this.options.configPath) return;
    try {
      await writeJson(this.options.configPath, toFileForm(this.config));
    } catch (err) {
      log.error("Error saving hangout config", err);
    }
  }
}
