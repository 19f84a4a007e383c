/**
 * Task Profiles
 *
 * Named modes layered onto the character prompt ("gaming", "study_buddy"...).
 * One JSON file per profile in the tasks directory; the directory is seeded
 * from the shipped defaults when it holds no profiles.
 */

import { promises as fs } from "fs";
import * as path from "path";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../core/errors.js";
import { readJson, readShippedDefault, writeJson } from "../core/json-store.js";
import { isRecord, stringArrayField, stringField } from "../core/validate.js";

const log = createComponentLogger("tasks");

export interface TaskProfile {
  name: string;
  description: string;
  personalityModifiers: string[];
  responseGuidelines: string[];
}

export function parseTaskProfile(raw: unknown): TaskProfile | null {
  if (!isRecord(raw)) return null;
  return {
    name: stringField(raw, "name"),
    description: stringField(raw, "description"),
    personalityModifiers: stringArrayField(raw, "personality_modifiers"),
    responseGuidelines: stringArrayField(raw, "response_guidelines"),
  };
}

function toFile(profile: TaskProfile): Record<string, unknown> {
  return {
    name: profile.name,
    description: profile.description,
    personality_modifiers: profile.personalityModifiers,
    response_guidelines: profile.responseGuidelines,
  };
}

export function defaultTaskProfiles(): Map<string, TaskProfile> {
  const raw = readShippedDefault("task-profiles.json");
  const profiles = new Map<string, TaskProfile>();
  if (!isRecord(raw)) return profiles;
  for (const [key, value] of Object.entries(raw)) {
    const profile = parseTaskProfile(value);
    if (profile) profiles.set(key, profile);
  }
  return profiles;
}

export function buildTaskPrompt(profile: TaskProfile | null): string {
  if (!profile) return "";

  const parts: string[] = [];
  if (profile.description) parts.push(`Current mode: ${profile.description}`);
  if (profile.personalityModifiers.length > 0) {
    parts.push("Additional personality guidelines for this mode:", ...profile.personalityModifiers.map(m => `- ${m}`));
  }
  if (profile.responseGuidelines.length > 0) {
    parts.push("Response guidelines for this mode:", ...profile.responseGuidelines.map(g => `- ${g}`));
  }
  return parts.join("\n");
}

export class TaskProfiles {
  private profiles = new Map<string, TaskProfile>();
  private currentName: string | null = null;

  constructor(
    private readonly dir: string,
    private readonly defaults: Map<string, TaskProfile> = defaultTaskProfiles(),
  ) {}

  /** Read every `<name>.json` in the directory. Malformed files are skipped. */
  async load(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    let files = (await fs.readdir(this.dir)).filter(f => f.endsWith(".json"));

    if (files.length === 0) {
      await this.seed();
      files = (await fs.readdir(this.dir)).filter(f => f.endsWith(".json"));
    }

    this.profiles.clear();
    for (const file of files.sort()) {
      const name = file.slice(0, -".json".length);
      try {
        const profile = parseTaskProfile(await readJson(path.join(this.dir, file)));
        if (profile) this.profiles.set(name, profile);
        else log.warn(`Task profile ${file} is not an object; skipped`);
      } catch (err) {
        log.warn(`Invalid task profile ${file}; skipped`, { error: errorMessage(err) });
      }
    }

    if (this.currentName && !this.profiles.has(this.currentName)) this.currentName = null;
    log.info(`Loaded ${this.profiles.size} task profiles`);
  }

  private async seed(): Promise<void> {
    for (const [name, profile] of this.defaults) {
      await writeJson(path.join(this.dir, `${name}.json`), toFile(profile));
    }
    log.info("Created default task profiles", { dir: this.dir, count: this.defaults.size });
  }

  setCurrent(name: string): boolean {
    if (!this.profiles.has(name)) {
      log.debug(`Unknown task: ${name}`);
      return false;
    }
    if (this.currentName !== name) log.debug(`Task set to: ${name}`);
    this.currentName = name;
    return true;
  }

  clear(): void {
    this.currentName = null;
  }

  current(): { name: string; profile: TaskProfile } | null {
    if (!this.currentName) return null;
    const profile = this.profiles.get(this.currentName);
    return profile ? { name: this.currentName, profile } : null;
  }

  get(name: string): TaskProfile | undefined {
    return this.profiles.get(name);
  }

  list(): string[] {
    return [...this.profiles.keys()];
  }

  prompt(): string {
    return buildTaskPrompt(this.current()?.profile ?? null);
  }
}
