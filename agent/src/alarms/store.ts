/**
 * Alarm Store
 *
 * Daily wall-clock alarms persisted as JSON in the configuration directory
 * (`Alarms/alarms.json`). The file uses snake_case keys; a missing or
 * unreadable file means no alarms.
 */

import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../core/errors.js";
import { fileExists, readJson, writeJson } from "../core/json-store.js";
import { booleanField, isRecord, stringField } from "../core/validate.js";

const log = createComponentLogger("alarms");

// ============================================
// TYPES
// ============================================

export interface Alarm {
  name: string;
  /** "HH:MM", local time */
  time: string;
  message: string;
  recurring: boolean;
  enabled: boolean;
  /** Local date "YYYY-MM-DD" of the last trigger */
  lastTriggered?: string;
  /** ISO 8601 */
  created: string;
}

export interface NewAlarm {
  name: string;
  time: string;
  message?: string;
  recurring?: boolean;
}

export type AddAlarmResult = { ok: true; alarm: Alarm } | { ok: false; error: string };

// ============================================
// PARSING
// ============================================

/** Normalized "HH:MM", or null when the input is not a valid time of day */
export function parseAlarmTime(input: string): string | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(input.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}

function parseAlarm(raw: unknown): Alarm | null {
  if (!isRecord(raw)) return null;
  const name = stringField(raw, "name");
  const time = parseAlarmTime(stringField(raw, "time"));
  if (!name || !time) return null;
  const lastTriggered = stringField(raw, "last_triggered");
  return {
    name,
    time,
    message: stringField(raw, "message"),
    recurring: booleanField(raw, "recurring", false),
    enabled: booleanField(raw, "enabled", true),
    lastTriggered: lastTriggered || undefined,
    created: stringField(raw, "created"),
  };
}

function toFileForm(alarm: Alarm): Record<string, unknown> {
  return {
    name: alarm.name,
    time: alarm.time,
    message: alarm.message,
    recurring: alarm.recurring,
    enabled: alarm.enabled,
    ...(alarm.lastTriggered ? { last_triggered: alarm.lastTriggered } : {}),
    created: alarm.created,
  };
}

// ============================================
// STORE
// ============================================

export class AlarmStore {
  private alarms: Alarm[] = [];

  constructor(private readonly filePath: string, private readonly clock: () => Date = () => new Date()) {}

  async load(): Promise<void> {
    this.alarms = [];
    if (!(await fileExists(this.filePath))) return;
    try {
      const raw = await readJson(this.filePath);
      if (!Array.isArray(raw)) {
        log.warn("Alarm file is not a list; ignoring it");
        return;
      }
      for (const item of raw) {
        const alarm = parseAlarm(item);
        if (alarm) this.alarms.push(alarm);
        else log.warn("Skipping malformed alarm entry");
      }
    } catch (err) {
      log.warn("Error loading alarms", { error: errorMessage(err) });
    }
    log.info(`Loaded ${this.alarms.length} alarms`);
  }

  list(): Alarm[] {
    return this.alarms.map(alarm => ({ ...alarm }));
  }

  get(name: string): Alarm | undefined {
    const alarm = this.alarms.find(a => a.name === name);
    return alarm ? { ...alarm } : undefined;
  }

  async add(input: NewAlarm): Promise<AddAlarmResult> {
    const name = input.name.trim();
    if (!name) return { ok: false, error: "Alarm name is required" };
    const time = parseAlarmTime(input.time);
    if (!time) return { ok: false, error: `Invalid time format: ${input.time} (expected HH:MM)` };
    if (this.alarms.some(a => a.name === name)) return { ok: false, error: `Alarm "${name}" already exists` };

    const alarm: Alarm = {
      name,
      time,
      message: input.message ?? "",
      recurring: input.recurring ?? false,
      enabled: true,
      created: this.clock().toISOString(),
    };
    this.alarms.push(alarm);
    await this.save();
    log.info(`Alarm added: ${name} at ${time}`);
    return { ok: true, alarm: { ...alarm } };
  }

  async remove(name: string): Promise<boolean> {
    const before = this.alarms.length;
    this.alarms = this.alarms.filter(a => a.name !== name);
    if (this.alarms.length === before) return false;
    await this.save();
    log.info(`Alarm removed: ${name}`);
    return true;
  }

  /** New enabled state, or null when no alarm has that name */
  async toggle(name: string): Promise<boolean | null> {
    const alarm = this.alarms.find(a => a.name === name);
    if (!alarm) return null;
    alarm.enabled = !alarm.enabled;
    await this.save();
    log.info(`Alarm '${name}' ${alarm.enabled ? "enabled" : "disabled"}`);
    return alarm.enabled;
  }

  /** Synchronous in memory so a concurrent check sees it at once; persisted after */
  async markTriggered(name: string, day: string): Promise<void> {
    const alarm = this.alarms.find(a => a.name === name);
    if (!alarm) return;
    alarm.lastTriggered = day;
    await this.save();
  }

  private async save(): Promise<void> {
    try {
      await writeJson(this.filePath, this.alarms.map(toFileForm));
    } catch (err) {
      log.error("Error saving alarms", err);
    }
  }
}
