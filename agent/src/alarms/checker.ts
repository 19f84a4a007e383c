/**
 * Alarm Checker
 *
 * Polled by the periodic manager (bypassing the idle gate) and by the
 * Main-Alarm pipe. A due alarm asks the character to wake the user and the
 * reply is spoken.
 */

import { createComponentLogger } from "../logging.js";
import type { PeriodicTaskDef } from "../periodic/manager.js";
import type { Alarm, AlarmStore } from "./store.js";

const log = createComponentLogger("alarms");

const CHECK_INTERVAL_MS = 10_000;
const DEFAULT_ALARM_MESSAGE = "Wake up! It's time!";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local calendar date as "YYYY-MM-DD" */
export function localDay(now: Date): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/** Enabled, past today's HH:MM (seconds ignored) and not yet triggered today */
export function shouldTriggerAlarm(alarm: Alarm, now: Date): boolean {
  if (!alarm.enabled) return false;
  const current = `${pad(now.getHours())}:${pad(now.getMinutes())}`;
  if (current < alarm.time) return false;
  return alarm.lastTriggered !== localDay(now);
}

export function alarmPrompt(alarm: Alarm): string {
  const message = alarm.message || DEFAULT_ALARM_MESSAGE;
  return `It's time for your alarm '${alarm.name}'! ${message} Please wake up the user in your characteristic style.`;
}

export interface AlarmCheckerOptions {
  store: AlarmStore;
  /** Sends the wake-up prompt through the conversation; resolves to the reply */
  wake: (prompt: string) => Promise<string>;
  speak: (text: string) => Promise<void>;
  clock?: () => Date;
}

export class AlarmChecker {
  private readonly clock: () => Date;

  constructor(private readonly options: AlarmCheckerOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  /** Trigger every due alarm; returns the names that fired */
  async runDue(): Promise<string[]> {
    const now = this.clock();
    const day = localDay(now);
    const fired: string[] = [];

    for (const { name } of this.options.store.list()) {
      // An overlapping run may have fired or removed it while this one awaited
      const alarm = this.options.store.get(name);
      if (!alarm || !shouldTriggerAlarm(alarm, now)) continue;
      fired.push(name);
      await this.trigger(alarm, day);
    }

    return fired;
  }

  private async trigger(alarm: Alarm, day: string): Promise<void> {
    log.info(`Alarm triggered: ${alarm.name}`);
    await this.options.store.markTriggered(alarm.name, day);

    try {
      const reply = await this.options.wake(alarmPrompt(alarm));
      await this.options.speak(reply);
    } catch (err) {
      log.error(`Error delivering alarm '${alarm.name}'`, err);
    }

    if (!alarm.recurring) {
      await this.options.store.remove(alarm.name);
    }
  }

  getPeriodicTaskDef(enabled = true): PeriodicTaskDef {
    return {
      id: "alarm-check",
      name: "Alarm Check",
      intervalMs: CHECK_INTERVAL_MS,
      initialDelayMs: 0,
      enabled,
      bypassIdleCheck: true,
      run: async () => {
        await this.runDue();
      },
    };
  }
}
