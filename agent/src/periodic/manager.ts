/**
 * Periodic Manager
 *
 * Single coordinator for the background monitors (alarms, tag decay, RAG
 * sync, retrospection).
 *
 * - One idle tracker: the foreground loop calls notifyActivity()
 * - Only one periodic task runs at a time
 * - One poll loop checks which tasks are due, in registration order
 * - Idle-gated tasks wait until nothing happened for the idle threshold;
 *   time-based tasks set bypassIdleCheck
 */

import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("periodic");

// ============================================
// TYPES
// ============================================

export interface PeriodicTaskDef {
  /** Unique task identifier */
  id: string;
  /** Human-readable name for logs */
  name: string;
  intervalMs: number;
  /** Delay before the first run after start */
  initialDelayMs: number;
  enabled: boolean;
  /** Receives the current idle duration. Throw to signal failure. */
  run: (idleDurationMs: number) => Promise<void>;
  /** Return false to skip this cycle */
  canRun?: () => boolean;
  /** Run even while the user is active */
  bypassIdleCheck?: boolean;
}

export interface ManagerStatus {
  running: boolean;
  idleMs: number;
  currentlyRunning: string | null;
  tasks: Array<{
    id: string;
    name: string;
    enabled: boolean;
    lastRunAt: number;
    msSinceLastRun: number;
    intervalMs: number;
  }>;
}

export interface PeriodicManagerOptions {
  pollIntervalMs?: number;
  idleThresholdMs?: number;
  clock?: () => number;
}

// ============================================
// CONSTANTS
// ============================================

const POLL_INTERVAL_MS = 5_000;
const DEFAULT_IDLE_THRESHOLD_MS = 2 * 60 * 1000;

// ============================================
// MANAGER
// ============================================

export class PeriodicManager {
  private tasks: PeriodicTaskDef[] = [];
  private readonly lastRunAt = new Map<string, number>();
  private readonly initialDelayTimers: NodeJS.Timeout[] = [];
  private pollTimer: NodeJS.Timeout | null = null;
  private currentlyRunning: string | null = null;
  private running = false;
  private lastActivityAt: number;
  private readonly pollIntervalMs: number;
  private readonly idleThresholdMs: number;
  private readonly clock: () => number;

  constructor(options: PeriodicManagerOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.idleThresholdMs = options.idleThresholdMs ?? DEFAULT_IDLE_THRESHOLD_MS;
    this.clock = options.clock ?? (() => Date.now());
    this.lastActivityAt = this.clock();
  }

  /** Idempotent: a running manager is stopped first */
  start(taskDefs: PeriodicTaskDef[]): void {
    this.stop();

    this.tasks = taskDefs;
    this.lastActivityAt = this.clock();
    this.lastRunAt.clear();
    this.currentlyRunning = null;
    this.running = true;

    for (const task of this.tasks) {
      if (!task.enabled || task.initialDelayMs <= 0) continue;
      this.initialDelayTimers.push(setTimeout(() => {
        void this.pollSingleTask(task);
      }, task.initialDelayMs));
    }

    this.pollTimer = setInterval(() => {
      void this.poll();
    }, this.pollIntervalMs);

    const enabledNames = this.tasks.filter(t => t.enabled).map(t => t.name);
    log.info(`Manager started with ${enabledNames.length} task(s): ${enabledNames.join(", ")}`);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    for (const timer of this.initialDelayTimers) clearTimeout(timer);
    this.initialDelayTimers.length = 0;

    this.tasks = [];
    this.lastRunAt.clear();
    this.currentlyRunning = null;
    log.info("Manager stopped");
  }

  // ----- Activity -----

  notifyActivity(): void {
    this.lastActivityAt = this.clock();
  }

  getIdleDurationMs(): number {
    return this.clock() - this.lastActivityAt;
  }

  // ----- Status -----

  isAnyTaskRunning(): boolean {
    return this.currentlyRunning !== null;
  }

  isTaskRunning(taskId: string): boolean {
    return this.currentlyRunning === taskId;
  }

  getStatus(): ManagerStatus {
    const now = this.clock();
    return {
      running: this.running,
      idleMs: now - this.lastActivityAt,
      currentlyRunning: this.currentlyRunning,
      tasks: this.tasks.map(t => {
        const last = this.lastRunAt.get(t.id) ?? 0;
        return {
          id: t.id,
          name: t.name,
          enabled: t.enabled,
          lastRunAt: last,
          msSinceLastRun: now - last,
          intervalMs: t.intervalMs,
        };
      }),
    };
  }

  // ----- Poll loop -----

  /** Runs every due task in registration order */
  async poll(): Promise<void> {
    if (!this.running || this.currentlyRunning) return;

    const idleMs = this.getIdleDurationMs();
    const systemIdle = idleMs >= this.idleThresholdMs;

    for (const task of this.tasks) {
      if (!this.running) return;
      if (!task.enabled) continue;
      if (!systemIdle && !task.bypassIdleCheck) continue;
      if (!this.isDue(task)) continue;
      await this.runTask(task, idleMs);
    }
  }

  private async pollSingleTask(task: PeriodicTaskDef): Promise<void> {
    if (!this.running || this.currentlyRunning || !task.enabled) return;

    const idleMs = this.getIdleDurationMs();
    if (idleMs < this.idleThresholdMs && !task.bypassIdleCheck) return;
    if (!this.isDue(task)) return;

    await this.runTask(task, idleMs);
  }

  private isDue(task: PeriodicTaskDef): boolean {
    const last = this.lastRunAt.get(task.id);
    return last === undefined || this.clock() - last >= task.intervalMs;
  }

  private async runTask(task: PeriodicTaskDef, idleMs: number): Promise<void> {
    if (task.canRun && !task.canRun()) return;

    this.currentlyRunning = task.id;
    this.lastRunAt.set(task.id, this.clock());

    try {
      await task.run(idleMs);
    } catch (err) {
      log.error(`Task "${task.name}" failed`, err);
    } finally {
      this.currentlyRunning = null;
    }
  }
}
