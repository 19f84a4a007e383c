/**
 * Pipe Dispatcher
 *
 * Single consumer of the command channel. Requests are handled one at a
 * time in arrival order. At most one *main* request (a user-facing
 * exchange) is queued or running at once: asking for a second is refused
 * with MainPipeBusyError rather than queued behind the first.
 *
 * Every change of the main flag is emitted as a "main-state" event.
 */

import { EventEmitter } from "events";
import { nanoid } from "nanoid";
import { createComponentLogger } from "../logging.js";
import { MainPipeBusyError } from "../core/errors.js";
import { AsyncQueue } from "./queue.js";

const log = createComponentLogger("pipes");

// ============================================
// TYPES
// ============================================

export interface PipeRequest {
  id: string;
  processName: string;
  isMain: boolean;
  /** Epoch ms */
  enqueuedAt: number;
}

export type PipeHandler = (request: PipeRequest) => Promise<void>;

export interface EnqueueResult {
  request: PipeRequest;
  /** Settles after the request ran (or was dropped). Never rejects. */
  done: Promise<void>;
}

export interface DispatcherStatus {
  running: boolean;
  mainPipeRunning: boolean;
  queued: number;
  processed: number;
  current: string | null;
}

interface QueuedRequest {
  request: PipeRequest;
  settle: () => void;
}

// ============================================
// DISPATCHER
// ============================================

export class PipeDispatcher {
  private readonly handlers = new Map<string, PipeHandler>();
  private readonly queue = new AsyncQueue<QueuedRequest>();
  private readonly events = new EventEmitter();
  private mainInFlight: string | null = null;
  private current: PipeRequest | null = null;
  private processed = 0;
  private loop: Promise<void> | null = null;

  constructor(handlers: Record<string, PipeHandler> = {}, private readonly clock: () => number = Date.now) {
    for (const [name, handler] of Object.entries(handlers)) this.register(name, handler);
  }

  register(processName: string, handler: PipeHandler): void {
    this.handlers.set(processName, handler);
  }

  get mainPipeRunning(): boolean {
    return this.mainInFlight !== null;
  }

  onMainState(listener: (running: boolean) => void): () => void {
    this.events.on("main-state", listener);
    return () => this.events.off("main-state", listener);
  }

  // ============================================
  // PRODUCER SIDE
  // ============================================

  /**
   * Queue a request. Throws MainPipeBusyError for a main request while
   * another one is queued or running.
   */
  enqueue(processName: string, isMain = false): EnqueueResult {
    if (isMain && this.mainInFlight !== null) {
      throw new MainPipeBusyError(processName, this.mainInFlight);
    }
    if (this.queue.isClosed) throw new Error("Pipe dispatcher is stopped");

    const request: PipeRequest = { id: nanoid(10), processName, isMain, enqueuedAt: this.clock() };
    let settle: () => void = () => undefined;
    const done = new Promise<void>(resolve => {
      settle = resolve;
    });

    if (isMain) this.setMain(processName);
    this.queue.push({ request, settle });
    log.debug(`Queued ${processName}`, { id: request.id, isMain, queued: this.queue.size });

    return { request, done };
  }

  /** Resolves once no main request is queued or running */
  waitForMainIdle(): Promise<void> {
    if (this.mainInFlight === null) return Promise.resolve();
    return new Promise(resolve => {
      const off = this.onMainState(running => {
        if (running) return;
        off();
        resolve();
      });
    });
  }

  /** Drop everything still queued; returns how many requests were dropped */
  clearQueue(): number {
    const dropped = this.queue.drain();
    for (const item of dropped) {
      if (item.request.isMain) this.setMain(null);
      item.settle();
    }
    if (dropped.length > 0) log.info(`Cleared ${dropped.length} queued pipe(s)`);
    return dropped.length;
  }

  getStatus(): DispatcherStatus {
    return {
      running: this.loop !== null,
      mainPipeRunning: this.mainPipeRunning,
      queued: this.queue.size,
      processed: this.processed,
      current: this.current?.processName ?? null,
    };
  }

  // ============================================
  // CONSUMER SIDE
  // ============================================

  start(): void {
    if (this.loop) return;
    this.loop = this.run().finally(() => {
      this.loop = null;
    });
    log.info("Pipe dispatcher started", { handlers: [...this.handlers.keys()] });
  }

  /** Stop after the current request; queued requests are dropped */
  async stop(): Promise<void> {
    const loop = this.loop;
    this.clearQueue();
    this.queue.close();
    if (loop) await loop;
    log.info("Pipe dispatcher stopped");
  }

  private async run(): Promise<void> {
    while (true) {
      const item = await this.queue.next();
      if (item === null) return;
      await this.execute(item);
    }
  }

  private async execute({ request, settle }: QueuedRequest): Promise<void> {
    this.current = request;
    const handler = this.handlers.get(request.processName);

    try {
      if (!handler) {
        log.warn(`Unknown pipe "${request.processName}"; dropped`, { id: request.id });
      } else {
        await handler(request);
      }
    } catch (err) {
      log.error(`Pipe "${request.processName}" failed`, err);
    } finally {
      this.current = null;
      this.processed++;
      if (request.isMain) this.setMain(null);
      settle();
    }
  }

  private setMain(processName: string | null): void {
    const wasRunning = this.mainInFlight !== null;
    this.mainInFlight = processName;
    const running = processName !== null;
    if (wasRunning !== running) this.events.emit("main-state", running);
  }
}
