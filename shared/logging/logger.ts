/**
 * Core Logger Implementation
 *
 * Structured logging with multiple transports. Child loggers share their
 * parent's transports and ring buffer, so the buffer behind the web
 * surface's log view holds every subsystem's recent entries, not just the
 * root's. Data payloads are redacted before they reach the buffer.
 */

import {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  ROOT_COMPONENT,
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
  type LogContext,
  type ILogger,
} from "./types.js";

// ============================================
// RING BUFFER
// ============================================

export class RingBuffer<T> {
  private buffer: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(private readonly capacity: number) {
    this.buffer = new Array<T | undefined>(capacity);
  }

  push(item: T): void {
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  getAll(): T[] {
    if (this.count === 0) return [];
    const ordered = this.count < this.capacity
      ? this.buffer.slice(0, this.count)
      : [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
    return ordered.filter((item): item is T => item !== undefined);
  }

  getLast(n: number): T[] {
    return this.getAll().slice(-n);
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly componentName: string;
  private readonly redactPatterns: RegExp[];
  private readonly ringBuffer: RingBuffer<LogEntry>;
  private context: Omit<LogContext, "component">;

  constructor(config: LoggerConfig, sharedBuffer?: RingBuffer<LogEntry>) {
    this.config = config;
    this.componentName = config.component ?? ROOT_COMPONENT;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.ringBuffer = sharedBuffer ?? new RingBuffer<LogEntry>(config.ringBufferSize ?? 1000);
    this.context = { ...config.defaultContext };
  }

  get component(): string {
    return this.componentName;
  }

  // ----------------------------------------
  // Log Methods
  // ----------------------------------------

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private write(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.componentName,
      message,
    };
    if (this.context.correlationId) entry.correlationId = this.context.correlationId;
    if (this.context.userId) entry.userId = this.context.userId;
    if (this.context.sessionId) entry.sessionId = this.context.sessionId;

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: "Unknown", message: String(error) };
    }

    this.ringBuffer.push(entry);

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] < LOG_LEVELS[transport.minLevel]) continue;
      try {
        const pending = transport.log(entry);
        if (pending) {
          pending.catch((e: unknown) => {
            console.error(`[logging] ${transport.name} transport failed:`, e);
          });
        }
      } catch (e) {
        console.error(`[logging] ${transport.name} transport failed:`, e);
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context Management
  // ----------------------------------------

  child(context: LogContext): ILogger {
    const { component, ...rest } = context;
    return new Logger(
      {
        ...this.config,
        component: component || this.componentName,
        defaultContext: { ...this.context, ...rest },
      },
      this.ringBuffer
    );
  }

  setCorrelationId(id: string): void {
    this.context.correlationId = id;
  }

  // ----------------------------------------
  // Buffer Access
  // ----------------------------------------

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.ringBuffer.getLast(count);
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map(t => t.close?.()));
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

// ============================================
// GLOBAL LOGGER SINGLETON
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}

export function log(): Logger {
  return getLogger();
}
