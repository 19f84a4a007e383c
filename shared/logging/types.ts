/**
 * Logging Types
 *
 * Structured log entries, transports and the logger contract shared by
 * every workspace package.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG ENTRY
// ============================================

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Component that produced the log (e.g. "companion", "companion.pipes") */
  component: string;
  message: string;
  /** Structured data payload (already redacted) */
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  correlationId?: string;
  userId?: string;
  sessionId?: string;
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  /** Transport name for debugging */
  name: string;
  /** Minimum level this transport handles */
  minLevel: LogLevel;
  log(entry: LogEntry): void | Promise<void>;
  /** Flush any buffered logs (for graceful shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LogContext {
  component?: string;
  correlationId?: string;
  userId?: string;
  sessionId?: string;
}

/** Root of every component name; subsystems log as "companion.<name>" */
export const ROOT_COMPONENT = "companion";

export interface LoggerConfig {
  /** Entries below this level are ignored */
  minLevel: LogLevel;
  /** Defaults to ROOT_COMPONENT */
  component?: string;
  defaultContext?: Omit<LogContext, "component">;
  transports: LogTransport[];
  /** Data keys matching any of these are replaced with "[REDACTED]" */
  redactPatterns?: RegExp[];
  /** Keep last N entries in memory (served by the web surface) */
  ringBufferSize?: number;
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: LogContext): ILogger;

  setCorrelationId(id: string): void;

  /** Recent entries from the shared ring buffer */
  getRecentLogs(count?: number): LogEntry[];

  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

/**
 * Data keys kept out of every transport: the Gemini key in all its spellings
 * (apiKey, GEMINI_API_KEY, x-goog-api-key, the `key` query parameter), other
 * credentials, and base64 image payloads from the screenshot and image pipes.
 * `token$` leaves token counts such as maxTokens readable.
 */
export const DEFAULT_REDACT_PATTERNS = [
  /api[-_]?key/i,
  /^key$/i,
  /password/i,
  /secret/i,
  /token$/i,
  /authorization/i,
  /credential/i,
  /private/i,
  /base64/i,
];
