/**
 * Logging Setup for the Companion
 *
 * Initializes the centralized logging system with console and file
 * transports. Falls back to environment defaults when a component logger
 * is requested before explicit initialization.
 */

import * as path from "path";
import {
  initLogger,
  isLogLevel,
  Logger,
  ROOT_COMPONENT,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type LogTransport,
} from "@companion/shared/logging";

export interface LoggingOptions {
  /** Minimum level to log (default: LOG_LEVEL, else "debug") */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Enable file output (default: LOG_TO_FILE, else true) */
  file?: boolean;
  /** Directory for log files (default: LOG_DIR, else data/logs) */
  logDir?: string;
  colors?: boolean;
}

let logger: Logger | null = null;

function optionsFromEnv(env: NodeJS.ProcessEnv): LoggingOptions {
  const level = env.LOG_LEVEL?.toLowerCase();
  return {
    minLevel: level && isLogLevel(level) ? level : undefined,
    file: env.LOG_TO_FILE === undefined ? undefined : env.LOG_TO_FILE.toLowerCase() === "true",
    logDir: env.LOG_DIR || path.join(env.DATA_DIR || "data", "logs"),
  };
}

/**
 * Initialize the logging system for the companion process.
 */
export function initAgentLogging(options: LoggingOptions = {}): Logger {
  const merged = { ...optionsFromEnv(process.env), ...stripUndefined(options) };
  const minLevel = merged.minLevel ?? "debug";

  const transports: LogTransport[] = [];

  if (merged.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: merged.colors,
      prettyPrint: process.env.NODE_ENV !== "production",
    }));
  }

  if (merged.file !== false && minLevel !== "silent") {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: merged.logDir ?? path.join("data", "logs"),
      filename: "companion",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 5,
    }));
  }

  logger = initLogger({
    minLevel,
    component: ROOT_COMPONENT,
    transports,
    ringBufferSize: 1000,
  });

  return logger;
}

/**
 * The companion's root logger. Auto-initializes from the environment.
 */
export function getAgentLogger(): Logger {
  return logger ?? initAgentLogging();
}

/**
 * Create a namespaced logger for a specific component.
 *
 * ```typescript
 * const pipeLog = createComponentLogger("pipes");
 * pipeLog.info("Dispatcher started"); // "companion.pipes", printed as [pipes]
 * ```
 */
export function createComponentLogger(component: string): ILogger {
  return new ComponentLogger(`${ROOT_COMPONENT}.${component}`);
}

/**
 * Module-level loggers are created at import time, before the bootstrap
 * calls initAgentLogging(). This wrapper re-binds to the current root.
 */
class ComponentLogger implements ILogger {
  private boundRoot: Logger | null = null;
  private bound: ILogger | null = null;

  constructor(private readonly component: string) {}

  private target(): ILogger {
    const root = getAgentLogger();
    if (this.bound && this.boundRoot === root) return this.bound;
    const child = root.child({ component: this.component });
    this.boundRoot = root;
    this.bound = child;
    return child;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.target().trace(message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.target().debug(message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.target().info(message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.target().warn(message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.target().error(message, error, data);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.target().fatal(message, error, data);
  }

  child(context: LogContext): ILogger {
    return this.target().child(context);
  }

  setCorrelationId(id: string): void {
    this.target().setCorrelationId(id);
  }

  getRecentLogs(count?: number): LogEntry[] {
    return this.target().getRecentLogs(count);
  }

  flush(): Promise<void> {
    return this.target().flush();
  }
}

function stripUndefined(options: LoggingOptions): LoggingOptions {
  const result: LoggingOptions = {};
  if (options.minLevel !== undefined) result.minLevel = options.minLevel;
  if (options.console !== undefined) result.console = options.console;
  if (options.file !== undefined) result.file = options.file;
  if (options.logDir !== undefined) result.logDir = options.logDir;
  if (options.colors !== undefined) result.colors = options.colors;
  return result;
}
