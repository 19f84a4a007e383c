/**
 * Centralized Logging
 *
 * Usage:
 *
 * ```typescript
 * import { initLogger, log, ConsoleTransport, FileTransport } from "@companion/shared/logging";
 *
 * initLogger({
 *   minLevel: "debug",
 *   transports: [
 *     new ConsoleTransport({ colors: true }),
 *     new FileTransport({ logDir: "data/logs" })
 *   ]
 * });
 *
 * log().info("Starting up", { version: "0.1.0" });
 * const pipeLog = log().child({ component: "companion.pipes" });
 * pipeLog.debug("Dispatcher idle");
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  ROOT_COMPONENT,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LogContext,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

export {
  Logger,
  RingBuffer,
  initLogger,
  getLogger,
  log,
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions,
} from "./transports/index.js";
