/**
 * Console Transport
 *
 * Human-readable, color-coded output for the terminal the companion talks
 * in. Subsystem labels drop the root name, so "companion.pipes" prints as
 * [pipes] between the user's turns.
 */

import { ROOT_COMPONENT, type LogTransport, type LogEntry, type LogLevel } from "../types.js";

// ============================================
// COLOR CODES
// ============================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
  bgRed: "\x1b[41m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.bgRed + COLORS.white,
  silent: COLORS.reset,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
  fatal: "FTL",
  silent: "   ",
};

// ============================================
// CONSOLE TRANSPORT
// ============================================

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Use colors (default: only when stdout is a TTY) */
  colors?: boolean;
  timestamps?: boolean;
  showComponent?: boolean;
  /** Prefix dropped from component labels (default "companion") */
  rootComponent?: string;
  /** Pretty print data objects across lines */
  prettyPrint?: boolean;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private colors: boolean;
  private timestamps: boolean;
  private showComponent: boolean;
  private rootPrefix: string;
  private prettyPrint: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "debug";
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.timestamps = options.timestamps ?? true;
    this.showComponent = options.showComponent ?? true;
    this.rootPrefix = `${options.rootComponent ?? ROOT_COMPONENT}.`;
    this.prettyPrint = options.prettyPrint ?? true;
  }

  log(entry: LogEntry): void {
    const output = this.format(entry);

    switch (entry.level) {
      case "trace":
      case "debug":
        console.debug(output);
        break;
      case "info":
        console.info(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "error":
      case "fatal":
        console.error(output);
        break;
      case "silent":
        break;
    }
  }

  format(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.timestamps) {
      // HH:MM:SS out of the ISO timestamp
      parts.push(this.colorize(entry.timestamp.slice(11, 19), COLORS.dim));
    }

    parts.push(this.colorize(LEVEL_LABELS[entry.level], LEVEL_COLORS[entry.level]));

    if (this.showComponent) {
      parts.push(this.colorize(`[${this.label(entry.component)}]`, COLORS.magenta));
    }

    if (entry.correlationId) {
      parts.push(this.colorize(`(${entry.correlationId.slice(0, 8)})`, COLORS.dim));
    }

    parts.push(entry.message);

    let output = parts.join(" ");

    if (entry.data && Object.keys(entry.data).length > 0) {
      output += this.prettyPrint
        ? "\n" + this.colorize(JSON.stringify(entry.data, null, 2), COLORS.dim)
        : " " + this.colorize(JSON.stringify(entry.data), COLORS.dim);
    }

    if (entry.error) {
      output += "\n" + this.colorize(`${entry.error.name}: ${entry.error.message}`, COLORS.red);
      if (entry.error.stack) {
        output += "\n" + this.colorize(entry.error.stack, COLORS.dim);
      }
    }

    return output;
  }

  private label(component: string): string {
    return component.startsWith(this.rootPrefix) ? component.slice(this.rootPrefix.length) : component;
  }

  private colorize(text: string, color: string): string {
    if (!this.colors) return text;
    return `${color}${text}${COLORS.reset}`;
  }
}
