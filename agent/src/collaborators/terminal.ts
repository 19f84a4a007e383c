/**
 * Terminal Input
 *
 * One readline interface feeds both the command source and the transcript
 * source. A line starting with "/" is a command: a key from the hotkey map
 * ("/n"), an action name ("/next") or a raw token ("/NEXT"). Any other
 * non-empty line is typed speech: it is queued as the next transcript and,
 * with autochat on, a CHAT command is issued for it. With autochat off the
 * line waits for an explicit "/chat".
 */

import * as path from "path";
import { createInterface, type Interface as ReadlineInterface } from "readline";
import { createComponentLogger } from "../logging.js";
import { loadOrSeed, readShippedDefault } from "../core/json-store.js";
import { isRecord } from "../core/validate.js";
import { AsyncQueue } from "../pipes/queue.js";
import type { CommandSource, KnownCommand, SpeechToText } from "./types.js";

const log = createComponentLogger("terminal");

// ============================================
// HOTKEYS
// ============================================

/** Logical action in hotkeys.json → command token */
export const HOTKEY_ACTIONS: Record<string, KnownCommand> = {
  chat: "CHAT",
  next: "NEXT",
  redo: "REDO",
  soft_reset: "SOFT_RESET",
  alarm: "ALARM",
  view_image: "VIEW",
  blank: "BLANK",
  hangout: "HANGOUT",
  autochat_toggle: "AUTOCHAT_TOGGLE",
  semi_auto_toggle: "SEMI_AUTO_TOGGLE",
  volume_up: "VOLUME_UP",
  volume_down: "VOLUME_DOWN",
};

function actionToken(action: string): KnownCommand | undefined {
  return Object.prototype.hasOwnProperty.call(HOTKEY_ACTIONS, action) ? HOTKEY_ACTIONS[action] : undefined;
}

/** Key binding → command token. Unknown actions are ignored. */
export function parseHotkeys(raw: unknown): Map<string, KnownCommand> | null {
  if (!isRecord(raw)) return null;
  const bindings = new Map<string, KnownCommand>();
  for (const [action, key] of Object.entries(raw)) {
    const token = actionToken(action);
    if (!token || typeof key !== "string" || !key) continue;
    bindings.set(key.toLowerCase(), token);
  }
  return bindings.size > 0 ? bindings : null;
}

export async function loadHotkeys(configDir: string): Promise<Map<string, KnownCommand>> {
  return loadOrSeed(
    path.join(configDir, "Hotkeys", "hotkeys.json"),
    readShippedDefault("hotkeys.json"),
    parseHotkeys,
  );
}

/** Resolve the text after "/" to a token; unknown words are passed through upper-cased */
export function resolveCommand(word: string, bindings: Map<string, KnownCommand>): string {
  const lower = word.trim().toLowerCase();
  return bindings.get(lower) ?? actionToken(lower) ?? word.trim().toUpperCase();
}

// ============================================
// TERMINAL
// ============================================

export interface TerminalOptions {
  bindings: Map<string, KnownCommand>;
  input?: NodeJS.ReadableStream;
}

export class TerminalInput implements CommandSource, SpeechToText {
  private readonly commands = new AsyncQueue<string>();
  private readonly transcripts: string[] = [];
  private rl: ReadlineInterface | null = null;
  private autoChat = true;

  constructor(private readonly options: TerminalOptions) {}

  start(): void {
    if (this.rl) return;
    this.rl = createInterface({ input: this.options.input ?? process.stdin, terminal: false });
    this.rl.on("line", line => this.handleLine(line));
    this.rl.on("close", () => this.close());
    log.info("Terminal input ready; type to chat, /<key> for commands");
  }

  handleLine(line: string): void {
    const text = line.trim();
    if (!text || this.commands.isClosed) return;

    if (text.startsWith("/")) {
      const token = resolveCommand(text.slice(1), this.options.bindings);
      this.commands.push(token);
      return;
    }

    this.transcripts.push(text);
    if (this.autoChat) this.commands.push("CHAT");
  }

  // CommandSource

  next(): Promise<string | null> {
    return this.commands.next();
  }

  /** Also drops the typed lines that belonged to wiped CHAT commands */
  wipe(): void {
    const dropped = this.commands.drain();
    this.transcripts.length = 0;
    if (dropped.length > 0) log.debug(`Wiped ${dropped.length} stacked input(s)`);
  }

  push(token: string): void {
    if (!this.commands.isClosed) this.commands.push(token);
  }

  setAutoChat(enabled: boolean): void {
    this.autoChat = enabled;
  }

  close(): void {
    if (this.commands.isClosed) return;
    this.commands.close();
    this.rl?.close();
    this.rl = null;
  }

  // SpeechToText

  /** Oldest typed line not yet consumed; empty when there is none */
  async transcribe(): Promise<string> {
    return this.transcripts.shift() ?? "";
  }
}
