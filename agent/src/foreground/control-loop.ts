/**
 * Foreground Control Loop
 *
 * awaiting-command → dispatching → awaiting-command. Reads one token from
 * the command source, turns pipe tokens into main requests and waits for
 * each to finish before reading the next. Tokens stacked up meanwhile are
 * wiped; semi-auto mode re-arms CHAT after every main request.
 */

import { createComponentLogger } from "../logging.js";
import { MainPipeBusyError } from "../core/errors.js";
import {
  PIPE_COMMANDS,
  isControlCommand,
  isPipeCommand,
  type CommandSource,
  type ControlCommand,
  type Display,
  type TextToSpeech,
} from "../collaborators/types.js";
import type { PipeDispatcher } from "../pipes/dispatcher.js";

const log = createComponentLogger("foreground");

const VOLUME_STEP = 0.1;

export type LoopState = "stopped" | "awaiting-command" | "dispatching";

export interface ControlLoopOptions {
  commands: CommandSource;
  dispatcher: Pick<PipeDispatcher, "enqueue">;
  display: Display;
  tts?: TextToSpeech;
  /** Told about every command, so idle-gated background work waits */
  activity?: { notifyActivity(): void };
  semiAutoChat?: boolean;
  autoChat?: boolean;
}

export interface ControlLoopStatus {
  state: LoopState;
  semiAutoChat: boolean;
  autoChat: boolean;
  handled: number;
}

export class ControlLoop {
  private state: LoopState = "stopped";
  private semiAutoChat: boolean;
  private autoChat: boolean;
  private handled = 0;
  private stopping = false;

  constructor(private readonly options: ControlLoopOptions) {
    this.semiAutoChat = options.semiAutoChat ?? false;
    this.autoChat = options.autoChat ?? true;
    options.commands.setAutoChat?.(this.autoChat);
  }

  /** Resolves once the command source closes or stop() is called */
  async run(): Promise<void> {
    this.stopping = false;
    this.state = "awaiting-command";
    log.info("Foreground loop running");

    while (!this.stopping) {
      const token = await this.options.commands.next();
      if (token === null) break;
      await this.handle(token);
    }

    this.state = "stopped";
    log.info("Foreground loop ended");
  }

  stop(): void {
    this.stopping = true;
    this.options.commands.close();
  }

  async handle(token: string): Promise<void> {
    this.options.activity?.notifyActivity();
    this.handled++;

    if (isControlCommand(token)) {
      this.control(token);
      return;
    }
    if (!isPipeCommand(token)) {
      log.warn(`Unknown command "${token}"; skipped`);
      return;
    }

    await this.dispatch(PIPE_COMMANDS[token]);

    this.options.commands.wipe();
    if (this.semiAutoChat && !this.stopping) this.options.commands.push("CHAT");
    this.options.activity?.notifyActivity();
  }

  private async dispatch(processName: string): Promise<void> {
    this.state = "dispatching";
    try {
      const { done } = this.options.dispatcher.enqueue(processName, true);
      await done;
    } catch (err) {
      if (err instanceof MainPipeBusyError) {
        log.warn(err.message);
      } else {
        log.error(`Could not dispatch ${processName}`, err);
      }
    } finally {
      this.state = "awaiting-command";
    }
  }

  private control(command: ControlCommand): void {
    switch (command) {
      case "AUTOCHAT_TOGGLE":
        this.autoChat = !this.autoChat;
        this.options.commands.setAutoChat?.(this.autoChat);
        this.options.display.notice(`Autochat ${this.autoChat ? "on" : "off"}`);
        return;
      case "SEMI_AUTO_TOGGLE":
        this.semiAutoChat = !this.semiAutoChat;
        this.options.display.notice(`Semi-auto chat ${this.semiAutoChat ? "on" : "off"}`);
        return;
      case "VOLUME_UP":
      case "VOLUME_DOWN": {
        const adjust = this.options.tts?.adjustVolume;
        if (!this.options.tts || !adjust) {
          this.options.display.notice("Volume control unavailable");
          return;
        }
        const level = adjust.call(this.options.tts, command === "VOLUME_UP" ? VOLUME_STEP : -VOLUME_STEP);
        this.options.display.notice(`Volume ${Math.round(level * 100)}%`);
        return;
      }
    }
  }

  getStatus(): ControlLoopStatus {
    return {
      state: this.state,
      semiAutoChat: this.semiAutoChat,
      autoChat: this.autoChat,
      handled: this.handled,
    };
  }
}
