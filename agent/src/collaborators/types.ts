/**
 * Collaborator Interfaces
 *
 * The outside world as the core sees it. Audio capture, speech engines,
 * avatar software and cameras live behind these; the process ships with
 * terminal and console implementations.
 */

// ============================================
// COMMAND TOKENS
// ============================================

/** Tokens that map to a main pipe */
export const PIPE_COMMANDS = {
  CHAT: "Main-Chat",
  NEXT: "Main-Next",
  REDO: "Main-Redo",
  SOFT_RESET: "Main-Soft-Reset",
  ALARM: "Main-Alarm",
  VIEW: "Main-View-Image",
  BLANK: "Main-Blank",
  HANGOUT: "Hangout-Loop",
} as const;

export type PipeCommand = keyof typeof PIPE_COMMANDS;

/** Tokens handled inside the foreground loop */
export const CONTROL_COMMANDS = ["AUTOCHAT_TOGGLE", "SEMI_AUTO_TOGGLE", "VOLUME_UP", "VOLUME_DOWN"] as const;

export type ControlCommand = (typeof CONTROL_COMMANDS)[number];

export type KnownCommand = PipeCommand | ControlCommand;

export function isPipeCommand(token: string): token is PipeCommand {
  return Object.prototype.hasOwnProperty.call(PIPE_COMMANDS, token);
}

export function isControlCommand(token: string): token is ControlCommand {
  return CONTROL_COMMANDS.some(command => command === token);
}

// ============================================
// COLLABORATORS
// ============================================

export interface SpeechToText {
  transcribe(): Promise<string>;
}

export interface TextToSpeech {
  speak(text: string): Promise<void>;
  isSpeaking(): boolean;
  forceStop(): void;
  /** Step the output volume; returns the new level in [0, 1] */
  adjustVolume?(delta: number): number;
}

export interface AvatarControl {
  /** Fire-and-forget; implementations must not throw */
  setEmotionHint(text: string): void;
}

export interface ImageSource {
  /** Path of a captured image, or null when none is available */
  capture(): Promise<string | null>;
}

export interface CommandSource {
  /** Next raw token; null once the source is closed. Tokens may be unknown. */
  next(): Promise<string | null>;
  /** Drop tokens stacked up while a pipe was running */
  wipe(): void;
  push(token: string): void;
  close(): void;
  /** Whether new speech issues CHAT by itself (off means push-to-talk) */
  setAutoChat?(enabled: boolean): void;
}

/** Where replies are shown */
export interface Display {
  reply(speaker: string, text: string): void;
  chunk(text: string): void;
  endStream(): void;
  notice(text: string): void;
}
