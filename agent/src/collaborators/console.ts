/**
 * Console implementations of the output collaborators.
 */

import { promises as fs } from "fs";
import { createComponentLogger } from "../logging.js";
import type { AvatarControl, Display, ImageSource, TextToSpeech } from "./types.js";

const log = createComponentLogger("console");

const COLORS = {
  reset: "\x1b[0m",
  green: "\x1b[32m",
  magenta: "\x1b[35m",
  gray: "\x1b[90m",
};

export interface Output {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

// ============================================
// DISPLAY
// ============================================

export class ConsoleDisplay implements Display {
  private readonly colors: boolean;

  constructor(private readonly out: Output = process.stdout) {
    this.colors = out.isTTY === true;
  }

  private paint(color: string, text: string): string {
    return this.colors ? `${color}${text}${COLORS.reset}` : text;
  }

  reply(speaker: string, text: string): void {
    this.out.write(`${this.paint(COLORS.magenta, `----${speaker}----`)}\n${text}\n\n`);
  }

  chunk(text: string): void {
    this.out.write(text);
  }

  endStream(): void {
    this.out.write("\n\n");
  }

  notice(text: string): void {
    this.out.write(`${this.paint(COLORS.gray, text)}\n`);
  }
}

// ============================================
// SPEECH
// ============================================

/** Stands in for a voice engine: "speaks" by printing the line */
export class ConsoleSpeech implements TextToSpeech {
  private speaking = false;
  private volume = 1;

  constructor(private readonly out: Output = process.stdout) {}

  async speak(text: string): Promise<void> {
    if (!text.trim()) return;
    this.speaking = true;
    try {
      this.out.write(`[voice ${Math.round(this.volume * 100)}%] ${text}\n`);
    } finally {
      this.speaking = false;
    }
  }

  isSpeaking(): boolean {
    return this.speaking;
  }

  forceStop(): void {
    this.speaking = false;
  }

  adjustVolume(delta: number): number {
    this.volume = Math.min(1, Math.max(0, Math.round((this.volume + delta) * 100) / 100));
    return this.volume;
  }
}

// ============================================
// AVATAR / CAMERA
// ============================================

/** Logs emotion hints instead of driving an avatar */
export class LoggingAvatar implements AvatarControl {
  setEmotionHint(text: string): void {
    log.debug("Emotion hint", { preview: text.slice(0, 80) });
  }
}

export class NullImageSource implements ImageSource {
  async capture(): Promise<string | null> {
    return null;
  }
}

/** Serves a fixed image file, when it exists */
export class FileImageSource implements ImageSource {
  constructor(private readonly filePath: string) {}

  async capture(): Promise<string | null> {
    try {
      await fs.access(this.filePath);
      return this.filePath;
    } catch {
      log.debug("No image available", { path: this.filePath });
      return null;
    }
  }
}
