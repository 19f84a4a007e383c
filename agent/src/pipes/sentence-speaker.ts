/**
 * Speaks a streamed reply sentence by sentence while it arrives.
 *
 * Each sentence gets the same cleanup the stored reply gets: the role prefix
 * goes from the first one, asterisks and stage directions from all of them,
 * and with newlineCut nothing after the first line break is shown or spoken.
 * Sentences are spoken in order; a failed line is logged and skipped.
 */

import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../core/errors.js";
import { stripRolePrefixes, stripStageDirections, type PostProcessOptions } from "../conversation/post-process.js";

const log = createComponentLogger("speech");

const SENTENCE_END = /[.!?]+["')\]]*\s+/g;
const OPEN_BRACKET = /[[(]/;

const NO_CLEANUP: PostProcessOptions = { removeAsterisks: false, rpSuppression: false, newlineCut: false };

export interface SentenceSpeakerOptions {
  speak: (line: string) => Promise<void>;
  /** Called with each cleaned line as soon as it is queued */
  show?: (line: string) => void;
  output?: PostProcessOptions;
}

export class SentenceSpeaker {
  private buffer = "";
  private pending: Promise<void> = Promise.resolve();
  private readonly output: PostProcessOptions;
  private firstLine = true;
  private sawText = false;
  private cut = false;
  private cancelled = false;

  constructor(private readonly options: SentenceSpeakerOptions) {
    this.output = options.output ?? NO_CLEANUP;
  }

  push(chunk: string): void {
    if (this.cut || this.cancelled) return;
    let text = chunk;
    if (this.output.newlineCut) {
      const lineBreak = this.lineBreakIn(text);
      if (lineBreak >= 0) {
        text = text.slice(0, lineBreak);
        this.cut = true;
      }
    }
    this.buffer += text;

    let end = this.nextBoundary();
    while (end > 0) {
      this.enqueue(this.buffer.slice(0, end));
      this.buffer = this.buffer.slice(end);
      end = this.nextBoundary();
    }
  }

  /** Speak whatever is left and wait for every queued line */
  flush(): Promise<void> {
    if (!this.cancelled) this.enqueue(this.buffer);
    this.buffer = "";
    return this.pending;
  }

  /** Drop the unspoken tail and every queued line not yet started; resolves once the current line ends */
  cancel(): Promise<void> {
    this.buffer = "";
    this.cancelled = true;
    return this.pending;
  }

  // A line break before any visible text does not end the first line
  private lineBreakIn(text: string): number {
    for (let i = 0; i < text.length; i++) {
      const ch = text[i];
      if (ch === "\n" && this.sawText) return i;
      if (ch.trim()) this.sawText = true;
    }
    return -1;
  }

  private nextBoundary(): number {
    SENTENCE_END.lastIndex = 0;
    let match = SENTENCE_END.exec(this.buffer);
    while (match) {
      const end = match.index + match[0].length;
      if (!this.output.rpSuppression || !hasOpenBracket(this.buffer.slice(0, end))) return end;
      match = SENTENCE_END.exec(this.buffer);
    }
    return -1;
  }

  private clean(text: string): string {
    const line = this.firstLine && text.trim() ? stripRolePrefixes(text) : text;
    if (text.trim()) this.firstLine = false;
    return stripStageDirections(line, this.output).replace(/\s+/g, " ").trim();
  }

  private enqueue(text: string): void {
    const line = this.clean(text);
    if (!line) return;
    this.options.show?.(line);
    this.pending = this.pending.then(() =>
      this.cancelled
        ? undefined
        : this.options.speak(line).catch((err: unknown) => {
            log.warn("Speaking a streamed line failed", { error: errorMessage(err) });
          }),
    );
  }
}

/** A `[` or `(` still waiting for its closing bracket */
function hasOpenBracket(text: string): boolean {
  return OPEN_BRACKET.test(text.replace(/\[.*?\]/g, "").replace(/\(.*?\)/g, ""));
}
