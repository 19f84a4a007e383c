/**
 * Pipe Handlers
 *
 * The work behind each process name the dispatcher knows. Every conversational
 * handler ends the same way: run the message checks (print, avatar hint,
 * kill phrase) and speak the reply unless it was already spoken while
 * streaming.
 */

import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../core/errors.js";
import { loadImage as readImageFile, type ImageAttachment } from "../collaborators/image-file.js";
import type { AvatarControl, Display, ImageSource, SpeechToText, TextToSpeech } from "../collaborators/types.js";
import type { ResponseController, SendOptions } from "../conversation/response-controller.js";
import type { PostProcessOptions } from "../conversation/post-process.js";
import type { PipeHandler } from "./dispatcher.js";
import { SentenceSpeaker } from "./sentence-speaker.js";

const log = createComponentLogger("pipes");

export const KILL_PHRASE = "/ripout/";
export const MIN_TRANSCRIPT_LENGTH = 2;
export const VIEW_IMAGE_PROMPT = "[Looking at image] What do you see in this image? Describe it in your characteristic style.";
export const BLANK_NUDGE = "[The user hasn't said anything for a while. Say something to keep the conversation going.]";

export type Conversation = Pick<ResponseController, "sendMessage" | "regenerateLast" | "clearHistory" | "lastMessageStreamed">;

export interface PipeHandlerDeps {
  conversation: Conversation;
  stt: SpeechToText;
  tts: TextToSpeech;
  display: Display;
  images: ImageSource;
  avatar?: AvatarControl;
  tags?: { clear(): Promise<string[]> };
  alarms?: { runDue(): Promise<string[]> };
  hangout?: { runRound(): Promise<unknown> };
  characterName: () => string;
  /** Send avatar emotion hints */
  avatarEnabled: boolean;
  /** Cleanup for streamed lines; none when absent */
  output?: PostProcessOptions;
  /** Hard exit, used by the kill phrase */
  exit: (code: number) => void;
  loadImage?: (filePath: string) => Promise<ImageAttachment>;
}

export interface PipeHandlerSet {
  handlers: Record<string, PipeHandler>;
  /** Transcript of the last Main-Chat, re-sent by Main-Redo */
  lastTranscript(): string | null;
}

export function createPipeHandlers(deps: PipeHandlerDeps): PipeHandlerSet {
  let storedTranscript: string | null = null;
  const loadImage = deps.loadImage ?? readImageFile;

  /** Send with live display and speech of streamed chunks */
  async function converse(run: (options: SendOptions) => Promise<string | null>): Promise<string | null> {
    let shown = 0;
    const speaker = new SentenceSpeaker({
      speak: line => deps.tts.speak(line),
      show: line => {
        deps.display.chunk(shown > 0 ? ` ${line}` : line);
        shown++;
      },
      output: deps.output,
    });
    const reply = await run({ onChunk: text => speaker.push(text) });

    // A stream that failed part way leaves a fallback reply to speak once the current line ends
    const streamed = deps.conversation.lastMessageStreamed;
    const speaking = streamed ? speaker.flush() : speaker.cancel();
    if (shown > 0) deps.display.endStream();
    await speaking;
    if (reply === null) return null;

    messageChecks(reply, streamed);
    if (!streamed) await speak(reply);
    return reply;
  }

  function messageChecks(reply: string, streamed: boolean): void {
    if (!streamed) deps.display.reply(deps.characterName(), reply);

    if (deps.avatarEnabled && !streamed && deps.avatar) {
      try {
        deps.avatar.setEmotionHint(reply);
      } catch (err) {
        log.warn("Avatar hint failed", { error: errorMessage(err) });
      }
    }

    if (reply.toLowerCase().includes(KILL_PHRASE)) {
      log.warn("Kill phrase in reply; closing the program");
      deps.exit(0);
    }
  }

  async function speak(text: string): Promise<void> {
    try {
      await deps.tts.speak(text);
    } catch (err) {
      log.warn("Speech failed", { error: errorMessage(err) });
    }
  }

  const handlers: Record<string, PipeHandler> = {
    "Main-Chat": async () => {
      const transcript = (await deps.stt.transcribe()).trim();
      if (transcript.length < MIN_TRANSCRIPT_LENGTH) {
        log.info("Transcribed chat is blank; cancelling");
        return;
      }
      storedTranscript = transcript;
      await converse(options => deps.conversation.sendMessage(transcript, options));
    },

    "Main-Next": async () => {
      const reply = await converse(options => deps.conversation.regenerateLast(options));
      if (reply === null) deps.display.notice("Nothing to regenerate yet");
    },

    "Main-Redo": async () => {
      const transcript = storedTranscript;
      if (!transcript) {
        deps.display.notice("Nothing to redo yet");
        return;
      }
      await converse(options => deps.conversation.sendMessage(transcript, options));
    },

    "Main-Soft-Reset": async () => {
      deps.tts.forceStop();
      deps.conversation.clearHistory();
      const cleared = (await deps.tags?.clear()) ?? [];
      deps.display.notice(`Soft reset done${cleared.length > 0 ? ` (cleared tags: ${cleared.join(", ")})` : ""}`);
    },

    "Main-Alarm": async () => {
      if (!deps.alarms) {
        log.info("Alarms are disabled");
        return;
      }
      const fired = await deps.alarms.runDue();
      if (fired.length === 0) deps.display.notice("No alarms due");
    },

    "Main-View-Image": async () => {
      const imagePath = await deps.images.capture();
      if (!imagePath) {
        deps.display.notice("No image available");
        return;
      }
      const image = await loadImage(imagePath);
      await converse(options => deps.conversation.sendMessage(VIEW_IMAGE_PROMPT, { ...options, images: [image] }));
    },

    "Main-Blank": async () => {
      await converse(options => deps.conversation.sendMessage(BLANK_NUDGE, options));
    },

    "Hangout-Loop": async () => {
      if (!deps.hangout) {
        log.info("Hangout mode is disabled");
        return;
      }
      await deps.hangout.runRound();
    },
  };

  return { handlers, lastTranscript: () => storedTranscript };
}
