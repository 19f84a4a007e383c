/**
 * Pipe handler tests, with fake collaborators and a scripted conversation.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { BLANK_NUDGE, VIEW_IMAGE_PROMPT, createPipeHandlers, type Conversation, type PipeHandlerDeps } from "./handlers.js";
import { PipeDispatcher, type PipeRequest } from "./dispatcher.js";
import { SentenceSpeaker } from "./sentence-speaker.js";
import type { Display, TextToSpeech } from "../collaborators/types.js";
import type { SendOptions } from "../conversation/response-controller.js";

class ScriptedConversation implements Conversation {
  lastMessageStreamed = false;
  replies: string[] = [];
  chunks: string[] | null = null;
  regenerated: string | null = null;
  sent: Array<{ text: string; options: SendOptions }> = [];
  cleared = 0;

  async sendMessage(text: string, options: SendOptions = {}): Promise<string> {
    this.sent.push({ text, options });
    if (this.chunks) {
      for (const chunk of this.chunks) options.onChunk?.(chunk);
      this.lastMessageStreamed = true;
      return this.chunks.join("");
    }
    this.lastMessageStreamed = false;
    return this.replies.shift() ?? "";
  }

  async regenerateLast(_options: SendOptions = {}): Promise<string | null> {
    this.lastMessageStreamed = false;
    return this.regenerated;
  }

  clearHistory(): void {
    this.cleared++;
  }
}

class RecordingDisplay implements Display {
  events: string[] = [];
  reply(speaker: string, text: string): void {
    this.events.push(`reply ${speaker}: ${text}`);
  }
  chunk(text: string): void {
    this.events.push(`chunk ${text}`);
  }
  endStream(): void {
    this.events.push("end");
  }
  notice(text: string): void {
    this.events.push(`notice ${text}`);
  }
}

class RecordingSpeech implements TextToSpeech {
  spoken: string[] = [];
  stops = 0;
  async speak(text: string): Promise<void> {
    this.spoken.push(text);
  }
  isSpeaking(): boolean {
    return false;
  }
  forceStop(): void {
    this.stops++;
  }
}

const REQUEST: PipeRequest = { id: "r1", processName: "test", isMain: true, enqueuedAt: 0 };

function setup(transcript = "  hello  ", overrides: Partial<PipeHandlerDeps> = {}) {
  const conversation = new ScriptedConversation();
  const display = new RecordingDisplay();
  const tts = new RecordingSpeech();
  const setEmotionHint = vi.fn((_text: string) => {});
  const exit = vi.fn((_code: number) => {});
  const set = createPipeHandlers({
    conversation,
    stt: { transcribe: async () => transcript },
    tts,
    display,
    images: { capture: async () => null },
    avatar: { setEmotionHint },
    characterName: () => "Lily",
    avatarEnabled: true,
    exit,
    ...overrides,
  });
  const run = (name: string) => set.handlers[name](REQUEST);
  return { conversation, display, tts, setEmotionHint, exit, set, run };
}

describe("Main-Chat", () => {
  it("sends the transcript, prints, hints the avatar and speaks", async () => {
    const { conversation, display, tts, setEmotionHint, set, run } = setup();
    conversation.replies.push("Hi there!");

    await run("Main-Chat");

    expect(conversation.sent.map(s => s.text)).toEqual(["hello"]);
    expect(display.events).toEqual(["reply Lily: Hi there!"]);
    expect(setEmotionHint).toHaveBeenCalledWith("Hi there!");
    expect(tts.spoken).toEqual(["Hi there!"]);
    expect(set.lastTranscript()).toBe("hello");
  });

  it("ignores transcripts shorter than two characters", async () => {
    const { conversation, tts, run } = setup(" a ");

    await run("Main-Chat");

    expect(conversation.sent).toEqual([]);
    expect(tts.spoken).toEqual([]);
  });

  it("shows and speaks a streamed reply as it arrives, without repeating it", async () => {
    const { conversation, display, tts, setEmotionHint, run } = setup();
    conversation.chunks = ["Hello there. ", "How are", " you?"];

    await run("Main-Chat");

    expect(display.events).toEqual(["chunk Hello there.", "chunk  How are you?", "end"]);
    expect(tts.spoken).toEqual(["Hello there.", "How are you?"]);
    expect(setEmotionHint).not.toHaveBeenCalled();
  });

  it("exits on the kill phrase", async () => {
    const { conversation, exit, run } = setup();
    conversation.replies.push("Goodbye forever /RipOut/");

    await run("Main-Chat");

    expect(exit).toHaveBeenCalledWith(0);
  });

  it("skips the avatar when it is disabled", async () => {
    const { conversation, setEmotionHint, run } = setup("hello", { avatarEnabled: false });
    conversation.replies.push("Hi!");

    await run("Main-Chat");

    expect(setEmotionHint).not.toHaveBeenCalled();
  });
});

describe("other main pipes", () => {
  it("redoes the stored transcript", async () => {
    const { conversation, display, run } = setup();

    await run("Main-Redo");
    expect(display.events).toEqual(["notice Nothing to redo yet"]);

    conversation.replies.push("One", "Two");
    await run("Main-Chat");
    await run("Main-Redo");
    expect(conversation.sent.map(s => s.text)).toEqual(["hello", "hello"]);
  });

  it("regenerates the last reply", async () => {
    const { conversation, display, tts, run } = setup();

    await run("Main-Next");
    expect(display.events).toEqual(["notice Nothing to regenerate yet"]);

    conversation.regenerated = "Another take";
    await run("Main-Next");
    expect(tts.spoken).toEqual(["Another take"]);
  });

  it("soft-resets speech, history and tags", async () => {
    const clear = vi.fn(async () => ["gaming"]);
    const { conversation, display, tts, run } = setup("hello", { tags: { clear } });

    await run("Main-Soft-Reset");

    expect(tts.stops).toBe(1);
    expect(conversation.cleared).toBe(1);
    expect(display.events).toEqual(["notice Soft reset done (cleared tags: gaming)"]);
  });

  it("runs due alarms", async () => {
    const runDue = vi.fn(async (): Promise<string[]> => []);
    const { display, run } = setup("hello", { alarms: { runDue } });

    await run("Main-Alarm");

    expect(runDue).toHaveBeenCalledTimes(1);
    expect(display.events).toEqual(["notice No alarms due"]);
  });

  it("describes a captured image", async () => {
    const loadImage = vi.fn(async (_path: string) => ({ base64: "AAAA", mediaType: "image/png" as const }));
    const { conversation, tts, run } = setup("hello", {
      images: { capture: async () => "/tmp/frame.png" },
      loadImage,
    });
    conversation.replies.push("A cat!");

    await run("Main-View-Image");

    expect(loadImage).toHaveBeenCalledWith("/tmp/frame.png");
    expect(conversation.sent[0].text).toBe(VIEW_IMAGE_PROMPT);
    expect(conversation.sent[0].options.images).toEqual([{ base64: "AAAA", mediaType: "image/png" }]);
    expect(tts.spoken).toEqual(["A cat!"]);
  });

  it("does not send without an image", async () => {
    const { conversation, display, run } = setup();

    await run("Main-View-Image");

    expect(conversation.sent).toEqual([]);
    expect(display.events).toEqual(["notice No image available"]);
  });

  it("nudges the conversation on blank", async () => {
    const { conversation, run } = setup();
    conversation.replies.push("Still there?");

    await run("Main-Blank");

    expect(conversation.sent.map(s => s.text)).toEqual([BLANK_NUDGE]);
  });

  it("runs one hangout round", async () => {
    const runRound = vi.fn(async () => null);
    const { run } = setup("hello", { hangout: { runRound } });

    await run("Hangout-Loop");

    expect(runRound).toHaveBeenCalledTimes(1);
  });
});

describe("handlers behind the dispatcher", () => {
  const dispatchers: PipeDispatcher[] = [];

  afterEach(async () => {
    await Promise.all(dispatchers.map(d => d.stop()));
    dispatchers.length = 0;
  });

  it("drops an unknown main pipe and frees the main flag", async () => {
    const { conversation, set } = setup();
    conversation.replies.push("Hi!");
    const dispatcher = new PipeDispatcher(set.handlers);
    dispatchers.push(dispatcher);
    dispatcher.start();

    const bogus = dispatcher.enqueue("Main-Bogus", true);
    await bogus.done;
    expect(dispatcher.mainPipeRunning).toBe(false);

    const chat = dispatcher.enqueue("Main-Chat", true);
    await chat.done;
    expect(conversation.sent.map(s => s.text)).toEqual(["hello"]);
    expect(dispatcher.getStatus()).toMatchObject({ processed: 2, mainPipeRunning: false });
  });
});

describe("SentenceSpeaker", () => {
  it("speaks complete sentences in order and the rest on flush", async () => {
    const spoken: string[] = [];
    const speaker = new SentenceSpeaker({
      speak: async text => {
        spoken.push(text);
      },
    });

    speaker.push("Wow! That is ");
    speaker.push("great. And");
    await speaker.flush();

    expect(spoken).toEqual(["Wow!", "That is great.", "And"]);
  });

  it("keeps going after a failed line", async () => {
    const spoken: string[] = [];
    const speaker = new SentenceSpeaker({
      speak: async text => {
        if (text === "Bad.") throw new Error("voice engine crashed");
        spoken.push(text);
      },
    });

    speaker.push("Bad. Good. ");
    await speaker.flush();

    expect(spoken).toEqual(["Good."]);
  });

  it("cleans each line the way the stored reply is cleaned", async () => {
    const spoken: string[] = [];
    const shown: string[] = [];
    const speaker = new SentenceSpeaker({
      speak: async text => {
        spoken.push(text);
      },
      show: line => shown.push(line),
      output: { removeAsterisks: true, rpSuppression: true, newlineCut: true },
    });

    speaker.push("\nAssistant: *smiles* Okay. (leans in. whispers) Ready");
    speaker.push("? [nods] Go.\nHidden line. ");
    speaker.push("More hidden.");
    await speaker.flush();

    expect(spoken).toEqual(["smiles Okay.", "Ready?", "Go."]);
    expect(shown).toEqual(spoken);
  });

  it("skips queued lines on cancel but lets the current one finish", async () => {
    const events: string[] = [];
    let finishFirst: () => void = () => undefined;
    const speaker = new SentenceSpeaker({
      speak: text => {
        events.push(`start ${text}`);
        if (text !== "One.") return Promise.resolve();
        return new Promise<void>(resolve => {
          finishFirst = () => {
            events.push("end One.");
            resolve();
          };
        });
      },
    });

    speaker.push("One. Two. Three");
    await Promise.resolve();
    const cancelled = speaker.cancel();
    speaker.push("Four. ");
    finishFirst();
    await cancelled;

    expect(events).toEqual(["start One.", "end One."]);
  });
});
