/**
 * Terminal and console collaborator tests
 */

import { describe, it, expect } from "vitest";
import { PassThrough } from "stream";
import { TerminalInput, parseHotkeys, resolveCommand } from "./terminal.js";
import { ConsoleDisplay, ConsoleSpeech } from "./console.js";
import { isControlCommand, isPipeCommand } from "./types.js";

function collector() {
  const written: string[] = [];
  return { out: { write: (chunk: string) => written.push(chunk) }, written };
}

describe("hotkeys", () => {
  it("maps keys to tokens and ignores unknown actions", () => {
    const bindings = parseHotkeys({ chat: "Space", next: "n", dance: "d", volume_up: 5 });
    expect(bindings).toEqual(new Map([["space", "CHAT"], ["n", "NEXT"]]));
  });

  it("rejects files without usable bindings", () => {
    expect(parseHotkeys([])).toBeNull();
    expect(parseHotkeys({ dance: "d" })).toBeNull();
  });

  it("resolves keys, action names and raw tokens", () => {
    const bindings = new Map([["n", "NEXT" as const]]);
    expect(resolveCommand("n", bindings)).toBe("NEXT");
    expect(resolveCommand("soft_reset", bindings)).toBe("SOFT_RESET");
    expect(resolveCommand("view", bindings)).toBe("VIEW");
    expect(resolveCommand("bogus", bindings)).toBe("BOGUS");
  });
});

describe("command tokens", () => {
  it("separates pipe and control tokens", () => {
    expect(isPipeCommand("CHAT")).toBe(true);
    expect(isPipeCommand("VOLUME_UP")).toBe(false);
    expect(isControlCommand("VOLUME_UP")).toBe(true);
    expect(isControlCommand("toString")).toBe(false);
    expect(isPipeCommand("toString")).toBe(false);
  });
});

describe("TerminalInput", () => {
  it("turns typed lines into CHAT plus a transcript", async () => {
    const terminal = new TerminalInput({ bindings: new Map([["n", "NEXT"]]) });
    terminal.handleLine("  hello there ");
    terminal.handleLine("/n");
    terminal.handleLine("");

    expect(await terminal.next()).toBe("CHAT");
    expect(await terminal.transcribe()).toBe("hello there");
    expect(await terminal.next()).toBe("NEXT");
    expect(await terminal.transcribe()).toBe("");
  });

  it("wipes stacked commands and their transcripts", async () => {
    const terminal = new TerminalInput({ bindings: new Map() });
    terminal.handleLine("one");
    terminal.handleLine("two");
    terminal.wipe();
    terminal.push("BLANK");

    expect(await terminal.next()).toBe("BLANK");
    expect(await terminal.transcribe()).toBe("");
  });

  it("holds typed lines for /chat when autochat is off", async () => {
    const terminal = new TerminalInput({ bindings: new Map() });
    terminal.setAutoChat(false);
    terminal.handleLine("are you there");
    terminal.handleLine("/chat");

    expect(await terminal.next()).toBe("CHAT");
    expect(await terminal.transcribe()).toBe("are you there");
  });

  it("reads lines from its input stream and ends when it closes", async () => {
    const input = new PassThrough();
    const terminal = new TerminalInput({ bindings: new Map(), input });
    terminal.start();

    input.write("hi there\n");
    expect(await terminal.next()).toBe("CHAT");

    input.end();
    expect(await terminal.next()).toBeNull();
  });
});

describe("console output", () => {
  it("prints replies without colors off a TTY", () => {
    const { out, written } = collector();
    const display = new ConsoleDisplay(out);
    display.reply("Lily", "Hello!");
    display.notice("Autochat on");

    expect(written).toEqual(["----Lily----\nHello!\n\n", "Autochat on\n"]);
  });

  it("speaks at the current volume and clamps adjustments", async () => {
    const { out, written } = collector();
    const speech = new ConsoleSpeech(out);

    expect(speech.adjustVolume(0.1)).toBe(1);
    expect(speech.adjustVolume(-0.25)).toBe(0.75);
    await speech.speak("Good morning");
    await speech.speak("   ");

    expect(written).toEqual(["[voice 75%] Good morning\n"]);
    expect(speech.isSpeaking()).toBe(false);
  });
});
