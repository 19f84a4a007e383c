import { describe, it, expect } from "vitest";
import { extractFacts } from "./fact-rules.js";
import { extractContext } from "./extract.js";

describe("extractFacts", () => {
  it("maps preference verbs to importance", () => {
    expect(extractFacts("I enjoy long walks")).toEqual([
      { kind: "preference", text: "User enjoy long walks", importance: 0.8 },
    ]);
    expect(extractFacts("I dislike rain")).toEqual([
      { kind: "preference", text: "User dislike rain", importance: 0.6 },
    ]);
  });

  it("handles favorites and interests", () => {
    expect(extractFacts("My favorite color is blue")).toEqual([
      { kind: "preference", text: "User favorite color is blue", importance: 0.8 },
    ]);
    expect(extractFacts("I'm interested in astronomy")).toEqual([
      { kind: "preference", text: "User is into astronomy", importance: 0.8 },
    ]);
  });

  it("extracts facts about the user", () => {
    expect(extractFacts("My name is Sam")).toEqual([
      { kind: "fact", text: "User is/has sam", importance: 0.9 },
    ]);
    expect(extractFacts("I work at a bakery")).toEqual([
      { kind: "fact", text: "User is/has at a bakery", importance: 0.9 },
    ]);
  });

  it("ignores words that merely end in i", () => {
    expect(extractFacts("hi am here")).toEqual([]);
  });

  it("returns nothing for plain chatter", () => {
    expect(extractFacts("what time is it?")).toEqual([]);
  });
});

describe("extractContext", () => {
  it("finds topics by substring and scores sentiment", () => {
    expect(extractContext("I love playing games")).toEqual({ topics: ["gaming", "personal"], sentiment: "positive" });
    expect(extractContext("This is terrible and sad")).toEqual({ topics: [], sentiment: "negative" });
    expect(extractContext("Good but bad")).toEqual({ topics: [], sentiment: "neutral" });
  });
});
