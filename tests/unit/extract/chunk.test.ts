import { describe, it, expect } from "vitest";
import { chunkText } from "../../../src/extract/chunk.js";

describe("chunkText", () => {
  it("packs short paragraphs together up to the limit", () => {
    const text = "First para.\n\nSecond para.\n\n\nThird para.";
    expect(chunkText(text, 30)).toEqual(["First para.\n\nSecond para.", "Third para."]);
  });

  it("collapses whitespace inside a paragraph", () => {
    expect(chunkText("Cats\n  are   mammals", 100)).toEqual(["Cats are mammals"]);
  });

  it("splits an over-long paragraph on word boundaries", () => {
    expect(chunkText("aaaa bbbb cccc dddd", 10)).toEqual(["aaaa bbbb", "cccc dddd"]);
  });

  it("hard-splits a word longer than the limit", () => {
    expect(chunkText("abcdefghijkl", 5)).toEqual(["abcde", "fghij", "kl"]);
  });

  it("returns nothing for blank text", () => {
    expect(chunkText(" \n\n \n", 100)).toEqual([]);
  });
});
