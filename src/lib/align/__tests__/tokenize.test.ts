import { describe, it, expect } from "vitest";
import { tokenizeSentence } from "../tokenize";

describe("tokenizeSentence", () => {
  it("splits words and trailing punctuation", () => {
    expect(tokenizeSentence("The cat sat.")).toEqual(["The", "cat", "sat", "."]);
  });

  it("keeps decimals as a single token", () => {
    expect(tokenizeSentence("Revenue was 3.0 million.")).toEqual([
      "Revenue",
      "was",
      "3.0",
      "million",
      ".",
    ]);
  });

  it("keeps internal periods of abbreviations but not the final one", () => {
    expect(tokenizeSentence("U.S. rates, e.g. 4.5%!")).toEqual([
      "U.S",
      ".",
      "rates",
      ",",
      "e.g",
      ".",
      "4.5",
      "%",
      "!",
    ]);
  });

  it("emits every punctuation character on its own", () => {
    expect(tokenizeSentence("don't stop")).toEqual(["don", "'", "t", "stop"]);
    expect(tokenizeSentence("a..b  c_d -- 1,000.50")).toEqual([
      "a..b",
      "c_d",
      "-",
      "-",
      "1",
      ",",
      "000.50",
    ]);
  });

  it("does not start a word run on a leading period", () => {
    expect(tokenizeSentence("..5 x.")).toEqual([".", ".", "5", "x", "."]);
  });

  it("treats accented letters as word characters", () => {
    expect(tokenizeSentence("Café crème brûlée")).toEqual(["Café", "crème", "brûlée"]);
  });

  it("returns no tokens for empty or blank input", () => {
    expect(tokenizeSentence("")).toEqual([]);
    expect(tokenizeSentence("   \t ")).toEqual([]);
  });

  it("is stable across repeated calls", () => {
    const sentence = "Net income rose 12.0 percent (see note 4).";
    expect(tokenizeSentence(sentence)).toEqual(tokenizeSentence(sentence));
  });
});
