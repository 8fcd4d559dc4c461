import { describe, it, expect } from "vitest";
import { looksLikeRecoveryPhrase } from "../security/seed-phrase.js";

const TWELVE = "abandon ability able about above absent absorb abstract absurd abuse access accident";

describe("looksLikeRecoveryPhrase", () => {
  it("flags twelve wordlist words", () => {
    expect(looksLikeRecoveryPhrase(TWELVE)).toBe(true);
  });

  it("ignores numbering, commas and case", () => {
    const numbered = TWELVE.split(" ")
      .map((word, index) => `${index + 1}. ${word.toUpperCase()},`)
      .join(" ");
    expect(looksLikeRecoveryPhrase(numbered)).toBe(true);
  });

  it("accepts a few words off the list", () => {
    const mixed = TWELVE.replace("abandon", "zzzz").replace("ability", "qqqq").replace("able", "xxxx");
    expect(looksLikeRecoveryPhrase(mixed)).toBe(true);
  });

  it("rejects lengths that no phrase has", () => {
    expect(looksLikeRecoveryPhrase(`${TWELVE} actor`)).toBe(false);
    expect(looksLikeRecoveryPhrase("abandon ability able")).toBe(false);
  });

  it("rejects ordinary sentences of the right length", () => {
    expect(looksLikeRecoveryPhrase("please send my friend some bitcoin tomorrow morning before the bank opens")).toBe(false);
  });
});
