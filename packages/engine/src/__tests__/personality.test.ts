import { describe, it, expect } from "vitest";
import { DEFAULT_PHRASINGS, ResponsePicker, STANDARD_STYLE } from "../dispatch/responses.js";
import { replyStyleFor } from "../dispatch/personality.js";
import { TipsEngine, type TipCatalog } from "../dispatch/tips.js";

describe("replyStyleFor", () => {
  it("keeps the standard style until two messages are in", () => {
    expect(replyStyleFor({ emojiUsage: 1, language: "en", averageMessageLength: 3, messageCount: 1 })).toEqual(
      STANDARD_STYLE,
    );
  });

  it("reads short messages as terse", () => {
    expect(replyStyleFor({ emojiUsage: 0, language: "en", averageMessageLength: 6, messageCount: 3 })).toEqual({
      brief: true,
      emoji: false,
    });
  });

  it("turns on emoji at half the messages", () => {
    expect(replyStyleFor({ emojiUsage: 0.5, language: "en", averageMessageLength: 40, messageCount: 2 })).toEqual({
      brief: false,
      emoji: true,
    });
  });
});

describe("ResponsePicker styles", () => {
  const picker = new ResponsePicker(() => 0);

  it("prefers the brief pool", () => {
    expect(picker.styled({ brief: true, emoji: false }).say("greeting")).toBe("Hi. What do you need?");
  });

  it("prefers the emoji pool", () => {
    expect(picker.styled({ brief: false, emoji: true }).say("completed", { txid: "abc" })).toBe(
      "Sent! 🚀 Transaction id: abc",
    );
  });

  it("takes brief over emoji when both apply", () => {
    expect(picker.styled({ brief: true, emoji: true }).say("greeting")).toBe("Hi. What do you need?");
  });

  it("falls back to the base pool when no variant exists", () => {
    expect(picker.styled({ brief: true, emoji: true }).say("balance", { btc: "0.5" })).toBe("You have 0.5 BTC.");
  });

  it("leaves the original picker unstyled", () => {
    picker.styled({ brief: true, emoji: false });
    expect(picker.say("greeting")).toBe(DEFAULT_PHRASINGS.greeting[0]);
  });
});

describe("TipsEngine", () => {
  it("offers a tip on every third answer", () => {
    const tips = new TipsEngine(() => 0);
    expect(tips.next("balance")).toBeUndefined();
    expect(tips.next("balance")).toBeUndefined();
    expect(tips.next("balance")).toBe('Say "hide my balance" to keep it off the screen.');
    expect(tips.next("balance")).toBeUndefined();
  });

  it("never repeats the previous tip", () => {
    const tips = new TipsEngine(() => 0);
    const seen = [1, 2, 3, 4, 5, 6].map(() => tips.next("balance"));
    expect(seen[2]).toBe('Say "hide my balance" to keep it off the screen.');
    expect(seen[5]).toBe('Say "balance in sats" to see it in satoshis.');
  });

  it("uses the fallback category for unmapped intents", () => {
    const catalog: TipCatalog = {
      every: 1,
      fallback: "general",
      intents: { balance: "balance" },
      categories: { balance: ["b1", "b2"], general: ["g1", "g2"] },
    };
    expect(new TipsEngine(() => 0, catalog).next("price")).toBe("g1");
  });

  it("starts counting again after reset", () => {
    const tips = new TipsEngine(() => 0);
    tips.next("help");
    tips.next("help");
    tips.reset();
    expect(tips.next("help")).toBeUndefined();
  });
});
