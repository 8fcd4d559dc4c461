import type { BehaviorSignals } from "../memory/conversation-memory.js";
import { STANDARD_STYLE } from "./responses.js";
import type { ReplyStyle } from "./responses.js";

/** Average message length, in characters, below which a user reads as terse. */
export const TERSE_MESSAGE_LENGTH = 15;
export const EMOJI_USAGE_THRESHOLD = 0.5;
const MIN_MESSAGES = 2;

/**
 * Reply style from the user's own habits: terse users get the brief
 * phrasings and no tips, emoji users get the emoji phrasings. Until a
 * couple of messages are in, everyone gets the standard style.
 */
export function replyStyleFor(behavior: Readonly<BehaviorSignals>): ReplyStyle {
  if (behavior.messageCount < MIN_MESSAGES) return STANDARD_STYLE;
  return {
    brief: behavior.averageMessageLength < TERSE_MESSAGE_LENGTH,
    emoji: behavior.emojiUsage >= EMOJI_USAGE_THRESHOLD,
  };
}
