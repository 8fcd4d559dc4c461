import { english, french, spanish } from "viem/accounts";

const PHRASE_LENGTHS = new Set([12, 15, 18, 21, 24]);
const MIN_WORDLIST_SHARE = 0.75;
/** "1.", "2)", "#3" numbering some users put in front of each word. */
const NUMBERING = /^#?\d+[.):]?$/u;

const WORDLISTS: ReadonlySet<string> = new Set(
  [...english, ...spanish, ...french].map((word) => word.normalize("NFKD").replace(/\p{M}/gu, "")),
);

function fold(word: string): string {
  return word
    .toLowerCase()
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .replace(/^[^\p{L}]+|[^\p{L}]+$/gu, "");
}

/**
 * True when the text reads like a BIP39 recovery phrase: 12 to 24 words,
 * mostly from the English, Spanish or French wordlists. Checked before
 * anything else touches the message.
 */
export function looksLikeRecoveryPhrase(text: string): boolean {
  const words = text
    .trim()
    .split(/[\s,]+/u)
    .filter((token) => token.length > 0 && !NUMBERING.test(token))
    .map(fold)
    .filter((word) => word.length > 0);
  if (!PHRASE_LENGTHS.has(words.length)) return false;
  const known = words.filter((word) => WORDLISTS.has(word)).length;
  return known / words.length >= MIN_WORDLIST_SHARE;
}
