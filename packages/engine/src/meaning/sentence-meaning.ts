import { z } from "zod";
import meaningData from "../data/meaning.json" with { type: "json" };
import { containsPhrase, findPhrase, normalizeForMatching } from "../extraction/text.js";

export type SentenceType = "command" | "question" | "evaluation" | "emotional" | "navigation";

export const MEANING_MODIFIERS = [
  "increase",
  "decrease",
  "fastest",
  "cheapest",
  "half",
  "double",
  "all",
  "enough",
  "tooMuch",
  "tooLittle",
] as const;

export type MeaningModifier = (typeof MEANING_MODIFIERS)[number];

export type MeaningObject = "fee" | "amount";

export const EMOTIONS = [
  "gratitude",
  "frustration",
  "confusion",
  "humor",
  "sadness",
  "excitement",
  "affirmation",
] as const;

export type Emotion = (typeof EMOTIONS)[number] | "neutral";

export type DetectedLanguage = "en" | "es" | "fr" | "ar";

export interface SentenceMeaning {
  type: SentenceType;
  modifier?: MeaningModifier;
  object?: MeaningObject;
  negated: boolean;
  hesitation: boolean;
  emotion: Emotion;
}

const MeaningLexiconSchema = z.object({
  questionWords: z.array(z.string()),
  navigation: z.array(z.string()),
  modifiers: z.array(
    z.object({
      phrase: z.string(),
      modifier: z.enum(MEANING_MODIFIERS),
      object: z.enum(["fee", "amount"]).optional(),
    }),
  ),
  objects: z.object({ fee: z.array(z.string()), amount: z.array(z.string()) }),
  negation: z.array(z.string()),
  hesitation: z.array(z.string()),
  evaluation: z.array(z.string()),
  emotions: z.object({
    gratitude: z.array(z.string()),
    frustration: z.array(z.string()),
    confusion: z.array(z.string()),
    humor: z.array(z.string()),
    sadness: z.array(z.string()),
    excitement: z.array(z.string()),
    affirmation: z.array(z.string()),
  }),
  sadnessContext: z.array(z.string()),
  socialPositive: z.array(z.string()),
  languageMarkers: z.object({ es: z.array(z.string()), fr: z.array(z.string()) }),
});

const LEXICON = MeaningLexiconSchema.parse(meaningData);

const EVALUATIVE_MODIFIERS = new Set<MeaningModifier>(["enough", "tooMuch", "tooLittle"]);
const ARABIC_SCRIPT = /\p{Script=Arabic}/u;
const SPANISH_PUNCTUATION = /[ñ¿¡]/u;

function contains(text: string, phrase: string): boolean {
  // Emoji carry no word boundaries worth checking.
  return /^\p{Extended_Pictographic}/u.test(phrase) ? text.includes(phrase) : containsPhrase(text, phrase);
}

function containsAny(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => contains(text, phrase));
}

/** Emotions are checked in a fixed order; the first hit wins. */
export function detectEmotion(text: string): Emotion {
  const lower = normalizeForMatching(text);
  for (const emotion of EMOTIONS) {
    if (!containsAny(lower, LEXICON.emotions[emotion])) continue;
    if (emotion === "sadness" && !containsAny(lower, LEXICON.sadnessContext)) continue;
    return emotion;
  }
  return "neutral";
}

export function isSocialPositive(text: string): boolean {
  return containsAny(normalizeForMatching(text), LEXICON.socialPositive);
}

/** "is that a lot", "is that good" and similar requests for judgement. */
export function isEvaluationQuestion(text: string): boolean {
  return findPhrase(normalizeForMatching(text), LEXICON.evaluation) !== undefined;
}

export function detectLanguage(text: string, previous: DetectedLanguage = "en"): DetectedLanguage {
  if (ARABIC_SCRIPT.test(text)) return "ar";
  const lower = normalizeForMatching(text);
  if (SPANISH_PUNCTUATION.test(lower) || findPhrase(lower, LEXICON.languageMarkers.es)) return "es";
  if (findPhrase(lower, LEXICON.languageMarkers.fr)) return "fr";
  return previous;
}

export function analyzeMeaning(text: string): SentenceMeaning {
  const lower = normalizeForMatching(text);
  const emotion = detectEmotion(lower);
  const negated = findPhrase(lower, LEXICON.negation) !== undefined;
  const hesitation = findPhrase(lower, LEXICON.hesitation) !== undefined;

  const rule = LEXICON.modifiers.find((candidate) => containsPhrase(lower, candidate.phrase));
  let object: MeaningObject | undefined = rule?.object;
  if (!object) {
    if (findPhrase(lower, LEXICON.objects.fee)) object = "fee";
    else if (findPhrase(lower, LEXICON.objects.amount)) object = "amount";
  }

  const meaning: SentenceMeaning = { type: "command", negated, hesitation, emotion };
  if (rule) meaning.modifier = rule.modifier;
  if (object) meaning.object = object;

  const firstWord = lower.split(" ")[0] ?? "";
  const words = lower.split(" ").length;
  if (isEvaluationQuestion(lower) || (rule && EVALUATIVE_MODIFIERS.has(rule.modifier))) {
    meaning.type = "evaluation";
  } else if (lower.endsWith("?") || LEXICON.questionWords.includes(firstWord)) {
    meaning.type = "question";
  } else if (words <= 3 && findPhrase(lower, LEXICON.navigation)) {
    meaning.type = "navigation";
  } else if (emotion !== "neutral" && !rule) {
    meaning.type = "emotional";
  }
  return meaning;
}
