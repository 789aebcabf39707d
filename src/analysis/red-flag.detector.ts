import { HR_LEXICON, HrLexicon } from "./lexicon/lexicon.store";
import { containsAnyPhrase, countPhraseHits, countPronouns, countWords, hasMetrics } from "./text.util";

export const RED_FLAGS = {
  blame: "Blames others instead of taking accountability, a serious concern for any interviewer",
  negativity: "Speaks negatively about previous employers or colleagues",
  weOveruse: "Uses 'we' heavily without making your own contribution clear",
  noOutcome: "Long answer with no clear outcome or result",
  noMetrics: "Claims results but gives no quantifiable metrics (%, $, time saved, etc.)",
  tooBrief: "Response is too brief for a behavioral question and shows little depth or preparation",
  hedging: "Heavy hedging language undermines confidence",
  vagueness: "Relies on vague phrases without concrete details",
} as const;

export function detectRedFlags(answer: string, lexicon: HrLexicon = HR_LEXICON): string[] {
  const answerLower = answer.toLowerCase();
  const wordCount = countWords(answer);
  const flags: string[] = [];

  if (containsAnyPhrase(answerLower, lexicon.blamePhrases)) {
    flags.push(RED_FLAGS.blame);
  }

  if (containsAnyPhrase(answerLower, lexicon.negativePhrases)) {
    flags.push(RED_FLAGS.negativity);
  }

  const pronouns = countPronouns(answerLower);
  if (pronouns.we > 5 && pronouns.i < 2) {
    flags.push(RED_FLAGS.weOveruse);
  }

  const mentionsResult = containsAnyPhrase(answerLower, lexicon.starIndicators.result);
  if (wordCount > 50 && !mentionsResult) {
    flags.push(RED_FLAGS.noOutcome);
  }
  if (mentionsResult && !hasMetrics(answer) && wordCount > 30) {
    flags.push(RED_FLAGS.noMetrics);
  }

  if (wordCount < 30) {
    flags.push(RED_FLAGS.tooBrief);
  }

  if (countPhraseHits(answerLower, lexicon.hedgingWords) >= 3) {
    flags.push(RED_FLAGS.hedging);
  }

  if (countPhraseHits(answerLower, lexicon.vaguePhrases) >= 2) {
    flags.push(RED_FLAGS.vagueness);
  }

  return flags;
}
