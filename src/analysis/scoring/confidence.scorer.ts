import { HR_LEXICON, HrLexicon } from "../lexicon/lexicon.store";
import { countPhraseHits, countWords } from "../text.util";
import { clampScore } from "./clarity.scorer";

const KEYWORD_TIERS: ReadonlyArray<{ min: number; bonus: number }> = [
  { min: 8, bonus: 5 },
  { min: 5, bonus: 4 },
  { min: 3, bonus: 3 },
  { min: 2, bonus: 2 },
  { min: 1, bonus: 1 },
];

export function countConfidenceKeywords(answerLower: string, lexicon: HrLexicon = HR_LEXICON): number {
  return countPhraseHits(answerLower, lexicon.confidenceKeywords);
}

export function countLeadershipKeywords(answerLower: string, lexicon: HrLexicon = HR_LEXICON): number {
  return countPhraseHits(answerLower, lexicon.leadershipKeywords);
}

export function scoreConfidence(answerLower: string, lexicon: HrLexicon = HR_LEXICON): number {
  const wordCount = countWords(answerLower);
  if (wordCount < 10) {
    return 2;
  }
  if (wordCount < 20) {
    return 3;
  }

  let score = 2;

  const keywords =
    countConfidenceKeywords(answerLower, lexicon) + countLeadershipKeywords(answerLower, lexicon);
  score += KEYWORD_TIERS.find((tier) => keywords >= tier.min)?.bonus ?? 0;

  const ownership = countPhraseHits(answerLower, lexicon.ownershipPhrases);
  if (ownership >= 3) {
    score += 2;
  } else if (ownership >= 1) {
    score += 1;
  }

  const hedges = countPhraseHits(answerLower, lexicon.confidenceHedges);
  if (hedges >= 3) {
    score -= 3;
  } else if (hedges >= 1) {
    score -= 1;
  }

  return clampScore(score);
}
