import { HR_LEXICON, HrLexicon } from "../lexicon/lexicon.store";
import { countWords } from "../text.util";
import { countStarComponents, detectStarComponents } from "./star-components";

const SCORE_BY_COMPONENT_COUNT: readonly number[] = [1, 2, 4, 7, 10];

export function scoreStructure(answerLower: string, lexicon: HrLexicon = HR_LEXICON): number {
  const wordCount = countWords(answerLower);
  if (wordCount < 10) {
    return 1;
  }
  if (wordCount < 20) {
    return 2;
  }

  const components = detectStarComponents(answerLower, lexicon);
  let score = SCORE_BY_COMPONENT_COUNT[countStarComponents(components)] ?? 1;

  // Situation and result are the bookends interviewers listen for.
  if (components.situation && components.result) {
    score = Math.min(10, score + 1);
  }

  return score;
}
