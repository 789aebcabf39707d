import { StarComponentSet } from "../../shared/types/hr-analysis.types";
import { HR_LEXICON, HrLexicon } from "../lexicon/lexicon.store";
import { containsAnyPhrase } from "../text.util";

export function detectStarComponents(answerLower: string, lexicon: HrLexicon = HR_LEXICON): StarComponentSet {
  const indicators = lexicon.starIndicators;
  return {
    situation: containsAnyPhrase(answerLower, indicators.situation),
    task: containsAnyPhrase(answerLower, indicators.task),
    action: containsAnyPhrase(answerLower, indicators.action),
    result: containsAnyPhrase(answerLower, indicators.result),
  };
}

export function countStarComponents(components: StarComponentSet): number {
  return Object.values(components).filter(Boolean).length;
}

export function noStarComponents(): StarComponentSet {
  return { situation: false, task: false, action: false, result: false };
}
