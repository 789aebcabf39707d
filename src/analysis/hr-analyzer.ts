import { AnalysisResult, AnalyzeInput, RelevanceVerdict } from "../shared/types/hr-analysis.types";
import { buildFeedback, buildRejectionFeedback } from "./feedback.generator";
import { detectGibberish } from "./gibberish.detector";
import { HR_LEXICON, HrLexicon } from "./lexicon/lexicon.store";
import { detectRedFlags } from "./red-flag.detector";
import { checkAnswerRelevance } from "./relevance.checker";
import { scoreClarity } from "./scoring/clarity.scorer";
import {
  countConfidenceKeywords,
  countLeadershipKeywords,
  scoreConfidence,
} from "./scoring/confidence.scorer";
import { detectStarComponents, noStarComponents } from "./scoring/star-components";
import { scoreStructure } from "./scoring/structure.scorer";

export const REJECTION_REASON = "Invalid response detected";

const RED_FLAG_WEIGHT = 1.5;
const MAX_RED_FLAG_PENALTY = 5;
const IRRELEVANT_STRUCTURE_PENALTY = 3;

/**
 * Runs the full answer pipeline: gibberish gate, relevance (only with a question),
 * red flags, the three scorers, penalties and feedback. Pure and synchronous.
 */
export function analyzeHrResponse(input: AnalyzeInput, lexicon: HrLexicon = HR_LEXICON): AnalysisResult {
  const answer = input.answer;
  const answerLower = answer.toLowerCase();

  const gibberish = detectGibberish(answer, lexicon);
  if (gibberish.isGibberish) {
    return {
      clarity: 1,
      confidence: 1,
      structure: 1,
      totalScore: 1,
      feedback: buildRejectionFeedback(gibberish.issues),
      isValid: false,
      rejectionReason: REJECTION_REASON,
      details: {
        starComponentsFound: noStarComponents(),
        confidenceKeywordCount: 0,
        leadershipKeywordCount: 0,
        redFlags: gibberish.issues,
        relevanceIssues: [],
      },
    };
  }

  const relevance: RelevanceVerdict | null = input.question
    ? checkAnswerRelevance(input.question, answer, lexicon)
    : null;
  const redFlags = detectRedFlags(answer, lexicon);

  const redFlagPenalty = Math.min(redFlags.length * RED_FLAG_WEIGHT, MAX_RED_FLAG_PENALTY);
  const halfPenalty = Math.trunc(redFlagPenalty / 2);
  const relevancePenalty = relevance && !relevance.isRelevant ? IRRELEVANT_STRUCTURE_PENALTY : 0;

  const clarity = Math.max(1, scoreClarity(answer) - halfPenalty);
  const confidence = Math.max(1, scoreConfidence(answerLower, lexicon) - halfPenalty);
  const structure = Math.max(1, scoreStructure(answerLower, lexicon) - relevancePenalty);
  const components = detectStarComponents(answerLower, lexicon);

  return {
    clarity,
    confidence,
    structure,
    totalScore: Math.trunc((clarity + confidence + structure) / 3),
    feedback: buildFeedback({
      clarity,
      confidence,
      structure,
      answerLower,
      components,
      redFlags,
      relevance,
    }),
    isValid: true,
    details: {
      starComponentsFound: components,
      confidenceKeywordCount: countConfidenceKeywords(answerLower, lexicon),
      leadershipKeywordCount: countLeadershipKeywords(answerLower, lexicon),
      redFlags,
      relevanceIssues: relevance ? relevance.issues : [],
    },
  };
}
