import { QuestionType, RelevanceVerdict } from "../shared/types/hr-analysis.types";
import { HR_LEXICON, HrLexicon } from "./lexicon/lexicon.store";
import { countPhraseHits, containsAnyPhrase, countWords } from "./text.util";

const BASELINE_SCORE = 5;
const RELEVANT_THRESHOLD = 4;
const STORY_CHECK_MIN_WORDS = 20;

export function classifyQuestion(question: string, lexicon: HrLexicon = HR_LEXICON): QuestionType | "none" {
  const questionLower = question.toLowerCase();
  const topic = lexicon.questionTopics.find((item) => containsAnyPhrase(questionLower, item.keywords));
  return topic ? topic.type : "none";
}

export function checkAnswerRelevance(
  question: string,
  answer: string,
  lexicon: HrLexicon = HR_LEXICON,
): RelevanceVerdict {
  const answerLower = answer.toLowerCase();
  const issues: string[] = [];
  let score = BASELINE_SCORE;

  const questionType = classifyQuestion(question, lexicon);
  const topic = lexicon.questionTopics.find((item) => item.type === questionType);
  if (topic) {
    const matches = countPhraseHits(answerLower, topic.keywords);
    if (matches === 0) {
      issues.push(`Answer doesn't address the '${topic.type}' aspect of the question`);
      score -= 3;
    } else if (matches >= 2) {
      score += 2;
    }
  }

  if (containsAnyPhrase(answerLower, lexicon.offTopicPhrases)) {
    issues.push("Contains off-topic remarks");
    score -= 2;
  }

  if (!containsAnyPhrase(answerLower, lexicon.storyIndicators) && countWords(answer) > STORY_CHECK_MIN_WORDS) {
    issues.push("Doesn't give a specific example or story");
    score -= 2;
  }

  const opener = lexicon.genericOpeners.find(
    (phrase) => answerLower.startsWith(phrase) || answerLower.includes(`. ${phrase}`),
  );
  if (opener) {
    issues.push("Relies on generic statements instead of a specific example");
    score -= 2;
  }

  const relevanceScore = Math.max(0, Math.min(10, score));
  return {
    relevanceScore,
    questionType,
    issues,
    isRelevant: relevanceScore >= RELEVANT_THRESHOLD,
  };
}
