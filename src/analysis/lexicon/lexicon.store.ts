import { LexiconError } from "../../shared/errors";
import { QuestionType, StarComponent } from "../../shared/types/hr-analysis.types";
import rawLexicon from "./hr-lexicon.v1.json";

export const STAR_COMPONENTS: readonly StarComponent[] = ["situation", "task", "action", "result"];

const QUESTION_TYPES: readonly QuestionType[] = [
  "challenge",
  "difficult team member",
  "leadership",
  "failed",
  "deadline",
  "above and beyond",
  "persuade",
  "feedback",
];

export interface QuestionTopic {
  readonly type: QuestionType;
  readonly keywords: readonly string[];
}

export interface HrLexicon {
  readonly version: string;
  readonly confidenceKeywords: readonly string[];
  readonly leadershipKeywords: readonly string[];
  readonly starIndicators: Readonly<Record<StarComponent, readonly string[]>>;
  readonly questionTopics: readonly QuestionTopic[];
  /** Ordered; scanning stops at the first hit. */
  readonly gibberishPatterns: readonly RegExp[];
  readonly vaguePhrases: readonly string[];
  readonly hedgingWords: readonly string[];
  readonly confidenceHedges: readonly string[];
  readonly offTopicPhrases: readonly string[];
  readonly storyIndicators: readonly string[];
  readonly genericOpeners: readonly string[];
  readonly blamePhrases: readonly string[];
  readonly negativePhrases: readonly string[];
  readonly ownershipPhrases: readonly string[];
}

export function parseLexicon(raw: unknown): HrLexicon {
  if (!isRecord(raw)) {
    throw new LexiconError("Lexicon must be a JSON object.");
  }
  const version = raw.version;
  if (typeof version !== "string" || !version.trim()) {
    throw new LexiconError("Lexicon version is missing.");
  }

  return {
    version,
    confidenceKeywords: readPhraseList(raw, "confidenceKeywords"),
    leadershipKeywords: readPhraseList(raw, "leadershipKeywords"),
    starIndicators: readStarIndicators(raw.starIndicators),
    questionTopics: readQuestionTopics(raw.questionTopics),
    gibberishPatterns: Object.freeze(readPhraseList(raw, "gibberishPatterns").map(compilePattern)),
    vaguePhrases: readPhraseList(raw, "vaguePhrases"),
    hedgingWords: readPhraseList(raw, "hedgingWords"),
    confidenceHedges: readPhraseList(raw, "confidenceHedges"),
    offTopicPhrases: readPhraseList(raw, "offTopicPhrases"),
    storyIndicators: readPhraseList(raw, "storyIndicators"),
    genericOpeners: readPhraseList(raw, "genericOpeners"),
    blamePhrases: readPhraseList(raw, "blamePhrases"),
    negativePhrases: readPhraseList(raw, "negativePhrases"),
    ownershipPhrases: readPhraseList(raw, "ownershipPhrases"),
  };
}

export const HR_LEXICON: HrLexicon = Object.freeze(parseLexicon(rawLexicon));

function readPhraseList(source: Record<string, unknown>, key: string): readonly string[] {
  const value = source[key];
  if (!Array.isArray(value) || value.length === 0) {
    throw new LexiconError(`Lexicon list "${key}" must be a non-empty array.`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== "string" || !item) {
      throw new LexiconError(`Lexicon list "${key}" contains a non-string or empty entry.`);
    }
    items.push(item);
  }
  return Object.freeze(items);
}

function readStarIndicators(value: unknown): Readonly<Record<StarComponent, readonly string[]>> {
  if (!isRecord(value)) {
    throw new LexiconError("Lexicon starIndicators must be an object.");
  }
  return Object.freeze({
    situation: readPhraseList(value, "situation"),
    task: readPhraseList(value, "task"),
    action: readPhraseList(value, "action"),
    result: readPhraseList(value, "result"),
  });
}

function readQuestionTopics(value: unknown): readonly QuestionTopic[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new LexiconError("Lexicon questionTopics must be a non-empty array.");
  }
  const topics = value.map((item): QuestionTopic => {
    if (!isRecord(item)) {
      throw new LexiconError("Lexicon question topic must be an object.");
    }
    const type = QUESTION_TYPES.find((candidate) => candidate === item.type);
    if (!type) {
      throw new LexiconError(`Unknown question topic type: ${String(item.type)}`);
    }
    return Object.freeze({ type, keywords: readPhraseList(item, "keywords") });
  });
  return Object.freeze(topics);
}

function compilePattern(source: string): RegExp {
  try {
    // Unicode mode so backreferences and quantifiers work on code points.
    return new RegExp(source, "iu");
  } catch (error) {
    throw new LexiconError(
      `Invalid gibberish pattern "${source}": ${error instanceof Error ? error.message : "Unknown error"}`,
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
