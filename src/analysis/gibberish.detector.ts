import { GibberishSeverity, GibberishVerdict } from "../shared/types/hr-analysis.types";
import { HR_LEXICON, HrLexicon } from "./lexicon/lexicon.store";
import { splitWords } from "./text.util";

const PUNCTUATION = new Set(Array.from("!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~"));
const DIGIT = /\p{N}/u;

const MIN_DISTINCT_CHARS = 8;
const DIVERSITY_MIN_LENGTH = 20;
const MAX_PUNCTUATION_RATIO = 0.3;
const MAX_DIGIT_RATIO = 0.3;
const MAX_WORD_REPEATS = 5;
const REPETITION_WORD_LIMIT = 50;
const MIN_AVG_WORD_LENGTH = 2;
const MAX_AVG_WORD_LENGTH = 12;

export const GIBBERISH_ISSUES = {
  placeholder: "Contains random or placeholder text",
  lowDiversity: "Very low character diversity, looks like random input",
  punctuation: "Excessive punctuation",
  digits: "Excessive numbers without context",
  repetition: "Excessive word repetition",
  wordShape: "Unusual word patterns",
} as const;

export function detectGibberish(text: string, lexicon: HrLexicon = HR_LEXICON): GibberishVerdict {
  const textLower = text.toLowerCase();
  const chars = Array.from(text);
  const hits: Array<[issue: string, severity: GibberishSeverity]> = [];

  if (lexicon.gibberishPatterns.some((pattern) => pattern.test(textLower))) {
    hits.push([GIBBERISH_ISSUES.placeholder, 3]);
  }

  const compact = Array.from(textLower.replace(/ /g, ""));
  if (compact.length > DIVERSITY_MIN_LENGTH && new Set(compact).size < MIN_DISTINCT_CHARS) {
    hits.push([GIBBERISH_ISSUES.lowDiversity, 3]);
  }

  const punctuationCount = chars.filter((char) => PUNCTUATION.has(char)).length;
  if (chars.length > 10 && punctuationCount / chars.length > MAX_PUNCTUATION_RATIO) {
    hits.push([GIBBERISH_ISSUES.punctuation, 2]);
  }

  const digitCount = chars.filter((char) => DIGIT.test(char)).length;
  const digitRatio = digitCount / Math.max(chars.length, 1);
  if (digitRatio > MAX_DIGIT_RATIO && !text.includes("%") && !text.includes("$")) {
    hits.push([GIBBERISH_ISSUES.digits, 2]);
  }

  const words = splitWords(textLower);
  if (words.length > 0) {
    if (maxRepetition(words) > MAX_WORD_REPEATS && words.length < REPETITION_WORD_LIMIT) {
      hits.push([GIBBERISH_ISSUES.repetition, 2]);
    }

    const avgWordLength = words.reduce((sum, word) => sum + Array.from(word).length, 0) / words.length;
    if (avgWordLength > MAX_AVG_WORD_LENGTH || avgWordLength < MIN_AVG_WORD_LENGTH) {
      hits.push([GIBBERISH_ISSUES.wordShape, 2]);
    }
  }

  // Severity is the worst rule that fired, never a sum.
  const severity = hits.reduce<GibberishSeverity>((worst, [, level]) => (level > worst ? level : worst), 0);
  return {
    severity,
    issues: hits.map(([issue]) => issue),
    isGibberish: severity >= 2,
  };
}

// Tokens are compared as-is, so "word," and "word" are different entries.
function maxRepetition(words: string[]): number {
  const counts = new Map<string, number>();
  for (const word of words) {
    if (Array.from(word).length > 2) {
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }
  let max = 0;
  for (const count of counts.values()) {
    max = Math.max(max, count);
  }
  return max;
}
