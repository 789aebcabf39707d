import { countWords, splitWords } from "../text.util";

const LONG_SENTENCE_WORDS = 40;

export function splitSentences(answer: string): string[] {
  return answer
    .split(/[.!?]/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export function scoreClarity(answer: string): number {
  const wordCount = countWords(answer);
  if (wordCount < 5) {
    return 1;
  }
  if (wordCount < 10) {
    return 2;
  }
  if (wordCount < 20) {
    return 3;
  }

  const sentences = splitSentences(answer);
  if (sentences.length === 0) {
    return 1;
  }
  if (sentences.length === 1) {
    return 2;
  }

  const lengths = sentences.map((sentence) => splitWords(sentence).length);
  const avgWords = lengths.reduce((sum, length) => sum + length, 0) / lengths.length;
  let score = 3;

  // Bands overlap; the first one that matches wins.
  if (avgWords >= 10 && avgWords <= 25) {
    score += 4;
  } else if (avgWords >= 8 && avgWords <= 30) {
    score += 2;
  } else if (avgWords > LONG_SENTENCE_WORDS) {
    score -= 1;
  } else if (avgWords < 5) {
    score -= 1;
  }

  const runOns = lengths.filter((length) => length > LONG_SENTENCE_WORDS).length;
  if (runOns === 0 && sentences.length >= 3) {
    score += 2;
  }

  if (sentences.length >= 4 && lengthSpread(lengths) > 5) {
    score += 1;
  }

  return clampScore(score);
}

function lengthSpread(lengths: number[]): number {
  let min = Number.POSITIVE_INFINITY;
  let max = 0;
  for (const length of lengths) {
    min = Math.min(min, length);
    max = Math.max(max, length);
  }
  return max - min;
}

export function clampScore(score: number): number {
  return Math.max(1, Math.min(10, score));
}
