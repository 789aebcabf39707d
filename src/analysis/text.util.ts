const METRIC_PATTERN = /\d+%?/;

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

/** Each phrase counts once, however often it occurs. */
export function countPhraseHits(textLower: string, phrases: readonly string[]): number {
  return phrases.filter((phrase) => textLower.includes(phrase)).length;
}

export function containsAnyPhrase(textLower: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => textLower.includes(phrase));
}

/** Non-overlapping occurrences. */
export function countOccurrences(text: string, needle: string): number {
  if (!needle) {
    return 0;
  }
  return text.split(needle).length - 1;
}

export function hasMetrics(text: string): boolean {
  return METRIC_PATTERN.test(text);
}

export function countPronouns(textLower: string): { we: number; i: number } {
  return {
    we: countOccurrences(textLower, " we "),
    i: countOccurrences(textLower, " i "),
  };
}
