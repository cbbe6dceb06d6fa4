import stopwordList from "./stopwords.json";

const WORD_PATTERN = /[a-z0-9]+(?:['-][a-z0-9]+)*/g;
const MIN_KEYWORD_LENGTH = 3;

export const DEFAULT_STOPWORDS: ReadonlySet<string> = new Set(
  stopwordList.map((word) => word.trim().toLowerCase()).filter((word) => word.length > 0),
);

export function normalizeText(text: string): string {
  return text.normalize("NFKC").toLowerCase();
}

export function tokenize(text: string): string[] {
  if (!text) {
    return [];
  }
  return normalizeText(text).match(WORD_PATTERN) ?? [];
}

/**
 * Distinct content words of a free-text description: stopwords, pure numbers
 * and tokens shorter than three characters are dropped.
 */
export function extractKeywords(
  text: string,
  stopwords: ReadonlySet<string> = DEFAULT_STOPWORDS,
): Set<string> {
  const keywords = new Set<string>();
  for (const token of tokenize(text)) {
    if (token.length < MIN_KEYWORD_LENGTH) {
      continue;
    }
    if (/^\d+$/.test(token)) {
      continue;
    }
    if (stopwords.has(token)) {
      continue;
    }
    keywords.add(token);
  }
  return keywords;
}

export function countHits(tokens: ReadonlyArray<string>, vocabulary: ReadonlySet<string>): number {
  if (vocabulary.size === 0) {
    return 0;
  }
  let hits = 0;
  for (const token of tokens) {
    if (vocabulary.has(token)) {
      hits += 1;
    }
  }
  return hits;
}

// True when `term` occurs in `normalizedText` at the start of a word, so "plan" hits "planning" but not "explain".
export function containsAtWordStart(normalizedText: string, term: string): boolean {
  let index = normalizedText.indexOf(term);
  while (index >= 0) {
    if (index === 0 || !/[a-z0-9]/.test(normalizedText.charAt(index - 1))) {
      return true;
    }
    index = normalizedText.indexOf(term, index + 1);
  }
  return false;
}
