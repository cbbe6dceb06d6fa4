import { RelevanceBand } from "../shared/types/collection.types";
import { tokenize } from "../text/tokenizer";

export const MAX_RELEVANT_CONCEPTS = 5;
const HIGH_IMPORTANCE_SCORE = 0.6;
const MEDIUM_IMPORTANCE_SCORE = 0.3;

// Distinct vocabulary terms in title and body, in order of first appearance.
export function findRelevantConcepts(
  section: { title: string; body: string },
  vocabulary: ReadonlySet<string>,
  limit: number = MAX_RELEVANT_CONCEPTS,
): string[] {
  const found = new Set<string>();
  for (const token of [...tokenize(section.title), ...tokenize(section.body)]) {
    if (found.size >= limit) {
      break;
    }
    if (vocabulary.has(token)) {
      found.add(token);
    }
  }
  return [...found];
}

/**
 * A section is high importance when it scores at least 0.6 with two or more
 * matched terms, medium at 0.3 with at least one, low otherwise.
 */
export function importanceLevel(score: number, matchedTerms: number): RelevanceBand {
  if (score >= HIGH_IMPORTANCE_SCORE && matchedTerms >= 2) {
    return "high";
  }
  if (score >= MEDIUM_IMPORTANCE_SCORE && matchedTerms >= 1) {
    return "medium";
  }
  return "low";
}
