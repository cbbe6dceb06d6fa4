import { countHits, tokenize } from "../text/tokenizer";

export const REFINED_TEXT_MAX_CHARS = 300;
const MAX_REFINED_SENTENCES = 5;

// Cuts to at most `maxChars` UTF-16 units, dropping a high surrogate left without its pair.
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  const cut = text.slice(0, maxChars);
  return /[\uD800-\uDBFF]$/.test(cut) ? cut.slice(0, -1) : cut;
}

/**
 * Keeps the sentences with the most keyword hits, in their original order.
 * Falls back to the start of the body when no sentence hits.
 */
export function refineText(
  body: string,
  vocabulary: ReadonlySet<string>,
  maxChars: number = REFINED_TEXT_MAX_CHARS,
): string {
  const sentences = body
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.replace(/\s+/g, " ").trim())
    .filter((sentence) => sentence.length > 0);

  const best = sentences
    .map((sentence, index) => ({ sentence, index, hits: countHits(tokenize(sentence), vocabulary) }))
    .filter((item) => item.hits > 0)
    .sort((a, b) => b.hits - a.hits || a.index - b.index)
    .slice(0, MAX_REFINED_SENTENCES)
    .sort((a, b) => a.index - b.index);

  if (best.length === 0) {
    return truncateText(body.replace(/\s+/g, " ").trim(), maxChars);
  }
  return truncateText(best.map((item) => item.sentence).join(" "), maxChars);
}
