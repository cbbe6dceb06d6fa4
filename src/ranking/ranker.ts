import { RankedOutput, ScoredSection } from "../shared/types/section.types";

export const DEFAULT_CAP = 15;
export const DEFAULT_DIVERSIFICATION_WINDOW = 5;
// An alternative from another document must score at least this share of the head's score.
export const COMPARABLE_SCORE_RATIO = 0.75;

export type UnrankedSection = Omit<ScoredSection, "rank">;

export interface RankOptions {
  cap?: number;
  diversificationWindow?: number;
}

export function compareScoredSections(a: UnrankedSection, b: UnrankedSection): number {
  if (b.relevanceScore !== a.relevanceScore) {
    return b.relevanceScore - a.relevanceScore;
  }
  return a.sequence - b.sequence;
}

export function rankAndSelect(
  scored: ReadonlyArray<UnrankedSection>,
  options: RankOptions = {},
): RankedOutput {
  const cap = Math.max(0, Math.floor(options.cap ?? DEFAULT_CAP));
  const window = Math.max(0, Math.floor(options.diversificationWindow ?? DEFAULT_DIVERSIFICATION_WINDOW));
  const remaining = [...scored].sort(compareScoredSections);

  const distinctDocuments = new Set(remaining.map((section) => section.documentId)).size;
  const fairShare = Math.ceil(cap / Math.max(1, distinctDocuments));
  const selectedPerDocument = new Map<string, number>();
  const selected: UnrankedSection[] = [];

  while (selected.length < cap && remaining.length > 0) {
    const pickIndex = window > 0 ? findDiversifiedIndex(remaining, selectedPerDocument, fairShare, window) : 0;
    const [picked] = remaining.splice(pickIndex, 1);
    if (!picked) {
      break;
    }
    selected.push(picked);
    selectedPerDocument.set(picked.documentId, (selectedPerDocument.get(picked.documentId) ?? 0) + 1);
  }

  return {
    sections: selected.map((section, index) => ({ ...section, rank: index + 1 })),
    cap,
    considered: scored.length,
  };
}

function findDiversifiedIndex(
  remaining: ReadonlyArray<UnrankedSection>,
  selectedPerDocument: ReadonlyMap<string, number>,
  fairShare: number,
  window: number,
): number {
  const head = remaining[0];
  if (!head || (selectedPerDocument.get(head.documentId) ?? 0) < fairShare) {
    return 0;
  }

  const threshold = head.relevanceScore * COMPARABLE_SCORE_RATIO;
  const limit = Math.min(remaining.length, window + 1);
  for (let index = 1; index < limit; index += 1) {
    const alternative = remaining[index];
    if (!alternative) {
      continue;
    }
    const alternativeCount = selectedPerDocument.get(alternative.documentId) ?? 0;
    if (alternativeCount < fairShare && alternative.relevanceScore >= threshold) {
      return index;
    }
  }
  return 0;
}
