import { ContentDistribution, RelevanceBand } from "../shared/types/collection.types";

export const HIGH_RELEVANCE_THRESHOLD = 0.7;
export const MEDIUM_RELEVANCE_THRESHOLD = 0.4;

export function relevanceBand(score: number): RelevanceBand {
  if (score >= HIGH_RELEVANCE_THRESHOLD) {
    return "high";
  }
  if (score >= MEDIUM_RELEVANCE_THRESHOLD) {
    return "medium";
  }
  return "low";
}

export function contentDistribution(scores: ReadonlyArray<number>): ContentDistribution {
  const distribution: ContentDistribution = {
    high_relevance_sections: 0,
    medium_relevance_sections: 0,
    low_relevance_sections: 0,
  };
  for (const score of scores) {
    const band = relevanceBand(score);
    if (band === "high") {
      distribution.high_relevance_sections += 1;
    } else if (band === "medium") {
      distribution.medium_relevance_sections += 1;
    } else {
      distribution.low_relevance_sections += 1;
    }
  }
  return distribution;
}

export function alignmentQuality(scores: ReadonlyArray<number>): RelevanceBand {
  if (scores.length === 0) {
    return "low";
  }
  const average = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  return relevanceBand(average);
}
