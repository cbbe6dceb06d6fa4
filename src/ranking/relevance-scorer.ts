import { JobContext, PersonaProfile } from "../shared/types/persona.types";
import { SectionCandidate } from "../shared/types/section.types";
import { countHits, tokenize } from "../text/tokenizer";

export const TITLE_TOKEN_WEIGHT = 2;

export interface ScoringWeights {
  personaWeight: number;
  jobWeight: number;
  amplification: number;
}

export interface ScoreBreakdown {
  weightedTokens: number;
  personaDensity: number;
  jobDensity: number;
  rawScore: number;
  score: number;
}

type ScorableText = Pick<SectionCandidate, "title" | "body">;

export function scoreSection(
  candidate: ScorableText,
  persona: PersonaProfile,
  job: JobContext,
  weights: ScoringWeights,
): number {
  return explainScore(candidate, persona, job, weights).score;
}

/**
 * Keyword density of the section against the persona vocabulary and the job
 * keywords, both normalized by the weighted token count. Title tokens count
 * TITLE_TOKEN_WEIGHT times. The weighted sum is bent by the convex curve
 * raw * (1 + k * raw) / (1 + k), which keeps 0 and 1 fixed, and clamped to [0, 1].
 */
export function explainScore(
  candidate: ScorableText,
  persona: PersonaProfile,
  job: JobContext,
  weights: ScoringWeights,
): ScoreBreakdown {
  const titleTokens = tokenize(candidate.title);
  const bodyTokens = tokenize(candidate.body);
  const weightedTokens = TITLE_TOKEN_WEIGHT * titleTokens.length + bodyTokens.length;
  if (weightedTokens === 0) {
    return {
      weightedTokens: 0,
      personaDensity: 0,
      jobDensity: 0,
      rawScore: 0,
      score: 0,
    };
  }

  const personaDensity = weightedHits(titleTokens, bodyTokens, persona.keywords) / weightedTokens;
  const jobDensity = weightedHits(titleTokens, bodyTokens, job.derivedKeywords) / weightedTokens;
  const rawScore = weights.personaWeight * personaDensity + weights.jobWeight * jobDensity;
  const amplified = amplify(rawScore, weights.amplification);

  return {
    weightedTokens,
    personaDensity,
    jobDensity,
    rawScore,
    score: clamp(amplified, 0, 1),
  };
}

function weightedHits(
  titleTokens: ReadonlyArray<string>,
  bodyTokens: ReadonlyArray<string>,
  vocabulary: ReadonlySet<string>,
): number {
  return TITLE_TOKEN_WEIGHT * countHits(titleTokens, vocabulary) + countHits(bodyTokens, vocabulary);
}

function amplify(raw: number, k: number): number {
  return (raw * (1 + k * raw)) / (1 + k);
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value) || value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}
