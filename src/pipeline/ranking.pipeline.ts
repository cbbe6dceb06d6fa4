import { RankingConfig } from "../config/env";
import { Logger } from "../config/logger";
import { buildJobContext } from "../persona/job-context";
import { PersonaClassifier } from "../persona/persona-classifier";
import { rankAndSelect, UnrankedSection } from "../ranking/ranker";
import { scoreSection } from "../ranking/relevance-scorer";
import { JobContext, PersonaProfile } from "../shared/types/persona.types";
import { RankedOutput, RankingStats, RawDocument } from "../shared/types/section.types";
import { validateDocuments } from "../sections/section-validator";
import { DEFAULT_STOPWORDS } from "../text/tokenizer";

export interface RankingRequest {
  personaText: string;
  jobText: string;
  documents: ReadonlyArray<RawDocument>;
}

export interface RankingRun {
  persona: PersonaProfile;
  job: JobContext;
  ranked: RankedOutput;
  stats: RankingStats;
}

export class RankingPipeline {
  constructor(
    private readonly classifier: PersonaClassifier,
    private readonly config: RankingConfig,
    private readonly logger?: Logger,
    private readonly stopwords: ReadonlySet<string> = DEFAULT_STOPWORDS,
  ) {}

  run(request: RankingRequest): RankingRun {
    const validation = validateDocuments(request.documents);
    const persona = this.classifier.classify(request.personaText);
    const job = buildJobContext(request.jobText, this.stopwords);

    const scored: UnrankedSection[] = validation.candidates.map((candidate) => ({
      ...candidate,
      relevanceScore: scoreSection(candidate, persona, job, this.config),
    }));

    const ranked = rankAndSelect(scored, {
      cap: this.config.maxSections,
      diversificationWindow: this.config.diversificationWindow,
    });

    const totalRejected = Object.values(validation.rejected).reduce((sum, count) => sum + count, 0);
    const stats: RankingStats = {
      totalCandidates: validation.candidates.length + totalRejected,
      totalRejected,
      rejectedByReason: validation.rejected,
      candidatesPerDocument: validation.candidatesPerDocument,
    };

    this.logger?.debug("Sections ranked", {
      persona_category: persona.category,
      job_keywords: job.derivedKeywords.size,
      candidates: stats.totalCandidates,
      rejected: stats.rejectedByReason,
      retained: ranked.sections.length,
    });

    return { persona, job, ranked, stats };
  }
}
