import {
  CollectionResult,
  DocumentCounts,
  ExtractedSectionOutput,
  SubsectionAnalysisOutput,
} from "../shared/types/collection.types";
import { JobContext, PersonaProfile } from "../shared/types/persona.types";
import { RankedOutput } from "../shared/types/section.types";
import { findRelevantConcepts, importanceLevel } from "./importance";
import { alignmentQuality, contentDistribution } from "./insights";
import { refineText, truncateText } from "./refine-text";

export const CONTENT_MAX_CHARS = 1000;
export const SUBSECTION_ANALYSIS_COUNT = 5;
export const TOP_SECTIONS_SUMMARY_COUNT = 5;

export interface RunMetadata {
  challengeInfo: Record<string, unknown>;
  inputDocuments: ReadonlyArray<string>;
  personaText: string;
  persona: PersonaProfile;
  job: JobContext;
  totalCandidates: number;
  totalRejected: number;
  candidatesPerDocument: Readonly<Record<string, number>>;
  processedAt: string;
}

export function assemble(ranked: RankedOutput, run: RunMetadata): CollectionResult {
  const extractedSections: ExtractedSectionOutput[] = ranked.sections.map((section) => {
    const concepts = findRelevantConcepts(section, run.persona.keywords);
    const jobTerms = findRelevantConcepts(section, run.job.derivedKeywords);
    return {
      document: section.documentId,
      section_title: section.title,
      page_number: section.pageNumber,
      importance_rank: section.rank,
      relevance_score: roundScore(section.relevanceScore),
      importance_level: importanceLevel(section.relevanceScore, concepts.length + jobTerms.length),
      relevant_concepts: concepts,
      content: truncateText(section.body, CONTENT_MAX_CHARS),
      ...(section.method ? { detection_method: section.method } : {}),
      ...(section.confidence !== undefined ? { detection_confidence: roundScore(section.confidence) } : {}),
    };
  });

  const refinementVocabulary = new Set([...run.persona.keywords, ...run.job.derivedKeywords]);
  const subsectionAnalysis: SubsectionAnalysisOutput[] = ranked.sections
    .slice(0, SUBSECTION_ANALYSIS_COUNT)
    .map((section) => ({
      document: section.documentId,
      refined_text: refineText(section.body, refinementVocabulary),
      page_number: section.pageNumber,
      importance_rank: section.rank,
    }));

  const scores = ranked.sections.map((section) => section.relevanceScore);

  return {
    challenge_info: { ...run.challengeInfo },
    metadata: {
      input_documents: [...run.inputDocuments],
      persona: run.personaText,
      persona_category: run.persona.category,
      job_to_be_done: run.job.rawText,
      job_type: run.job.taskType,
      total_documents_processed: run.inputDocuments.length,
      total_candidates_considered: run.totalCandidates,
      total_candidates_rejected: run.totalRejected,
      total_sections_retained: ranked.sections.length,
      per_document_counts: buildDocumentCounts(ranked, run),
      processing_timestamp: run.processedAt,
    },
    extracted_sections: extractedSections,
    subsection_analysis: subsectionAnalysis,
    persona_insights: {
      alignment_quality: alignmentQuality(scores),
      content_distribution: contentDistribution(scores),
      top_sections_summary: ranked.sections.slice(0, TOP_SECTIONS_SUMMARY_COUNT).map((section) => ({
        document: section.documentId,
        title: section.title,
        score: roundScore(section.relevanceScore),
      })),
    },
  };
}

function buildDocumentCounts(ranked: RankedOutput, run: RunMetadata): Record<string, DocumentCounts> {
  const counts: Record<string, DocumentCounts> = {};
  const documentIds = new Set([...run.inputDocuments, ...Object.keys(run.candidatesPerDocument)]);
  for (const documentId of documentIds) {
    counts[documentId] = {
      candidates: run.candidatesPerDocument[documentId] ?? 0,
      retained: 0,
    };
  }
  for (const section of ranked.sections) {
    const entry = counts[section.documentId] ?? { candidates: 0, retained: 0 };
    entry.retained += 1;
    counts[section.documentId] = entry;
  }
  return counts;
}

function roundScore(score: number): number {
  return Math.round(score * 10_000) / 10_000;
}
