import { PersonaCategory, TaskCategory } from "./persona.types";
import { DetectionMethod } from "./section.types";

export interface CollectionDocumentRef {
  filename: string;
  title: string;
}

export interface CollectionInput {
  challengeInfo: Record<string, unknown>;
  documents: CollectionDocumentRef[];
  personaRole: string;
  jobTask: string;
}

export interface ExtractedSectionOutput {
  document: string;
  section_title: string;
  page_number: number;
  importance_rank: number;
  relevance_score: number;
  importance_level: RelevanceBand;
  relevant_concepts: string[];
  content: string;
  detection_method?: DetectionMethod;
  detection_confidence?: number;
}

export interface SubsectionAnalysisOutput {
  document: string;
  refined_text: string;
  page_number: number;
  importance_rank: number;
}

export type RelevanceBand = "high" | "medium" | "low";

export interface ContentDistribution {
  high_relevance_sections: number;
  medium_relevance_sections: number;
  low_relevance_sections: number;
}

export interface DocumentCounts {
  candidates: number;
  retained: number;
}

export interface CollectionMetadata {
  input_documents: string[];
  persona: string;
  persona_category: PersonaCategory;
  job_to_be_done: string;
  job_type: TaskCategory;
  total_documents_processed: number;
  total_candidates_considered: number;
  total_candidates_rejected: number;
  total_sections_retained: number;
  per_document_counts: Record<string, DocumentCounts>;
  processing_timestamp: string;
}

export interface TopSectionSummary {
  document: string;
  title: string;
  score: number;
}

export interface CollectionResult {
  challenge_info: Record<string, unknown>;
  metadata: CollectionMetadata;
  extracted_sections: ExtractedSectionOutput[];
  subsection_analysis: SubsectionAnalysisOutput[];
  persona_insights: {
    alignment_quality: RelevanceBand;
    content_distribution: ContentDistribution;
    top_sections_summary: TopSectionSummary[];
  };
}
