export type DetectionMethod = "header" | "paragraph" | "list";

export interface RawSection {
  title: string;
  body: string;
  pageNumber: number;
  method?: DetectionMethod;
  confidence?: number;
}

export interface RawDocument {
  documentId: string;
  sections: ReadonlyArray<unknown>;
}

export interface SectionCandidate {
  documentId: string;
  pageNumber: number;
  title: string;
  body: string;
  derivedLength: number;
  sequence: number;
  method?: DetectionMethod;
  confidence?: number;
}

export interface ScoredSection extends SectionCandidate {
  relevanceScore: number;
  rank: number;
}

export type RejectionReason = "body_too_short" | "invalid_page_number" | "noisy_title";

export interface RankingStats {
  totalCandidates: number;
  totalRejected: number;
  rejectedByReason: Record<RejectionReason, number>;
  candidatesPerDocument: Record<string, number>;
}

export interface RankedOutput {
  sections: ReadonlyArray<ScoredSection>;
  cap: number;
  considered: number;
}
