import {
  DetectionMethod,
  RawDocument,
  RawSection,
  RejectionReason,
  SectionCandidate,
} from "../shared/types/section.types";

const DETECTION_METHODS: ReadonlyArray<DetectionMethod> = ["header", "paragraph", "list"];

export const MIN_SECTION_BODY_CHARS = 30;

export class SectionContractError extends Error {
  readonly code = "section_contract_violation";

  constructor(
    readonly documentId: string,
    readonly index: number,
    detail: string,
  ) {
    super(`section_contract_violation: ${documentId}[${index}] ${detail}`);
    this.name = "SectionContractError";
  }
}

export interface ValidationResult {
  candidates: SectionCandidate[];
  rejected: Record<RejectionReason, number>;
  candidatesPerDocument: Record<string, number>;
}

export function createRejectionCounts(): Record<RejectionReason, number> {
  return {
    body_too_short: 0,
    invalid_page_number: 0,
    noisy_title: 0,
  };
}

export function validateDocuments(documents: ReadonlyArray<RawDocument>): ValidationResult {
  const candidates: SectionCandidate[] = [];
  const rejected = createRejectionCounts();
  const candidatesPerDocument: Record<string, number> = {};

  for (const document of documents) {
    candidatesPerDocument[document.documentId] = candidatesPerDocument[document.documentId] ?? 0;
    if (!Array.isArray(document.sections)) {
      throw new SectionContractError(document.documentId, -1, "sections is not an array");
    }

    document.sections.forEach((raw, index) => {
      const section = readRawSection(document.documentId, index, raw);
      const reason = findRejectionReason(section.title, section.body, section.pageNumber);
      candidatesPerDocument[document.documentId] += 1;
      if (reason) {
        rejected[reason] += 1;
        return;
      }
      candidates.push({
        documentId: document.documentId,
        pageNumber: section.pageNumber,
        title: section.title.trim(),
        body: section.body,
        derivedLength: section.body.length,
        sequence: candidates.length,
        ...(section.method ? { method: section.method } : {}),
        ...(section.confidence !== undefined ? { confidence: section.confidence } : {}),
      });
    });
  }

  return { candidates, rejected, candidatesPerDocument };
}

export function findRejectionReason(title: string, body: string, pageNumber: number): RejectionReason | null {
  if (!Number.isInteger(pageNumber) || pageNumber <= 0) {
    return "invalid_page_number";
  }
  if (body.trim().length < MIN_SECTION_BODY_CHARS) {
    return "body_too_short";
  }
  if (title.length > 0 && !/[\p{L}\p{N}]/u.test(title)) {
    return "noisy_title";
  }
  return null;
}

function readRawSection(documentId: string, index: number, raw: unknown): RawSection {
  if (!isRecord(raw)) {
    throw new SectionContractError(documentId, index, "section is not an object");
  }
  const { title, body, pageNumber, method, confidence } = raw;
  if (title !== undefined && title !== null && typeof title !== "string") {
    throw new SectionContractError(documentId, index, "title must be a string");
  }
  if (typeof body !== "string") {
    throw new SectionContractError(documentId, index, "body must be a string");
  }
  if (typeof pageNumber !== "number" || Number.isNaN(pageNumber)) {
    throw new SectionContractError(documentId, index, "pageNumber must be a number");
  }
  return {
    title: typeof title === "string" ? title : "",
    body,
    pageNumber,
    method: readMethod(documentId, index, method),
    confidence: readConfidence(documentId, index, confidence),
  };
}

function readMethod(documentId: string, index: number, value: unknown): DetectionMethod | undefined {
  if (value === undefined) {
    return undefined;
  }
  const method = DETECTION_METHODS.find((known) => known === value);
  if (!method) {
    throw new SectionContractError(documentId, index, "method must be header, paragraph or list");
  }
  return method;
}

function readConfidence(documentId: string, index: number, value: unknown): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !(value >= 0 && value <= 1)) {
    throw new SectionContractError(documentId, index, "confidence must be a number between 0 and 1");
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
