import { PageText } from "../documents/document.service";
import { DetectionMethod, RawSection } from "../shared/types/section.types";

const MIN_SECTION_CHARS = 30;
const MAX_SECTION_CHARS = 2000;
const MAX_SECTIONS_PER_DOCUMENT = 50;
const MAX_HEADER_LINE_CHARS = 100;
const MAX_HEADER_BODY_LINES = 20;
const PARAGRAPH_TITLE_WORDS = 5;

const HEADER_PATTERNS: ReadonlyArray<RegExp> = [
  /^([A-Z][A-Z\s&]+)$/,
  /^(\d+\.\s+[A-Z][A-Za-z\s]+)$/,
  /^([A-Z][a-z]+(?:\s+[A-Z][a-z]+)*\s*:)$/,
];
const ALL_CAPS_LINE = /^[A-Z][A-Z\s]+$/;

const BASE_CONFIDENCE = 0.3;
const METHOD_CONFIDENCE: Record<DetectionMethod, number> = {
  header: 0.4,
  paragraph: 0.3,
  list: 0.2,
};
const FULL_LENGTH_CHARS = 500;
const TITLE_CONFIDENCE = 0.2;

export interface DetectedSection extends RawSection {
  method: DetectionMethod;
  confidence: number;
}

type UnratedSection = Omit<DetectedSection, "confidence">;

export function detectSections(pages: ReadonlyArray<PageText>): DetectedSection[] {
  const detected: UnratedSection[] = [];
  for (const page of pages) {
    detected.push(...detectHeaderSections(page));
  }
  for (const page of pages) {
    detected.push(...detectParagraphSections(page));
  }
  for (const page of pages) {
    detected.push(...detectListSections(page));
  }

  const seenTitles = new Set<string>();
  const accepted: DetectedSection[] = [];
  for (const section of detected) {
    const titleKey = section.title.toLowerCase();
    const length = section.body.length;
    if (length < MIN_SECTION_CHARS || length > MAX_SECTION_CHARS || seenTitles.has(titleKey)) {
      continue;
    }
    seenTitles.add(titleKey);
    accepted.push({ ...section, confidence: detectionConfidence(section) });
    if (accepted.length >= MAX_SECTIONS_PER_DOCUMENT) {
      break;
    }
  }
  return accepted;
}

/**
 * Header sections rate highest, then paragraphs, then lists. Longer bodies
 * (up to 500 chars) and a title longer than three characters add to it.
 */
export function detectionConfidence(section: Pick<DetectedSection, "title" | "body" | "method">): number {
  if (!section.body) {
    return 0;
  }
  const lengthScore = Math.min(1, section.body.length / FULL_LENGTH_CHARS);
  const titleScore = section.title.length > 3 ? TITLE_CONFIDENCE : 0;
  return Math.min(1, BASE_CONFIDENCE + METHOD_CONFIDENCE[section.method] + lengthScore + titleScore);
}

export function matchHeader(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.length >= MAX_HEADER_LINE_CHARS) {
    return null;
  }
  for (const pattern of HEADER_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match?.[1]) {
      return match[1].trim().replace(/:$/, "").trim();
    }
  }
  return null;
}

function detectHeaderSections(page: PageText): UnratedSection[] {
  const lines = page.text.split("\n");
  const sections: UnratedSection[] = [];
  lines.forEach((line, index) => {
    const title = matchHeader(line);
    if (!title) {
      return;
    }
    const body = collectHeaderBody(lines, index + 1);
    if (body.length < MIN_SECTION_CHARS) {
      return;
    }
    sections.push({
      title,
      body,
      pageNumber: page.pageNumber,
      method: "header",
    });
  });
  return sections;
}

function collectHeaderBody(lines: ReadonlyArray<string>, start: number): string {
  const bodyLines: string[] = [];
  for (let index = start; index < lines.length; index += 1) {
    const line = lines[index] ?? "";
    const trimmed = line.trim();
    if (!trimmed) {
      if (bodyLines.length > 0) {
        break;
      }
      continue;
    }
    if (bodyLines.length > MAX_HEADER_BODY_LINES || ALL_CAPS_LINE.test(trimmed)) {
      break;
    }
    bodyLines.push(line);
  }
  return bodyLines.join("\n").trim();
}

function detectParagraphSections(page: PageText): UnratedSection[] {
  return page.text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length >= MIN_SECTION_CHARS && paragraph.length <= MAX_SECTION_CHARS)
    .map((paragraph) => ({
      title: `${paragraph.split(/\s+/).slice(0, PARAGRAPH_TITLE_WORDS).join(" ")}...`,
      body: paragraph,
      pageNumber: page.pageNumber,
      method: "paragraph" as const,
    }));
}

function detectListSections(page: PageText): UnratedSection[] {
  const lines = page.text.split("\n");
  const sections: UnratedSection[] = [];
  let index = 0;
  while (index < lines.length) {
    if (!isListItem(lines[index] ?? "")) {
      index += 1;
      continue;
    }
    const start = index;
    const items: string[] = [];
    while (index < lines.length) {
      const line = lines[index] ?? "";
      if (!isListItem(line) && !isContinuationLine(line)) {
        break;
      }
      items.push(line.trim());
      index += 1;
    }
    if (items.length >= 2) {
      sections.push({
        title: `List Section ${start + 1}`,
        body: items.join("\n"),
        pageNumber: page.pageNumber,
        method: "list",
      });
    }
  }
  return sections;
}

function isListItem(line: string): boolean {
  const trimmed = line.trim();
  return (
    trimmed.startsWith("•") ||
    trimmed.startsWith("-") ||
    /^\d+\./.test(trimmed) ||
    /^[a-z]\)/.test(trimmed)
  );
}

function isContinuationLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length > 0 && !trimmed.startsWith("•") && !trimmed.startsWith("-") && !/^\d+\./.test(trimmed);
}
