import pdfParse from "pdf-parse";

interface PdfTextContent {
  items: ReadonlyArray<unknown>;
}

interface PdfPage {
  pageIndex?: number;
  getTextContent(options: { normalizeWhitespace: boolean; disableCombineTextItems: boolean }): Promise<PdfTextContent>;
}

export async function extractPdfPages(buffer: Buffer): Promise<string[]> {
  const pages: string[] = [];
  await pdfParse(buffer, {
    pagerender: (pageData: unknown) => collectPageText(pageData, pages),
  });
  return Array.from({ length: pages.length }, (_, index) => (pages[index] ?? "").trim());
}

/**
 * Renders one page the way pdf-parse does by default and stores the text at
 * the page's index, so page numbers survive blank lines inside a page.
 */
export async function collectPageText(pageData: unknown, pages: string[]): Promise<string> {
  if (!isPdfPage(pageData)) {
    return "";
  }
  const content = await pageData.getTextContent({
    normalizeWhitespace: false,
    disableCombineTextItems: false,
  });
  const text = joinTextItems(content.items).replace(/\u0000/g, "");
  const index =
    typeof pageData.pageIndex === "number" && Number.isInteger(pageData.pageIndex) && pageData.pageIndex >= 0
      ? pageData.pageIndex
      : pages.length;
  pages[index] = text;
  return text;
}

// Items on the same baseline are concatenated; a new baseline starts a new line.
export function joinTextItems(items: ReadonlyArray<unknown>): string {
  let text = "";
  let lastY: number | undefined;
  for (const item of items) {
    if (!isRecord(item) || typeof item.str !== "string") {
      continue;
    }
    const y = baselineOf(item.transform);
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

// pdf.js text items carry a [a, b, c, d, x, y] transform matrix.
function baselineOf(transform: unknown): number | undefined {
  if (!Array.isArray(transform)) {
    return undefined;
  }
  const y: unknown = transform[5];
  return typeof y === "number" ? y : undefined;
}

function isPdfPage(value: unknown): value is PdfPage {
  return isRecord(value) && typeof value.getTextContent === "function";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
