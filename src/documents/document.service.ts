import path from "node:path";
import { Logger } from "../config/logger";
import { extractDocxPages } from "./extractors/docx.extractor";
import { extractPdfPages } from "./extractors/pdf.extractor";

export type DocumentType = "pdf" | "docx" | "unknown";

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface DocumentExtractor {
  extractPages(buffer: Buffer, fileName: string): Promise<PageText[]>;
}

export class DocumentService implements DocumentExtractor {
  constructor(private readonly logger: Logger) {}

  detectDocumentType(fileName: string): DocumentType {
    const extension = path.extname(fileName).toLowerCase();
    if (extension === ".pdf") {
      return "pdf";
    }
    if (extension === ".docx") {
      return "docx";
    }
    return "unknown";
  }

  async extractPages(buffer: Buffer, fileName: string): Promise<PageText[]> {
    const type = this.detectDocumentType(fileName);
    if (type === "unknown") {
      throw new Error(`unsupported_document_type: ${fileName}`);
    }

    const rawPages = type === "pdf" ? await extractPdfPages(buffer) : await extractDocxPages(buffer);
    const pages = rawPages.map((text, index) => ({
      pageNumber: index + 1,
      text: text.replace(/\u0000/g, ""),
    }));
    const chars = pages.reduce((sum, page) => sum + page.text.length, 0);

    this.logger.info("Document text extracted", {
      fileName,
      type,
      pages: pages.length,
      chars,
    });

    if (chars === 0) {
      throw new Error(`document_text_empty: ${fileName}`);
    }

    return pages;
  }
}
