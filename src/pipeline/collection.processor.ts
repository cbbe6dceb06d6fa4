import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { errorMeta, Logger, logContext, withContext } from "../config/logger";
import { DocumentExtractor } from "../documents/document.service";
import { assemble } from "../output/output-assembler";
import { detectSections } from "../sections/section-detector";
import { SectionContractError } from "../sections/section-validator";
import { CollectionDocumentRef } from "../shared/types/collection.types";
import { RawDocument } from "../shared/types/section.types";
import { COLLECTION_INPUT_FILE, COLLECTION_OUTPUT_FILE, parseCollectionInput } from "./collection-input";
import { RankingPipeline } from "./ranking.pipeline";

export const DOCUMENTS_DIR = "PDFs";

export type CollectionErrorCode =
  | "collection_input_invalid"
  | "section_contract_violation"
  | "collection_failed";

export type CollectionRunResult =
  | {
      ok: true;
      collection: string;
      outputPath: string;
      documents: number;
      candidates: number;
      retained: number;
    }
  | {
      ok: false;
      collection: string;
      error_code: CollectionErrorCode;
      message: string;
    };

interface CollectionProcessorOptions {
  outputDir?: string;
  now?: () => Date;
}

export class CollectionProcessor {
  constructor(
    private readonly pipeline: RankingPipeline,
    private readonly extractor: DocumentExtractor,
    private readonly logger: Logger,
    private readonly options: CollectionProcessorOptions = {},
  ) {}

  async processAll(inputDir: string): Promise<CollectionRunResult[]> {
    const collectionDirs = await this.findCollections(inputDir);
    if (collectionDirs.length === 0) {
      this.logger.warn("No collections found", { inputDir });
      return [];
    }
    return Promise.all(collectionDirs.map((dir) => this.processCollection(dir)));
  }

  async processCollection(collectionDir: string): Promise<CollectionRunResult> {
    const collection = path.basename(collectionDir);
    const startedAt = Date.now();
    const logger = withContext(this.logger, { collection });
    try {
      const rawInput: unknown = JSON.parse(
        await readFile(path.join(collectionDir, COLLECTION_INPUT_FILE), "utf-8"),
      );
      const input = parseCollectionInput(rawInput);

      const loaded = await Promise.all(
        input.documents.map((ref) => this.loadDocument(logger, collectionDir, ref)),
      );
      const documents = loaded.filter((document): document is RawDocument => document !== null);

      const run = this.pipeline.run({
        personaText: input.personaRole,
        jobText: input.jobTask,
        documents,
      });
      const result = assemble(run.ranked, {
        challengeInfo: input.challengeInfo,
        inputDocuments: documents.map((document) => document.documentId),
        personaText: input.personaRole,
        persona: run.persona,
        job: run.job,
        totalCandidates: run.stats.totalCandidates,
        totalRejected: run.stats.totalRejected,
        candidatesPerDocument: run.stats.candidatesPerDocument,
        processedAt: (this.options.now ?? (() => new Date()))().toISOString(),
      });

      const outputDir = this.options.outputDir ? path.join(this.options.outputDir, collection) : collectionDir;
      await mkdir(outputDir, { recursive: true });
      const outputPath = path.join(outputDir, COLLECTION_OUTPUT_FILE);
      await writeFile(outputPath, `${JSON.stringify(result, null, 2)}\n`, "utf-8");

      logContext(logger, "info", "Collection processed", {
        stage: "write",
        persona_category: run.persona.category,
        candidates: run.stats.totalCandidates,
        rejected: run.stats.totalRejected,
        retained: run.ranked.sections.length,
        latency_ms: Date.now() - startedAt,
        ok: true,
      });

      return {
        ok: true,
        collection,
        outputPath,
        documents: documents.length,
        candidates: run.stats.totalCandidates,
        retained: run.ranked.sections.length,
      };
    } catch (error) {
      const errorCode = resolveErrorCode(error);
      const { error: message } = errorMeta(error);
      logContext(logger, "error", "Collection processing failed", {
        latency_ms: Date.now() - startedAt,
        ok: false,
        error_code: errorCode,
      }, { error: message });
      return { ok: false, collection, error_code: errorCode, message };
    }
  }

  private async findCollections(inputDir: string): Promise<string[]> {
    const entries = await readdir(inputDir, { withFileTypes: true });
    const candidates = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => path.join(inputDir, entry.name))
      .sort((a, b) => a.localeCompare(b));

    const collections: string[] = [];
    for (const dir of candidates) {
      if (await isFile(path.join(dir, COLLECTION_INPUT_FILE))) {
        collections.push(dir);
      }
    }
    return collections;
  }

  private async loadDocument(
    logger: Logger,
    collectionDir: string,
    ref: CollectionDocumentRef,
  ): Promise<RawDocument | null> {
    const filePath = path.join(collectionDir, DOCUMENTS_DIR, ref.filename);
    if (!(await isFile(filePath))) {
      logContext(logger, "warn", "Document not found, skipping", {
        document: ref.filename,
        stage: "extract",
      });
      return null;
    }

    try {
      const pages = await this.extractor.extractPages(await readFile(filePath), ref.filename);
      const sections = detectSections(pages);
      logContext(logger, "debug", "Sections detected", {
        document: ref.filename,
        stage: "detect",
        candidates: sections.length,
      });
      return {
        documentId: ref.filename,
        sections,
      };
    } catch (error) {
      logContext(logger, "warn", "Document extraction failed, skipping", {
        document: ref.filename,
        stage: "extract",
        ok: false,
      }, errorMeta(error));
      return null;
    }
  }
}

function resolveErrorCode(error: unknown): CollectionErrorCode {
  if (error instanceof SectionContractError) {
    return "section_contract_violation";
  }
  if (error instanceof SyntaxError || (error instanceof Error && error.message.startsWith("collection_input_invalid"))) {
    return "collection_input_invalid";
  }
  return "collection_failed";
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}
