import assert from "node:assert/strict";
import { test } from "node:test";
import { createLogger } from "../../config/logger";
import { DocumentService } from "../../documents/document.service";
import { normalizeDocxText } from "../../documents/extractors/docx.extractor";
import { collectPageText, joinTextItems } from "../../documents/extractors/pdf.extractor";

const service = new DocumentService(createLogger({ write: () => {} }));

test("detectDocumentType uses the file extension", () => {
  assert.equal(service.detectDocumentType("guide.PDF"), "pdf");
  assert.equal(service.detectDocumentType("notes.docx"), "docx");
  assert.equal(service.detectDocumentType("notes.txt"), "unknown");
});

test("extractPages rejects unsupported documents", async () => {
  await assert.rejects(
    () => service.extractPages(Buffer.from("plain text"), "notes.txt"),
    /unsupported_document_type: notes\.txt/,
  );
});

function fakePage(pageIndex: number, lines: Array<[string, number]>) {
  return {
    pageIndex,
    getTextContent: async () => ({
      items: lines.map(([str, y]) => ({ str, transform: [1, 0, 0, 1, 72, y] })),
    }),
  };
}

test("collectPageText keeps each page at its own index across blank lines", async () => {
  const pages: string[] = [];
  await collectPageText(
    fakePage(1, [
      ["NIGHTLIFE", 700],
      ["Bars by ", 680],
      ["the port.", 680],
    ]),
    pages,
  );
  await collectPageText(
    fakePage(0, [
      ["BUDGET HOTELS", 700],
      ["", 690],
      ["Cheap rooms near the station.", 680],
    ]),
    pages,
  );

  assert.deepEqual(pages, ["BUDGET HOTELS\n\nCheap rooms near the station.", "NIGHTLIFE\nBars by the port."]);
});

test("collectPageText ignores values that are not pages", async () => {
  const pages: string[] = [];
  assert.equal(await collectPageText({ pageIndex: 0 }, pages), "");
  assert.deepEqual(pages, []);
});

test("joinTextItems skips malformed items and joins a shared baseline", () => {
  assert.equal(
    joinTextItems([{ str: "Beach", transform: [1, 0, 0, 1, 0, 500] }, { transform: [] }, { str: " day", transform: [1, 0, 0, 1, 0, 500] }]),
    "Beach day",
  );
});

test("normalizeDocxText keeps paragraph breaks and drops extra blank lines", () => {
  assert.equal(normalizeDocxText("Title  \r\n\r\n\r\n\r\nBody line\r\nNext\n"), "Title\n\nBody line\nNext");
});
