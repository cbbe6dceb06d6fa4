import assert from "node:assert/strict";
import { test } from "node:test";
import { rankAndSelect, UnrankedSection } from "../../ranking/ranker";

function section(documentId: string, relevanceScore: number, sequence: number): UnrankedSection {
  return {
    documentId,
    pageNumber: 1,
    title: `${documentId} ${sequence}`,
    body: "Body text that is long enough to be a candidate section.",
    derivedLength: 56,
    sequence,
    relevanceScore,
  };
}

const DOMINANT = [
  section("a.pdf", 0.9, 0),
  section("a.pdf", 0.85, 1),
  section("a.pdf", 0.8, 2),
  section("a.pdf", 0.7, 3),
];

test("comparable sections from other documents are promoted past a saturated one", () => {
  const ranked = rankAndSelect([...DOMINANT, section("b.pdf", 0.65, 4), section("b.pdf", 0.62, 5)], { cap: 4 });

  assert.deepEqual(
    ranked.sections.map((item) => item.relevanceScore),
    [0.9, 0.85, 0.65, 0.62],
  );
  assert.deepEqual(
    ranked.sections.map((item) => item.rank),
    [1, 2, 3, 4],
  );
  assert.equal(ranked.cap, 4);
  assert.equal(ranked.considered, 6);
});

test("a window of 0 keeps the plain score order", () => {
  const ranked = rankAndSelect(
    [...DOMINANT, section("b.pdf", 0.65, 4), section("b.pdf", 0.62, 5)],
    { cap: 4, diversificationWindow: 0 },
  );
  assert.deepEqual(
    ranked.sections.map((item) => item.relevanceScore),
    [0.9, 0.85, 0.8, 0.7],
  );
});

test("weak sections from other documents are not promoted", () => {
  const ranked = rankAndSelect([...DOMINANT, section("b.pdf", 0.3, 4), section("b.pdf", 0.2, 5)], { cap: 4 });
  assert.deepEqual(
    ranked.sections.map((item) => item.relevanceScore),
    [0.9, 0.85, 0.8, 0.7],
  );
});

test("equal scores keep input order", () => {
  const ranked = rankAndSelect([section("a.pdf", 0.5, 3), section("a.pdf", 0.5, 1)]);
  assert.deepEqual(
    ranked.sections.map((item) => item.sequence),
    [1, 3],
  );
});

test("output is capped and never padded", () => {
  const many = Array.from({ length: 20 }, (_, index) => section("a.pdf", 1 - index / 100, index));
  const capped = rankAndSelect(many);
  assert.equal(capped.sections.length, 15);
  assert.equal(capped.considered, 20);
  assert.equal(capped.sections[14]?.rank, 15);

  const few = rankAndSelect(many.slice(0, 3));
  assert.equal(few.sections.length, 3);
});

test("empty input yields an empty ranking", () => {
  const ranked = rankAndSelect([]);
  assert.deepEqual(ranked.sections, []);
  assert.equal(ranked.considered, 0);
});
