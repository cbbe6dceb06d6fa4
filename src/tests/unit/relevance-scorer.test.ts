import assert from "node:assert/strict";
import { test } from "node:test";
import { buildJobContext } from "../../persona/job-context";
import { PersonaClassifier } from "../../persona/persona-classifier";
import { loadDefaultPersonaTable } from "../../persona/persona-table";
import { explainScore, scoreSection } from "../../ranking/relevance-scorer";
import { PersonaProfile } from "../../shared/types/persona.types";

const WEIGHTS = { personaWeight: 0.6, jobWeight: 0.4, amplification: 3 };
const HOTEL_PERSONA: PersonaProfile = { category: "travel_planner", keywords: new Set(["hotel"]) };
const GENERIC_PERSONA: PersonaProfile = { category: "generic", keywords: new Set() };
const NO_JOB = buildJobContext("");

test("persona density alone is weighted and amplified", () => {
  const breakdown = explainScore({ title: "", body: "hotel hotel rome rome" }, HOTEL_PERSONA, NO_JOB, WEIGHTS);
  assert.equal(breakdown.weightedTokens, 4);
  assert.equal(breakdown.personaDensity, 0.5);
  assert.equal(breakdown.jobDensity, 0);
  assert.ok(Math.abs(breakdown.score - 0.1425) < 1e-9);
});

test("a section made only of persona and job keywords scores 1", () => {
  const job = buildJobContext("hotel");
  const score = scoreSection({ title: "", body: "hotel hotel" }, HOTEL_PERSONA, job, WEIGHTS);
  assert.equal(score, 1);
});

test("dense sections keep distinct scores below the maximum", () => {
  const job = buildJobContext("itinerary");
  const half = scoreSection({ title: "", body: "hotel itinerary pebble pebble" }, HOTEL_PERSONA, job, WEIGHTS);
  const most = scoreSection({ title: "", body: "hotel itinerary hotel itinerary" }, HOTEL_PERSONA, job, WEIGHTS);
  const full = scoreSection({ title: "", body: "hotel hotel" }, HOTEL_PERSONA, buildJobContext("hotel"), WEIGHTS);

  assert.ok(Math.abs(half - 0.109375) < 1e-9);
  assert.ok(Math.abs(most - 0.3125) < 1e-9);
  assert.ok(half < most && most < full);
});

test("sections without tokens score 0", () => {
  const breakdown = explainScore({ title: "", body: "" }, HOTEL_PERSONA, NO_JOB, WEIGHTS);
  assert.deepEqual(breakdown, {
    weightedTokens: 0,
    personaDensity: 0,
    jobDensity: 0,
    rawScore: 0,
    score: 0,
  });
});

test("a keyword in the title outweighs the same keyword in the body", () => {
  const inTitle = scoreSection({ title: "Hotel", body: "quiet street corner" }, HOTEL_PERSONA, NO_JOB, WEIGHTS);
  const inBody = scoreSection({ title: "Quiet", body: "hotel street corner" }, HOTEL_PERSONA, NO_JOB, WEIGHTS);
  assert.ok(Math.abs(inTitle - 0.1032) < 1e-9);
  assert.ok(Math.abs(inBody - 0.0408) < 1e-9);
  assert.ok(inTitle > inBody);
});

test("score does not decrease as keyword density grows", () => {
  let previous = -1;
  for (let hits = 0; hits <= 10; hits += 1) {
    const body = [...Array<string>(hits).fill("hotel"), ...Array<string>(10 - hits).fill("pebble")].join(" ");
    const score = scoreSection({ title: "", body }, HOTEL_PERSONA, NO_JOB, WEIGHTS);
    assert.ok(score >= previous, `score dropped at ${hits} hits`);
    previous = score;
  }
});

test("generic persona is scored on job keywords only", () => {
  const job = buildJobContext("Plan an itinerary");
  const breakdown = explainScore({ title: "", body: "plan itinerary pebble pebble" }, GENERIC_PERSONA, job, WEIGHTS);
  assert.equal(breakdown.personaDensity, 0);
  assert.equal(breakdown.jobDensity, 0.5);
  assert.ok(Math.abs(breakdown.score - 0.08) < 1e-9);
});

test("travel content outranks unrelated content for a travel planner", () => {
  const persona = new PersonaClassifier(loadDefaultPersonaTable()).classify("Travel Planner");
  const job = buildJobContext("Plan a trip of 4 days for a group of 10 college friends.");

  const hotels = scoreSection(
    { title: "Budget Hotels in Rome", body: "Affordable hotels near the station make Rome easy on a budget." },
    persona,
    job,
    WEIGHTS,
  );
  const printer = scoreSection(
    { title: "Printer Troubleshooting", body: "Reset the printer driver and check the cable connection." },
    persona,
    job,
    WEIGHTS,
  );

  assert.equal(printer, 0);
  assert.ok(hotels > printer);
});
