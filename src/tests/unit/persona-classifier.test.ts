import assert from "node:assert/strict";
import { test } from "node:test";
import { PersonaClassifier } from "../../persona/persona-classifier";
import { loadDefaultPersonaTable, parsePersonaTable } from "../../persona/persona-table";

const classifier = new PersonaClassifier(loadDefaultPersonaTable());

test("travel planner role resolves to travel_planner with its vocabulary", () => {
  const profile = classifier.classify("Travel Planner, group trips");
  assert.equal(profile.category, "travel_planner");
  assert.equal(profile.keywords.has("itinerary"), true);
  assert.equal(profile.keywords.has("accommodation"), true);
});

test("empty role resolves to the generic profile with an empty vocabulary", () => {
  const profile = classifier.classify("");
  assert.equal(profile.category, "generic");
  assert.equal(profile.keywords.size, 0);
});

test("unrecognized role resolves to generic", () => {
  assert.equal(classifier.classify("Astronaut").category, "generic");
});

test("matching is case-insensitive", () => {
  assert.equal(classifier.classify("HR PROFESSIONAL").category, "hr_professional");
  assert.equal(classifier.classify("PhD Researcher in Computational Biology").category, "researcher");
});

test("triggers only match at the start of a word", () => {
  assert.equal(classifier.classify("Three-day planner").category, "generic");
});

test("first matching category in declaration order wins", () => {
  assert.equal(classifier.classify("Food researcher").category, "food_contractor");
  assert.equal(classifier.classify("Research manager").category, "researcher");
});

test("classifier uses the table it was given", () => {
  const table = parsePersonaTable([
    { category: "student", triggers: ["Learner"], keywords: ["Quiz", "quiz", " flashcards "] },
  ]);
  const custom = new PersonaClassifier(table);
  const profile = custom.classify("Adult learner");
  assert.equal(profile.category, "student");
  assert.deepEqual([...profile.keywords].sort(), ["flashcards", "quiz"]);
  assert.equal(custom.classify("Travel agent").category, "generic");
});

test("parsePersonaTable rejects unknown and duplicate categories", () => {
  assert.throws(
    () => parsePersonaTable([{ category: "pilot", triggers: ["pilot"], keywords: [] }]),
    /unknown category pilot/,
  );
  assert.throws(
    () =>
      parsePersonaTable([
        { category: "student", triggers: ["student"], keywords: [] },
        { category: "student", triggers: ["pupil"], keywords: [] },
      ]),
    /duplicate category student/,
  );
  assert.throws(() => parsePersonaTable({}), /expected an array/);
});
