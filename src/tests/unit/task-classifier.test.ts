import assert from "node:assert/strict";
import { test } from "node:test";
import { classifyTask, parseTaskTable } from "../../persona/task-classifier";

test("the first matching task category wins", () => {
  assert.equal(classifyTask("Prepare a literature review"), "review");
  assert.equal(classifyTask("Summarize and highlight key findings"), "summarize");
  assert.equal(classifyTask("Create and manage fillable forms"), "prepare");
});

test("terms match at the start of a word", () => {
  assert.equal(classifyTask("Planning a dinner"), "prepare");
  assert.equal(classifyTask("Explain the results"), "general");
});

test("empty or unmatched job text is general", () => {
  assert.equal(classifyTask(""), "general");
  assert.equal(classifyTask("Find vegetarian dishes"), "general");
});

test("a custom task table is honored", () => {
  const table = parseTaskTable([{ category: "learn", terms: ["Explain"] }]);
  assert.equal(classifyTask("Explain the results", table), "learn");
});

test("malformed task tables are rejected", () => {
  assert.throws(() => parseTaskTable({}), /task_table_invalid: expected an array/);
  assert.throws(() => parseTaskTable([{ category: "dance", terms: ["x"] }]), /unknown or repeated category/);
  assert.throws(() => parseTaskTable([{ category: "learn", terms: [] }]), /category learn has no terms/);
});
