import { KnownTaskCategory, TASK_CATEGORIES, TaskCategory, TaskTable } from "../shared/types/persona.types";
import { containsAtWordStart, normalizeText } from "../text/tokenizer";
import taskTableData from "./task-table.json";

export function parseTaskTable(raw: unknown): TaskTable {
  if (!Array.isArray(raw)) {
    throw new Error("task_table_invalid: expected an array of task definitions");
  }

  const seen = new Set<KnownTaskCategory>();
  const definitions = raw.map((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new Error(`task_table_invalid: entry ${index} is not an object`);
    }
    const category = toTaskCategory(entry.category);
    if (!category || seen.has(category)) {
      throw new Error(`task_table_invalid: entry ${index} has an unknown or repeated category`);
    }
    seen.add(category);
    const terms = toLowercaseList(entry.terms);
    if (terms.length === 0) {
      throw new Error(`task_table_invalid: category ${category} has no terms`);
    }
    return Object.freeze({ category, terms: Object.freeze(terms) });
  });

  return Object.freeze({ definitions: Object.freeze(definitions) });
}

const DEFAULT_TASK_TABLE = parseTaskTable(taskTableData);

/**
 * First task category (in table order) with a term at the start of a word in
 * the job text; "general" when none matches.
 */
export function classifyTask(jobText: string, table: TaskTable = DEFAULT_TASK_TABLE): TaskCategory {
  const normalized = normalizeText(jobText ?? "");
  const match = table.definitions.find((definition) =>
    definition.terms.some((term) => containsAtWordStart(normalized, term)),
  );
  return match ? match.category : "general";
}

function toTaskCategory(value: unknown): KnownTaskCategory | null {
  return TASK_CATEGORIES.find((category) => category === value) ?? null;
}

function toLowercaseList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
