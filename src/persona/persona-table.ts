import {
  KnownPersonaCategory,
  PERSONA_CATEGORIES,
  PersonaDefinition,
  PersonaTable,
} from "../shared/types/persona.types";
import personaTableData from "./persona-table.json";

export function parsePersonaTable(raw: unknown): PersonaTable {
  if (!Array.isArray(raw)) {
    throw new Error("persona_table_invalid: expected an array of persona definitions");
  }

  const seen = new Set<KnownPersonaCategory>();
  const definitions: PersonaDefinition[] = [];
  raw.forEach((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new Error(`persona_table_invalid: entry ${index} is not an object`);
    }
    const category = toCategory(entry.category);
    if (!category) {
      throw new Error(`persona_table_invalid: entry ${index} has unknown category ${String(entry.category)}`);
    }
    if (seen.has(category)) {
      throw new Error(`persona_table_invalid: duplicate category ${category}`);
    }
    seen.add(category);

    const triggers = toLowercaseList(entry.triggers);
    if (triggers.length === 0) {
      throw new Error(`persona_table_invalid: category ${category} has no triggers`);
    }

    definitions.push(
      Object.freeze({
        category,
        triggers: Object.freeze(triggers),
        keywords: new Set(toLowercaseList(entry.keywords)),
      }),
    );
  });

  return Object.freeze({ definitions: Object.freeze(definitions) });
}

export function loadDefaultPersonaTable(): PersonaTable {
  return parsePersonaTable(personaTableData);
}

function toCategory(value: unknown): KnownPersonaCategory | null {
  if (typeof value !== "string") {
    return null;
  }
  return PERSONA_CATEGORIES.find((category) => category === value) ?? null;
}

function toLowercaseList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const items = value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return Array.from(new Set(items));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
