export const PERSONA_CATEGORIES = [
  "travel_planner",
  "hr_professional",
  "food_contractor",
  "researcher",
  "student",
  "analyst",
  "teacher",
  "manager",
  "entrepreneur",
] as const;

export type KnownPersonaCategory = (typeof PERSONA_CATEGORIES)[number];
export type PersonaCategory = KnownPersonaCategory | "generic";

export interface PersonaDefinition {
  category: KnownPersonaCategory;
  triggers: ReadonlyArray<string>;
  keywords: ReadonlySet<string>;
}

export interface PersonaTable {
  definitions: ReadonlyArray<PersonaDefinition>;
}

export interface PersonaProfile {
  category: PersonaCategory;
  keywords: ReadonlySet<string>;
}

export const TASK_CATEGORIES = ["review", "learn", "analyze", "prepare", "summarize"] as const;

export type KnownTaskCategory = (typeof TASK_CATEGORIES)[number];
export type TaskCategory = KnownTaskCategory | "general";

export interface TaskDefinition {
  category: KnownTaskCategory;
  terms: ReadonlyArray<string>;
}

export interface TaskTable {
  definitions: ReadonlyArray<TaskDefinition>;
}

export interface JobContext {
  rawText: string;
  derivedKeywords: ReadonlySet<string>;
  taskType: TaskCategory;
}
