import { PersonaDefinition, PersonaProfile, PersonaTable } from "../shared/types/persona.types";
import { containsAtWordStart, normalizeText } from "../text/tokenizer";

const GENERIC_PROFILE: PersonaProfile = Object.freeze({
  category: "generic",
  keywords: new Set<string>(),
});

export class PersonaClassifier {
  constructor(private readonly table: PersonaTable) {}

  classify(roleText: string): PersonaProfile {
    const normalized = normalizeText(roleText ?? "").trim();
    if (!normalized) {
      return GENERIC_PROFILE;
    }

    const match = this.table.definitions.find((definition) => matchesDefinition(normalized, definition));
    if (!match) {
      return GENERIC_PROFILE;
    }
    return {
      category: match.category,
      keywords: match.keywords,
    };
  }
}

// Triggers match at the start of a word, so "travel" hits "travelers" but "hr" does not hit "three".
function matchesDefinition(normalizedRole: string, definition: PersonaDefinition): boolean {
  return definition.triggers.some((trigger) => containsAtWordStart(normalizedRole, trigger));
}
