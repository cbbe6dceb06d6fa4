import { CollectionDocumentRef, CollectionInput } from "../shared/types/collection.types";

export const COLLECTION_INPUT_FILE = "challenge1b_input.json";
export const COLLECTION_OUTPUT_FILE = "challenge1b_output.json";

export function parseCollectionInput(raw: unknown): CollectionInput {
  if (!isRecord(raw)) {
    throw new Error("collection_input_invalid: root must be an object");
  }
  if (!Array.isArray(raw.documents)) {
    throw new Error("collection_input_invalid: documents must be an array");
  }

  const documents: CollectionDocumentRef[] = raw.documents.map((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new Error(`collection_input_invalid: documents[${index}] must be an object`);
    }
    const filename = toText(entry.filename);
    if (!filename) {
      throw new Error(`collection_input_invalid: documents[${index}].filename is required`);
    }
    return {
      filename,
      title: toText(entry.title),
    };
  });

  return {
    challengeInfo: isRecord(raw.challenge_info) ? { ...raw.challenge_info } : {},
    documents,
    personaRole: toText(readNested(raw, "persona", "role")),
    jobTask: toText(readNested(raw, "job_to_be_done", "task")),
  };
}

function readNested(source: Record<string, unknown>, key: string, nestedKey: string): unknown {
  const value = source[key];
  if (!isRecord(value)) {
    return undefined;
  }
  return value[nestedKey];
}

function toText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
