import { JobContext } from "../shared/types/persona.types";
import { DEFAULT_STOPWORDS, extractKeywords } from "../text/tokenizer";
import { classifyTask } from "./task-classifier";

export function buildJobContext(
  rawText: string,
  stopwords: ReadonlySet<string> = DEFAULT_STOPWORDS,
): JobContext {
  const text = (rawText ?? "").trim();
  return Object.freeze({
    rawText: text,
    derivedKeywords: extractKeywords(text, stopwords),
    taskType: classifyTask(text),
  });
}
