import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { DocumentService } from "./documents/document.service";
import { PersonaClassifier } from "./persona/persona-classifier";
import { loadDefaultPersonaTable } from "./persona/persona-table";
import { CollectionProcessor } from "./pipeline/collection.processor";
import { RankingPipeline } from "./pipeline/ranking.pipeline";

export interface AppContext {
  logger: Logger;
  pipeline: RankingPipeline;
  processor: CollectionProcessor;
}

export function createApp(env: EnvConfig, logger: Logger = createLogger({ minLevel: env.logLevel })): AppContext {
  const classifier = new PersonaClassifier(loadDefaultPersonaTable());
  const pipeline = new RankingPipeline(classifier, env.ranking, logger);
  const documentService = new DocumentService(logger);
  const processor = new CollectionProcessor(pipeline, documentService, logger, {
    outputDir: env.outputDir,
  });

  return { logger, pipeline, processor };
}
