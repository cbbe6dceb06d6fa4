#!/usr/bin/env node
import { createApp } from "./app";
import { loadEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const inputDir = process.argv[2] ?? env.inputDir;
  const { logger, processor } = createApp(env);

  logger.info("Ranking started", {
    inputDir,
    outputDir: env.outputDir ?? null,
    personaWeight: env.ranking.personaWeight,
    jobWeight: env.ranking.jobWeight,
    diversificationWindow: env.ranking.diversificationWindow,
    maxSections: env.ranking.maxSections,
  });

  const results = await processor.processAll(inputDir);
  const failed = results.filter((result) => !result.ok);

  logger.info("Ranking finished", {
    collections: results.length,
    succeeded: results.length - failed.length,
    failed: failed.map((result) => result.collection),
  });

  if (failed.length > 0) {
    process.exitCode = 1;
  }
}

bootstrap().catch((error) => {
  process.stderr.write(`Ranking failed: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
