import dotenv from "dotenv";
import { LogLevel } from "./logger";

dotenv.config();

export const MAX_SECTIONS_CAP = 15;
const WEIGHT_SUM_TOLERANCE = 1e-6;

export interface RankingConfig {
  personaWeight: number;
  jobWeight: number;
  diversificationWindow: number;
  maxSections: number;
  amplification: number;
}

export interface EnvConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  inputDir: string;
  outputDir?: string;
  ranking: RankingConfig;
}

type EnvSource = Record<string, string | undefined>;

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const personaWeightRaw = source.RANKING_PERSONA_WEIGHT ?? "0.6";
  const jobWeightRaw = source.RANKING_JOB_WEIGHT ?? "0.4";
  const windowRaw = source.RANKING_DIVERSIFICATION_WINDOW ?? "5";
  const maxSectionsRaw = source.RANKING_MAX_SECTIONS ?? String(MAX_SECTIONS_CAP);
  const amplificationRaw = source.RANKING_AMPLIFICATION ?? "3";
  const personaWeight = Number(personaWeightRaw);
  const jobWeight = Number(jobWeightRaw);
  const diversificationWindow = Number(windowRaw);
  const maxSections = Number(maxSectionsRaw);
  const amplification = Number(amplificationRaw);

  if (!Number.isFinite(personaWeight) || personaWeight < 0 || personaWeight > 1) {
    throw new Error(`Invalid RANKING_PERSONA_WEIGHT value: ${personaWeightRaw}. Expected number between 0 and 1.`);
  }
  if (!Number.isFinite(jobWeight) || jobWeight < 0 || jobWeight > 1) {
    throw new Error(`Invalid RANKING_JOB_WEIGHT value: ${jobWeightRaw}. Expected number between 0 and 1.`);
  }
  if (Math.abs(personaWeight + jobWeight - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new Error(
      `Invalid ranking weights: RANKING_PERSONA_WEIGHT + RANKING_JOB_WEIGHT must equal 1, got ${personaWeight + jobWeight}`,
    );
  }
  if (!Number.isInteger(diversificationWindow) || diversificationWindow < 0) {
    throw new Error(`Invalid RANKING_DIVERSIFICATION_WINDOW value: ${windowRaw}`);
  }
  if (!Number.isInteger(maxSections) || maxSections < 1 || maxSections > MAX_SECTIONS_CAP) {
    throw new Error(`Invalid RANKING_MAX_SECTIONS value: ${maxSectionsRaw}. Expected integer between 1 and ${MAX_SECTIONS_CAP}.`);
  }
  if (!Number.isFinite(amplification) || amplification <= 0) {
    throw new Error(`Invalid RANKING_AMPLIFICATION value: ${amplificationRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    logLevel: parseLogLevel(logLevelRaw),
    inputDir: getOptionalTrimmed(source, "INPUT_DIR") ?? "./input",
    outputDir: getOptionalTrimmed(source, "OUTPUT_DIR"),
    ranking: {
      personaWeight,
      jobWeight,
      diversificationWindow,
      maxSections,
      amplification,
    },
  };
}

export function defaultRankingConfig(): RankingConfig {
  return loadEnv({}).ranking;
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
