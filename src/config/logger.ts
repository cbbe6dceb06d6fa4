export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const MAX_META_STRING_CHARS = 500;

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

interface CreateLoggerOptions {
  minLevel?: LogLevel;
  write?: (line: string) => void;
}

export interface LoggerContext {
  collection?: string;
  document?: string;
  stage?: "input" | "extract" | "detect" | "rank" | "assemble" | "write";
  persona_category?: string;
  candidates?: number;
  rejected?: number;
  retained?: number;
  latency_ms?: number;
  ok?: boolean;
  error_code?: string;
}

/**
 * JSON-lines logger. Entries below `minLevel` are dropped and long string
 * fields are cut to MAX_META_STRING_CHARS.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const minLevel = options?.minLevel ?? "info";
  const write = options?.write ?? ((line: string) => process.stdout.write(line));

  const emit = (level: LogLevel) => (message: string, meta?: LogMeta): void => {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[minLevel]) {
      return;
    }
    const entry: LogMeta = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };
    if (meta && Object.keys(meta).length > 0) {
      entry.meta = truncateMeta(meta);
    }
    write(`${safeJson(entry)}\n`);
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

// Every entry written through the returned logger carries `bindings`; per-call meta wins on conflicts.
export function withContext(logger: Logger, bindings: LoggerContext): Logger {
  const merge = (meta?: LogMeta): LogMeta => ({ ...bindings, ...(meta ?? {}) });
  return {
    debug: (message, meta) => logger.debug(message, merge(meta)),
    info: (message, meta) => logger.info(message, merge(meta)),
    warn: (message, meta) => logger.warn(message, merge(meta)),
    error: (message, meta) => logger.error(message, merge(meta)),
  };
}

export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: LoggerContext,
  fields?: LogMeta,
): void {
  logger[level](message, { ...context, ...(fields ?? {}) });
}

export function errorMeta(error: unknown): { error: string } {
  return { error: error instanceof Error ? error.message : String(error) };
}

function truncateMeta(meta: LogMeta): LogMeta {
  const output: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    output[key] =
      typeof value === "string" && value.length > MAX_META_STRING_CHARS
        ? `${value.slice(0, MAX_META_STRING_CHARS)}...`
        : value;
  }
  return output;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"[unserializable]\"";
  }
}
