/**
 * Leveled logger. Writes to stderr so report output on stdout stays clean;
 * JSON lines in production, readable lines otherwise.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  write?: (line: string) => void;
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "warn"): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return fallback;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "warn"];
  const json = options.json ?? false;
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());

  function log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const timestamp = now().toISOString();
    if (json) {
      write(JSON.stringify({ timestamp, level, message, ...meta }));
      return;
    }
    const metaText = meta ? ` ${JSON.stringify(meta)}` : "";
    write(`[${timestamp}] ${level.toUpperCase()} ${message}${metaText}`);
  }

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
  };
}

export const logger = createLogger({
  level: parseLogLevel(process.env.RULECHECK_LOG_LEVEL),
  json: process.env.NODE_ENV === "production",
});
