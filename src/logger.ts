import { redactSecrets } from "./utils/sanitize.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** A logger that adds `fields` to every entry; per-call fields win. */
  child(fields: LogFields): Logger;
}

export interface LoggerOptions {
  /** Fixed threshold. Without one, setLogLevel and then LOG_LEVEL decide, defaulting to warn. */
  level?: LogLevel;
  /** Receives one JSON line per entry. Defaults to stderr; stdout carries the report. */
  write?: (line: string) => void;
  /** API keys in use, redacted from every line along with credential-shaped text. */
  secrets?: readonly string[];
  now?: () => Date;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let levelOverride: LogLevel | null = null;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_RANK;
}

/** Process-wide threshold used by loggers without a fixed level; null restores LOG_LEVEL. */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level;
}

function thresholdOf(fixed: LogLevel | undefined): LogLevel {
  if (fixed) return fixed;
  if (levelOverride) return levelOverride;
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "warn";
}

// Errors serialise to `{}` under JSON.stringify.
function plain(fields: LogFields): LogFields {
  const result: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    result[key] = value instanceof Error ? value.message : value;
  }
  return result;
}

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

export function createLogger(options: LoggerOptions = {}, bound: LogFields = {}): Logger {
  const write = options.write ?? writeStderr;
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel, message: string, fields: LogFields = {}) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[thresholdOf(options.level)]) return;
    const line = JSON.stringify({
      timestamp: now().toISOString(),
      level,
      message,
      ...plain({ ...bound, ...fields }),
    });
    write(redactSecrets(line, options.secrets));
  };

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
    child: (fields) => createLogger(options, { ...bound, ...fields }),
  };
}

export const logger: Logger = createLogger();
