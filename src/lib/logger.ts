/**
 * Structured Logger
 *
 * Goals:
 * - JSON lines, one record per call
 * - Redact secrets by default
 * - Level and sink are explicit options, not process-wide state
 *
 * Every line goes to stderr; stdout is reserved for progress output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Default level when the caller does not pass one. Test runs stay quiet
 * unless asked otherwise.
 */
export function resolveDefaultLevel(verbose = false): LogLevel {
  if (verbose) return "debug";
  if (process.env.VITEST || process.env.NODE_ENV === "test") return "error";
  return "info";
}

const REDACT_KEYS = new Set([
  "password",
  "secret",
  "token",
  "apitoken",
  "authorization",
  "cookie",
  "set-cookie",
]);

function scrub(value: unknown, depth = 0): unknown {
  if (depth > 6) return "[redacted-depth]";
  if (value === null || value === undefined) return value;
  if (typeof value !== "object") return value;

  if (Array.isArray(value)) {
    return value.map((item) => scrub(item, depth + 1));
  }

  const output: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    if (REDACT_KEYS.has(key.toLowerCase())) {
      output[key] = "[redacted]";
      continue;
    }
    output[key] = scrub(val, depth + 1);
  }
  return output;
}

function scrubMeta(meta: LogMeta): LogMeta {
  const output: LogMeta = {};
  for (const [key, val] of Object.entries(meta)) {
    output[key] = REDACT_KEYS.has(key.toLowerCase()) ? "[redacted]" : scrub(val, 1);
  }
  return output;
}

function safeJson(obj: unknown): string {
  try {
    return JSON.stringify(obj);
  } catch {
    // Last-ditch fallback.
    return JSON.stringify({ msg: "[unserializable]" });
  }
}

export type LogMeta = Record<string, unknown> & {
  component?: string;
  title?: string;
};

export type LogSink = (line: string, level: LogLevel) => void;

export interface Logger {
  readonly level: LogLevel;
  child: (meta: LogMeta) => Logger;
  debug: (meta: LogMeta, msg: string) => void;
  info: (meta: LogMeta, msg: string) => void;
  warn: (meta: LogMeta, msg: string) => void;
  error: (meta: LogMeta, msg: string) => void;
}

export interface LoggerOptions {
  level?: LogLevel;
  meta?: LogMeta;
  sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveDefaultLevel();
  const sink = options.sink ?? stderrSink;
  const base = scrubMeta(options.meta ?? {});
  const minLevel = LEVELS[level];

  const log = (recordLevel: LogLevel, meta: LogMeta, msg: string) => {
    if (LEVELS[recordLevel] < minLevel) return;

    const record: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level: recordLevel,
      msg,
      ...base,
      ...scrubMeta(meta),
    };

    sink(safeJson(record) + "\n", recordLevel);
  };

  return {
    level,
    child: (meta: LogMeta) => createLogger({ level, sink, meta: { ...base, ...meta } }),
    debug: (meta: LogMeta, msg: string) => log("debug", meta, msg),
    info: (meta: LogMeta, msg: string) => log("info", meta, msg),
    warn: (meta: LogMeta, msg: string) => log("warn", meta, msg),
    error: (meta: LogMeta, msg: string) => log("error", meta, msg),
  };
}
