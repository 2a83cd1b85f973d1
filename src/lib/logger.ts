// src/lib/logger.ts
// Structured logging: one JSON record per line on stderr.
// stdout belongs to the CLI's conversation with the user, so nothing here writes to it.

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

export type LogContext = {
  component?: string;
  [key: string]: unknown;
};

export interface AppLogger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
  child(context: LogContext): AppLogger;
}

export type LogSink = (line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const SECRET_KEY = /pass(word)?|secret|token|authorization|api[-_]?key/i;

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

function resolveLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "warn").toLowerCase();
  return isLogLevel(raw) ? raw : "warn";
}

export function redactSecrets(data: LogData): LogData {
  const out: LogData = {};
  for (const [key, value] of Object.entries(data)) {
    if (SECRET_KEY.test(key)) {
      out[key] = "[REDACTED]";
    } else if (value instanceof Error) {
      out[key] = value.message;
    } else {
      out[key] = value;
    }
  }
  return out;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export function createLogger(
  baseContext: LogContext = {},
  options: { level?: LogLevel; sink?: LogSink } = {}
): AppLogger {
  const minRank = LEVEL_RANK[options.level ?? resolveLevel()];
  const sink = options.sink ?? stderrSink;

  const log = (level: LogLevel, event: string, data?: LogData): void => {
    if (LEVEL_RANK[level] < minRank) return;
    const record = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...redactSecrets(baseContext),
      ...(data ? redactSecrets(data) : {}),
    };
    sink(JSON.stringify(record));
  };

  return {
    debug: (event, data) => log("debug", event, data),
    info: (event, data) => log("info", event, data),
    warn: (event, data) => log("warn", event, data),
    error: (event, data) => log("error", event, data),
    child: (context) => createLogger({ ...baseContext, ...context }, { level: options.level, sink }),
  };
}

/** Logger that drops everything; handy default for library-style calls. */
export const silentLogger: AppLogger = createLogger({}, { sink: () => undefined });
