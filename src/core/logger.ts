/**
 * Structured Logger
 *
 * One JSON object per line on the console, e.g.
 * {"level":"info","scope":"checkout","action":"checkout_completed","checkout_id":"..."}
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(action: string, fields?: LogFields): void;
  info(action: string, fields?: LogFields): void;
  warn(action: string, fields?: LogFields): void;
  error(action: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

function serializeError(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function createLogger(
  level: LogLevel = "info",
  scope?: string,
  sink: LogSink = consoleSink
): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (lvl: Exclude<LogLevel, "silent">, action: string, fields: LogFields = {}) => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    const entry: LogFields = { level: lvl, ...(scope ? { scope } : {}), action };
    for (const [key, value] of Object.entries(fields)) {
      entry[key] = serializeError(value);
    }
    entry.timestamp = new Date().toISOString();
    sink(lvl, JSON.stringify(entry));
  };

  return {
    debug: (action, fields) => write("debug", action, fields),
    info: (action, fields) => write("info", action, fields),
    warn: (action, fields) => write("warn", action, fields),
    error: (action, fields) => write("error", action, fields),
    child: (childScope) =>
      createLogger(level, scope ? `${scope}.${childScope}` : childScope, sink),
  };
}

export const silentLogger: Logger = createLogger("silent");
