/**
 * Console logger with a `[Scope]` prefix and level filtering.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger for a nested scope, e.g. `[ThreeLayerOrchestrator:run-1]` */
  child(scope: string): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum level to output (default: info) */
  level?: LogLevel;
  /** Where lines go (default: the console method for the level) */
  sink?: LogSink;
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

function formatLine(scope: string, message: string, context?: Record<string, unknown>): string {
  let line = `[${scope}] ${message}`;
  if (context && Object.keys(context).length > 0) {
    line += ` ${serializeContext(context)}`;
  }
  return line;
}

/** JSON when possible; BigInt or circular values fall back to key=String(value) pairs */
function serializeContext(context: Record<string, unknown>): string {
  try {
    return JSON.stringify(context);
  } catch {
    const pairs = Object.entries(context).map(([key, value]) => `${key}=${String(value)}`);
    return `{${pairs.join(", ")}}`;
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const minimum = LOG_LEVEL_PRIORITY[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;

  const log = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVEL_PRIORITY[level] < minimum) {
      return;
    }
    sink(level, formatLine(scope, message, context));
  };

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (child) => createLogger(`${scope}:${child}`, options),
  };
}

/** Discards everything; handy in tests */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
