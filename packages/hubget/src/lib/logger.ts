// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /** Line sink, stderr by default */
  write?: (line: string) => void;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  /** Logger that tags every line with a scope, e.g. "engine" */
  child(scope: string, defaultMeta?: Record<string, unknown>): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Create a structured logger.
 * Every level goes to stderr: stdout carries command results and NDJSON
 * progress events, and log lines must never interleave with them.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];
  const write = options.write ?? ((line: string) => console.error(line));

  function formatLine(
    level: LogLevel,
    message: string,
    scope: string | undefined,
    meta: Record<string, unknown>
  ): string {
    const timestamp = new Date().toISOString();

    if (options.json) {
      const entry: LogEntry = {
        timestamp,
        level,
        ...(scope && { scope }),
        message,
        ...meta,
      };
      return JSON.stringify(entry);
    }

    const prefix = `[${timestamp}] ${level.toUpperCase().padEnd(5)}`;
    const scopeStr = scope ? ` (${scope})` : "";
    const metaStr =
      Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${prefix}${scopeStr} ${message}${metaStr}`;
  }

  function createInstance(
    scope: string | undefined,
    defaultMeta: Record<string, unknown>
  ): Logger {
    const log = (
      level: LogLevel,
      message: string,
      meta: Record<string, unknown> = {}
    ) => {
      if (LOG_LEVELS[level] < minLevel) return;
      write(formatLine(level, message, scope, { ...defaultMeta, ...meta }));
    };

    return {
      debug: (msg, meta) => log("debug", msg, meta),
      info: (msg, meta) => log("info", msg, meta),
      warn: (msg, meta) => log("warn", msg, meta),
      error: (msg, meta) => log("error", msg, meta),
      child: (childScope, childMeta = {}) =>
        createInstance(scope ? `${scope}:${childScope}` : childScope, {
          ...defaultMeta,
          ...childMeta,
        }),
    };
  }

  return createInstance(undefined, {});
}

/**
 * Create a no-op logger that discards all messages.
 * Default for library callers that do not pass a logger.
 */
export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
