/**
 * Small structured logger.
 *
 * Library code takes an optional `Logger` and defaults to the noop one; the
 * server wires a console logger from config.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogContextValue = string | number | boolean | null | LogContextValue[] | { [key: string]: LogContextValue };

export interface LogContext {
  requestId?: string;
  operation?: string;
  durationMs?: number;
  [key: string]: LogContextValue | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** default: "debug" */
  minLevel?: LogLevel;
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  format?: "json" | "pretty";
}

export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

export function isLogLevel(v: unknown): v is LogLevel {
  return LOG_LEVELS.some((l) => l === v);
}

function isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? "debug";
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!isAtLeast(level, minLevel)) return;

    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (context !== undefined) entry.context = context;
    if (error !== undefined) entry.error = error;
    output(entry);
  };

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, error, context) => log("error", message, context, error),
  };
}

export function formatEntry(entry: LogEntry, format: "json" | "pretty"): string {
  if (format === "json") {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && { error: { name: entry.error.name, message: entry.error.message, stack: entry.error.stack } }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let out = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.context) out += ` ${JSON.stringify(entry.context)}`;
  if (entry.error) out += `\n  ${entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`}`;
  return out;
}

/** warn and error go to stderr, the rest to stdout */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? "json";
  return createLogger({
    ...config,
    output: (entry) => {
      const line = formatEntry(entry, format);
      if (entry.level === "warn" || entry.level === "error") console.error(line);
      else console.log(line);
    },
  });
}

export function createNoopLogger(): Logger {
  return createLogger({ minLevel: "error", output: () => {} });
}

/** Captures entries for assertions. */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({ ...config, output: (entry) => logs.push(entry) });

  return {
    ...logger,
    getLogs: () => [...logs],
    getLogsByLevel: (level) => logs.filter((e) => e.level === level),
    clear: () => {
      logs.length = 0;
    },
  };
}
