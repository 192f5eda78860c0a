/**
 * Structured logger shared by every service.
 *
 * Each line is tagged with the component that wrote it ("tracker", "bank",
 * "http", ...). Production (NODE_ENV=production) emits one JSON object per
 * line; anywhere else the output is a short human-readable line.
 *
 * Severity order: debug < info < warn < error. LOG_LEVEL sets the minimum
 * (default "info"); NODE_ENV=test defaults to "warn" so test output stays quiet.
 *
 *   logger.info("stocks", "Prices updated", { symbols: 8 });
 */

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function minimumLevel(): LogLevel {
  const fallback = process.env.NODE_ENV === "test" ? "warn" : "info";
  const raw = (process.env.LOG_LEVEL || fallback).toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function format(entry: LogEntry): string {
  if (process.env.NODE_ENV === "production") {
    return JSON.stringify(entry);
  }
  const { timestamp: _ts, level, component, message, ...extra } = entry;
  const tail = Object.keys(extra).length > 0 ? " " + JSON.stringify(extra) : "";
  return `[${component}] ${level.toUpperCase()} ${message}${tail}`;
}

function write(
  level: LogLevel,
  component: string,
  message: string,
  extra?: Record<string, unknown>,
): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minimumLevel()]) {
    return;
  }

  const line = format({
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    ...extra,
  });

  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

/** Message text of anything that was thrown. */
function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const logger = {
  debug(component: string, message: string, extra?: Record<string, unknown>): void {
    write("debug", component, message, extra);
  },

  info(component: string, message: string, extra?: Record<string, unknown>): void {
    write("info", component, message, extra);
  },

  warn(component: string, message: string, extra?: Record<string, unknown>): void {
    write("warn", component, message, extra);
  },

  error(component: string, message: string, extra?: Record<string, unknown>): void {
    write("error", component, message, extra);
  },
};

export { logger, errorMessage };
export type { LogLevel, LogEntry };
