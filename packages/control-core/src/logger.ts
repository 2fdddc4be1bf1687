import type { LogLevel, Logger } from "./types";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

export function resolveLogLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  if (typeof process === "undefined" || !process.env) return "info";

  const raw = (process.env.TILTCARD_LOG_LEVEL ?? (process.env.NODE_ENV === "production" ? "info" : "debug"))
    .toString()
    .trim()
    .toLowerCase();

  return isLogLevel(raw) ? raw : "info";
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  const minRank = LEVELS[resolveLogLevel(level)];
  const prefix = `[tiltcard:${scope}]`;
  const shouldLog = (l: LogLevel): boolean => LEVELS[l] >= minRank;

  return {
    debug: (...args) => {
      if (shouldLog("debug")) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (shouldLog("info")) console.log(prefix, ...args);
    },
    warn: (...args) => {
      if (shouldLog("warn")) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (shouldLog("error")) console.error(prefix, ...args);
    },
  };
}
