/**
 * Structured logging utility
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function threshold(): number {
  const env = process.env.LOG_LEVEL?.toLowerCase();
  if (process.env.DEBUG) return LEVEL_ORDER.debug;
  return LEVEL_ORDER[isLogLevel(env) ? env : "info"];
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= threshold();
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, error?: unknown): void;
}

export function createLogger(scope?: string): Logger {
  const prefix = scope ? ` [${scope}]` : "";

  return {
    debug: (msg, meta) => {
      if (enabled("debug")) {
        console.log(`[DEBUG]${prefix} ${msg}`, meta ? JSON.stringify(meta) : "");
      }
    },

    info: (msg, meta) => {
      if (enabled("info")) {
        console.log(`[INFO]${prefix} ${msg}`, meta ? JSON.stringify(meta) : "");
      }
    },

    warn: (msg, meta) => {
      if (enabled("warn")) {
        console.warn(`[WARN]${prefix} ${msg}`, meta ? JSON.stringify(meta) : "");
      }
    },

    error: (msg, error) => {
      if (enabled("error")) {
        console.error(`[ERROR]${prefix} ${msg}`, error === undefined ? "" : formatError(error));
      }
    },
  };
}

export const logger = createLogger();
