/**
 * Structured logging utility
 * Severity-tagged console lines with optional JSON metadata and a scope prefix
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

function currentThreshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) {
    return LEVEL_ORDER[configured];
  }
  return process.env.DEBUG ? LEVEL_ORDER.debug : LEVEL_ORDER.info;
}

function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) return "";
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
}

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, error?: unknown): void;
}

/**
 * Create a logger whose lines carry a `[scope]` prefix
 */
export function createLogger(scope?: string): Logger {
  const prefix = scope ? `[${scope}] ` : "";

  return {
    debug: (msg, meta) => {
      if (currentThreshold() <= LEVEL_ORDER.debug) {
        console.log(`[DEBUG] ${prefix}${msg}`, formatMeta(meta));
      }
    },

    info: (msg, meta) => {
      if (currentThreshold() <= LEVEL_ORDER.info) {
        console.log(`[INFO] ${prefix}${msg}`, formatMeta(meta));
      }
    },

    warn: (msg, meta) => {
      if (currentThreshold() <= LEVEL_ORDER.warn) {
        console.warn(`[WARN] ${prefix}${msg}`, formatMeta(meta));
      }
    },

    error: (msg, error) => {
      console.error(`[ERROR] ${prefix}${msg}`, error ?? "");
    },
  };
}

export const logger = createLogger();

/**
 * Flatten an unknown thrown value into a loggable message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
