import { inspect } from "node:util";
import { loadConfig } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  component?: string;
  meta?: unknown;
  timestamp?: string;
}

const SEVERITY_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const FALLBACK_LEVEL: LogLevel = "info";

// Resolved from the environment on first use, or pinned by setLogLevel.
let minimumLevel: LogLevel | undefined;

function normalizeMeta(meta: unknown): unknown {
  if (meta === undefined) {
    return undefined;
  }

  try {
    JSON.stringify(meta);
    return meta;
  } catch {
    return inspect(meta, { depth: 3, breakLength: 80 });
  }
}

function write(entry: LogEntry): void {
  const payload: Record<string, unknown> = {
    level: entry.level,
    message: entry.message,
    timestamp: entry.timestamp ?? new Date().toISOString(),
  };

  if (entry.component) {
    payload.component = entry.component;
  }

  const normalizedMeta = normalizeMeta(entry.meta);
  if (normalizedMeta !== undefined) {
    payload.meta = normalizedMeta;
  }

  console.error(JSON.stringify(payload));
}

/**
 * A bad `ISSUE_LEDGER_LOG_LEVEL` must not surface from the code that happens
 * to log first: the level falls back to info and the problem is reported once.
 */
function resolveMinimumLevel(): LogLevel {
  if (minimumLevel !== undefined) {
    return minimumLevel;
  }

  try {
    minimumLevel = loadConfig().logLevel;
  } catch (error) {
    minimumLevel = FALLBACK_LEVEL;
    write({
      level: "warn",
      component: "logger",
      message: `Ignoring log level configuration, using ${FALLBACK_LEVEL}`,
      meta: { error: error instanceof Error ? error.message : String(error) },
    });
  }
  return minimumLevel;
}

/** Pins the threshold; `undefined` re-reads the environment on the next entry. */
export function setLogLevel(level: LogLevel | undefined): void {
  minimumLevel = level;
}

export function log(entry: LogEntry): void {
  if (SEVERITY_RANK[entry.level] >= SEVERITY_RANK[resolveMinimumLevel()]) {
    write(entry);
  }
}

export const logger = {
  debug(message: string, component?: string, meta?: unknown): void {
    log({ level: "debug", message, component, meta });
  },
  info(message: string, component?: string, meta?: unknown): void {
    log({ level: "info", message, component, meta });
  },
  warn(message: string, component?: string, meta?: unknown): void {
    log({ level: "warn", message, component, meta });
  },
  error(message: string, component?: string, meta?: unknown): void {
    log({ level: "error", message, component, meta });
  },
};
