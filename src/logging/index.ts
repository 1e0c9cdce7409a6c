// ============================================================================
// LOGGING
// ============================================================================
// Coloured console output, one scope per module.

import type { LogLevel } from "../types/index.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_COLORS: Record<Exclude<LogLevel, "silent">, string> = {
  debug: "\x1b[90m",
  info: "\x1b[36m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};

let currentLevel: LogLevel = parseLevel(process.env.DUSK_LOG_LEVEL) ?? "info";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const lower = value.toLowerCase();
  return isLogLevel(lower) ? lower : undefined;
}

/**
 * Set the process-wide level. DUSK_LOG_LEVEL wins over the config file so
 * tests and one-off runs can silence output.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = parseLevel(process.env.DUSK_LOG_LEVEL) ?? level;
}

export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, "silent">, message: string) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    const line = `${LEVEL_COLORS[level]}[${scope}]\x1b[0m ${message}`;
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message, error) => {
      const detail = error instanceof Error ? `: ${error.message}` : error !== undefined ? `: ${String(error)}` : "";
      write("error", `${message}${detail}`);
    },
  };
}
