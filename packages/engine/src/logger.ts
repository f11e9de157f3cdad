/**
 * Structured Logging Utility
 *
 * Provides structured JSON logging when CIPHERSCORE_LOG_JSON=1 is set.
 * Otherwise, uses standard console logging. Data is always passed through
 * redactSecrets first, so plaintexts and key material never reach the output.
 */

import { redactSecrets } from "./security/redact";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function minimumLevel(): LogLevel {
  const configured = process.env.CIPHERSCORE_LOG_LEVEL;
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return configured;
  }
  return "info";
}

/**
 * Log a message with optional data.
 *
 * If CIPHERSCORE_LOG_JSON=1, outputs JSON lines:
 *   { ts_ms, level, message, data }
 */
export function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  // Read env at call time (not module load time) so tests can toggle it
  if (LEVEL_RANK[level] < LEVEL_RANK[minimumLevel()]) {
    return;
  }
  const jsonMode = process.env.CIPHERSCORE_LOG_JSON === "1";
  const sanitizedData = data ? redactSecrets(data) : undefined;

  if (jsonMode) {
    const logLine = {
      ts_ms: Date.now(),
      level,
      message,
      ...(sanitizedData !== undefined && { data: sanitizedData }),
    };
    console.log(JSON.stringify(logLine));
    return;
  }

  const prefix = `[${level.toUpperCase()}]`;
  const sink = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
  if (sanitizedData !== undefined) {
    sink(prefix, message, sanitizedData);
  } else {
    sink(prefix, message);
  }
}

/**
 * Logger bound to a component name, added to every line as `component`.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function createLogger(component: string): Logger {
  const emit = (level: LogLevel) => (message: string, data?: Record<string, unknown>) =>
    log(level, message, { component, ...data });
  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
