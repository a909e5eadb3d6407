// src/observability/logger.ts
// Structured JSON logging (pino)
//
// - LOG_LEVEL picks the level (default info, silent under vitest)
// - LOG_PRETTY=true switches to pino-pretty for local development
// - createLogger(module) hands out module-scoped child loggers

import pino, { Logger } from "pino";

/* ---------- Types ---------- */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

/* ---------- Configuration ---------- */

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((l) => l === value);
}

/**
 * Resolve the log level from the environment.
 * Test runs default to silent so assertions are not buried in output.
 */
export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return process.env.VITEST ? "silent" : "info";
}

export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

/* ---------- Logger Factory ---------- */

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const options: pino.LoggerOptions = {
      level: getLogLevel(),
      base: {
        service: "blankfill-api",
        version: process.env.npm_package_version || "unknown",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    rootLogger = isPrettyEnabled()
      ? pino({
          ...options,
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        })
      : pino(options);
  }

  return rootLogger;
}

/**
 * Create a logger, optionally scoped to a module
 *
 * @example
 * const log = createLogger('conversation/service');
 * log.info({ sessionId }, 'session opened');
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();
  return moduleName ? root.child({ module: moduleName }) : root;
}

/** Child logger with extra bindings (requestId, documentId, ...) */
export function createChildLogger(
  parent: Logger,
  bindings: Record<string, unknown>
): Logger {
  return parent.child(bindings);
}

export const logger = createLogger();
