// src/observability/logger.ts
// Structured JSON logging (pino)
//
// - LOG_LEVEL picks the level (default info)
// - LOG_PRETTY=true switches to pino-pretty for local development
// - createLogger(module) hands out module-scoped child loggers

import pino, { type Logger } from "pino";

/* ---------- Types ---------- */
const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/* ---------- Configuration ---------- */

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

/**
 * Configured log level; tests run at "silent" unless LOG_LEVEL says otherwise.
 */
export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) return level;
  return process.env.VITEST ? "silent" : "info";
}

export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

/* ---------- Logger Factory ---------- */

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (rootLogger) return rootLogger;

  const options: pino.LoggerOptions = {
    level: getLogLevel(),
    base: {
      service: "consistency-patch-service",
      version: process.env.npm_package_version || "unknown",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Provider keys travel in headers of outgoing calls; never log them
    redact: ["headers.authorization", "headers['x-api-key']", "apiKey"],
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

  return rootLogger;
}

/**
 * Module-scoped logger.
 *
 * @example
 * const log = createLogger('patching/workflow');
 * log.info({ files: 3 }, 'patching related documents');
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();
  return moduleName ? root.child({ module: moduleName }) : root;
}

/** Child logger carrying extra bindings (request id, file, ...). */
export function createChildLogger(
  parent: Logger,
  bindings: Record<string, unknown>
): Logger {
  return parent.child(bindings);
}

export const logger = createLogger();
