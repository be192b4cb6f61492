/**
 * Logger Module
 * Structured logging using pino
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/** Every logger handed out, so the CLI can raise verbosity after modules load */
const registry = new Set<PinoLogger>();

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

function isTestRun(): boolean {
  return process.env.VITEST !== undefined || process.env.NODE_ENV === "test";
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTestRun()) return "silent";
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * Console output goes to stderr so it never interleaves with answers
 * printed on stdout.
 *
 * @example
 * ```typescript
 * const logger = createLogger("graph-writer");
 * logger.info({ chunks: 12 }, "Chunks written");
 * logger.error({ err }, "Upsert failed");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  let logger: PinoLogger;

  if (isDevelopment() && !isTestRun()) {
    logger = pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  } else {
    logger = pino(baseOptions, pino.destination(2));
  }

  registry.add(logger);
  return logger;
}

/**
 * Change the level of every logger created so far
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of registry) {
    logger.level = level;
  }
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
