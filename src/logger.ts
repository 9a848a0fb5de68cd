/**
 * Structured Logging with Pino
 *
 * Provides a singleton Pino logger with structured JSON output.
 * In development, uses pino-pretty for human-readable logs.
 * Logs go to stderr so that command output on stdout stays machine-readable.
 *
 * Configuration:
 * - LOG_LEVEL env var (default: 'info')
 * - NODE_ENV controls pretty-printing
 */

import pino from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const IS_DEV = process.env.NODE_ENV === "development";

export type Logger = pino.Logger;

/**
 * Singleton logger instance.
 * Pretty-prints in development, JSON otherwise.
 */
export const logger: Logger = IS_DEV
  ? pino({
      level: LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss.l",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    })
  : pino(
      {
        level: LOG_LEVEL,
        formatters: {
          level(label) {
            return { level: label };
          },
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination(2)
    );

/**
 * Context for child loggers
 */
export interface LoggerContext {
  component?: string;
  baseUrl?: string;
  command?: string;
}

/**
 * Create a child logger with bound context fields.
 *
 * @example
 * ```ts
 * const log = createLogger({ component: 'transport' })
 * log.debug({ method: 'GET', path: '/v1/objects/hosts' }, 'request')
 * ```
 */
export function createLogger(context: LoggerContext, parent: Logger = logger): Logger {
  return parent.child(context);
}

/**
 * Map a CLI verbosity count (`-d`, `-dd`, `-ddd`) to a log level
 */
export function levelForVerbosity(verbosity: number): pino.LevelWithSilent {
  if (verbosity >= 3) return "trace";
  if (verbosity === 2) return "debug";
  if (verbosity === 1) return "info";
  return "warn";
}
