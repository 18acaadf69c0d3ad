/**
 * Structured logging
 *
 * One root pino logger writes JSON lines to stderr; components get child
 * loggers tagged with their name. Stdout stays free for command output.
 */

import pino from "pino";

export type Logger = pino.Logger;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

/** Environment variable selecting the log level */
export const LOG_LEVEL_ENV = "TNFUSION_LOG_LEVEL";

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the log level from the environment
 *
 * Unknown values fall back to `info`.
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = env[LOG_LEVEL_ENV]?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : "info";
}

let rootLogger: Logger | undefined;

function createRootLogger(): Logger {
  return pino(
    {
      level: getLogLevel(),
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    // Synchronous stderr so logs interleave correctly with tool output
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Get a component logger
 *
 * @example
 * ```typescript
 * const logger = createLogger("aligner");
 * logger.info({ fastq }, "Running tophat2");
 * ```
 */
export function createLogger(component: string): Logger {
  rootLogger ??= createRootLogger();
  return rootLogger.child({ component });
}
