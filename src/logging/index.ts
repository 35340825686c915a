/**
 * Structured logging for the traversal engine.
 *
 * A single pino root logger is created lazily; components get child
 * loggers carrying a `component` field.
 *
 * Environment:
 * - `CAPWALK_LOG_LEVEL`: trace, debug, info, warn, error, silent (default: "info")
 * - `CAPWALK_ENV`: "production" or "test" disables the pretty transport
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Structured logging fields.
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

let rootLogger: Logger | null = null;

function usePrettyTransport(): boolean {
  const env = process.env.CAPWALK_ENV ?? process.env.NODE_ENV;
  return env !== 'production' && env !== 'test' && process.env.VITEST === undefined;
}

/**
 * Level from `CAPWALK_LOG_LEVEL`; unknown names fall back to info.
 */
function levelFromEnv(): string {
  const level = process.env.CAPWALK_LOG_LEVEL;
  if (level === undefined) {
    return 'info';
  }
  if (level !== 'silent' && !Object.hasOwn(pino.levels.values, level)) {
    return 'info';
  }
  return level;
}

/**
 * Build the logger options from the environment.
 */
export function loggerOptionsFromEnv(): LoggerOptions {
  const options: LoggerOptions = {
    name: 'capwalk',
    level: levelFromEnv(),
  };

  if (usePrettyTransport()) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }
  return options;
}

/**
 * Get the root logger, creating it on first use.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino(loggerOptionsFromEnv());
  }
  return rootLogger;
}

/**
 * Create a component logger with preset fields.
 *
 * @example
 * const log = createLogger('binding-registry');
 * log.debug({ descriptors: 3 }, 'registry built');
 */
export function createLogger(component: string, fields: LogFields = {}): Logger {
  return getRootLogger().child({ component, ...fields });
}
