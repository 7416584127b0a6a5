/**
 * Logging infrastructure using pino.
 */

import pino, { type Logger as PinoLogger } from 'pino';
import { DEFAULT_LOGGING_CONFIG, type LoggingConfig } from '../types/config.js';
import { validateLoggingConfig } from '../validation/validator.js';

export type Logger = PinoLogger;

export interface LoggerOptions {
  name?: string;
  level?: string;
  pretty?: boolean;
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { name = 'hosts-override', level = 'info', pretty = true } = options;

  const transport = pretty
    ? pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      })
    : undefined;

  return pino(
    {
      name,
      level,
    },
    transport
  );
}

/**
 * Create a logger from logging configuration.
 *
 * @throws ConfigurationError if the level is not a pino level
 */
export function createLoggerFromConfig(config: Partial<LoggingConfig> = {}): Logger {
  const { level, pretty } = validateLoggingConfig({ ...DEFAULT_LOGGING_CONFIG, ...config });
  return createLogger({ level, pretty });
}

/**
 * Create a child logger with additional context.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
