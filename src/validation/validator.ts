/**
 * Validation utilities.
 * Wraps Zod schemas with user-friendly error formatting.
 */

import { ZodError, type ZodTypeAny, type output } from 'zod';
import { ConfigurationError } from '../errors.js';
import {
  LoggingConfigSchema,
  PortSchema,
  TimeoutSchema,
  type ValidatedLoggingConfig,
} from './schemas.js';

/**
 * Formats Zod validation errors into a human-readable message.
 * @param error - The Zod validation error
 * @returns Formatted error message
 */
function formatZodError(error: ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join('.');
    const prefix = path ? `${path}: ` : '';
    return `  - ${prefix}${issue.message}`;
  });

  return `Validation failed:\n${issues.join('\n')}`;
}

/**
 * Validates data against a Zod schema.
 * @throws ConfigurationError if validation fails
 */
function validate<T extends ZodTypeAny>(schema: T, data: unknown, path?: string): output<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    const message = formatZodError(result.error);
    throw new ConfigurationError(message, path, result.error.issues);
  }

  return result.data;
}

/**
 * Validates a logging configuration and fills in defaults.
 *
 * @param config - The logging configuration to validate
 * @param path - Optional path to the configuration source
 * @returns The validated logging configuration
 * @throws ConfigurationError if validation fails
 *
 * @example
 * ```typescript
 * const logging = validateLoggingConfig({ level: 'debug' });
 * logging.pretty; // true
 * ```
 */
export function validateLoggingConfig(
  config: unknown,
  path?: string
): ValidatedLoggingConfig {
  return validate(LoggingConfigSchema, config, path);
}

/**
 * Parses a `timeout` directive value.
 *
 * @returns Seconds, or undefined if the token is not an unsigned 64-bit integer
 */
export function parseTimeoutValue(token: string): bigint | undefined {
  const result = TimeoutSchema.safeParse(token);
  return result.success ? result.data : undefined;
}

/**
 * Parses the port half of a socket address.
 *
 * @returns The port, or undefined if out of range or not decimal
 */
export function parsePortValue(token: string): number | undefined {
  const result = PortSchema.safeParse(token);
  return result.success ? result.data : undefined;
}
