/**
 * Zod validation schemas for directive values and loader configuration.
 */

import { z } from 'zod';

/**
 * Schema for a port token, e.g. the `53` of `0.0.0.0:53`.
 */
export const PortSchema = z
  .string()
  .regex(/^\d+$/, 'Port must be a decimal number')
  .transform(Number)
  .pipe(z.number().int().min(0).max(65535, 'Port cannot exceed 65535'));

/**
 * Largest value a `timeout` directive may hold (unsigned 64-bit).
 */
export const MAX_TIMEOUT_SECONDS = 2n ** 64n - 1n;

/**
 * Schema for the value of a `timeout` directive, in seconds.
 * A leading `+` is accepted, as are leading zeros.
 */
export const TimeoutSchema = z
  .string()
  .regex(/^\+?\d+$/, 'Timeout must be a non-negative integer')
  .transform((value) => BigInt(value.replace(/^\+/, '')))
  .pipe(z.bigint().nonnegative().max(MAX_TIMEOUT_SECONDS, 'Timeout is too large'));

/**
 * Log levels understood by pino.
 */
export const LogLevelSchema = z.enum([
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
]);

/**
 * Schema for logging configuration.
 */
export const LoggingConfigSchema = z.object({
  /** Log level */
  level: LogLevelSchema.default('info'),

  /** Whether to use pretty printing for console output */
  pretty: z.boolean().optional().default(true),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ValidatedLoggingConfig = z.infer<typeof LoggingConfigSchema>;
