/**
 * Custom error classes for the hosts override loader.
 * Everything here belongs to the fatal track: content problems never throw,
 * they are collected as `Invalid` records instead.
 */

import type { InvalidKind } from './types/config.js';

/**
 * Base error class for all loader errors.
 */
export class HostsConfigError extends Error {
  /**
   * Creates a new HostsConfigError.
   * @param message - Human-readable error message
   * @param code - Machine-readable error code
   */
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'HostsConfigError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Converts the error to a JSON-serializable object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Error thrown when a configuration file cannot be opened, created, read or written.
 */
export class ConfigurationError extends HostsConfigError {
  /**
   * Creates a new ConfigurationError.
   * @param message - Description of the failure
   * @param path - Path of the file involved
   * @param cause - Underlying I/O error
   * @param code - Overrides the default `CONFIG_ERROR` code
   */
  constructor(
    message: string,
    public readonly path?: string,
    public readonly cause?: unknown,
    code = 'CONFIG_ERROR'
  ) {
    super(message, code);
    this.name = 'ConfigurationError';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      path: this.path,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Error thrown when a file imports itself, directly or through other files.
 */
export class ImportCycleError extends HostsConfigError {
  /**
   * Creates a new ImportCycleError.
   * @param chain - Resolved paths from the root file down to the repeated one
   */
  constructor(public readonly chain: readonly string[]) {
    super(`Import cycle detected: ${chain.join(' -> ')}`, 'IMPORT_CYCLE');
    this.name = 'ImportCycleError';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      chain: this.chain,
    };
  }
}

/**
 * Error thrown when a domain pattern cannot be compiled.
 */
export class PatternCompileError extends HostsConfigError {
  constructor(
    public readonly pattern: string,
    reason: string
  ) {
    super(`Cannot compile pattern '${pattern}': ${reason}`, 'PATTERN_COMPILE_ERROR');
    this.name = 'PatternCompileError';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      pattern: this.pattern,
    };
  }
}

/**
 * Error thrown by `Config.add` when the record would not parse back.
 */
export class InvalidRecordError extends HostsConfigError {
  /**
   * Creates a new InvalidRecordError.
   * @param kind - Diagnostic kind the written line would have produced
   * @param pattern - Domain pattern passed to `add`
   * @param address - Address passed to `add`
   */
  constructor(
    public readonly kind: InvalidKind,
    public readonly pattern: string,
    public readonly address: string
  ) {
    super(`Refusing to write invalid host record '${pattern} ${address}' (${kind})`, 'INVALID_RECORD');
    this.name = 'InvalidRecordError';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      kind: this.kind,
      pattern: this.pattern,
      address: this.address,
    };
  }
}
