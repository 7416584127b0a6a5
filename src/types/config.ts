/**
 * Hosts override configuration types.
 */

import type { HostTable } from '../filter/host-table.js';
import type { Logger } from '../logging/logger.js';

/**
 * Category of a line that could not be parsed.
 */
export type InvalidKind = 'SocketAddr' | 'IpAddr' | 'Regex' | 'Timeout' | 'Other';

/**
 * A line that was skipped because its content is malformed.
 */
export interface Invalid {
  /** 1-based line number within the file that contained it */
  line: number;
  /** The line with its comment stripped */
  source: string;
  /** Error category */
  kind: InvalidKind;
}

/**
 * An IP endpoint from a `bind` or `proxy` directive.
 */
export interface SocketAddress {
  ip: string;
  port: number;
  family: 4 | 6;
}

/**
 * Aggregate result of parsing a file and everything it imports.
 */
export interface ParseResult {
  /** Listen endpoints, in document order */
  bind: SocketAddress[];
  /** Upstream endpoints, in document order */
  proxy: SocketAddress[];
  /** Host overrides, first match wins */
  hosts: HostTable;
  /** Timeout in seconds from the last `timeout` directive seen (unsigned 64-bit) */
  timeout?: bigint;
  /** Malformed lines, in document order */
  invalid: Invalid[];
}

export interface LoggingConfig {
  /** Log level: trace, debug, info, warn, error, fatal, silent */
  level: string;
  /** Whether to use pretty printing for console output */
  pretty?: boolean;
}

/**
 * Options accepted by `Config.open` and `loadHostsConfig`.
 */
export interface ConfigOptions {
  /** Logger for parse progress and invalid lines */
  logger?: Logger;
  /** Reject imports that lead back to a file being parsed (default: true) */
  detectCycles?: boolean;
}

/**
 * Default logging configuration.
 */
export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: 'info',
  pretty: true,
};
