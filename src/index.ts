/**
 * hosts-override - domain override file parser for proxies and resolvers
 *
 * Entry point and main exports.
 */

// Re-export types
export * from './types/config.js';

// Re-export main components
export { Config, loadHostsConfig } from './config/loader.js';
export {
  createParseResult,
  mergeParseResults,
  parseDocument,
  parseHostRecord,
  parseLine,
  splitTokens,
  stripComment,
  type Directive,
  type DocumentHooks,
  type HostRecordResult,
} from './config/parser.js';
export {
  INVALID_KIND_TEXT,
  createInvalid,
  describeInvalidKind,
  formatInvalid,
} from './config/diagnostics.js';
export {
  formatSocketAddress,
  ipFamily,
  isIpAddress,
  parseSocketAddress,
} from './config/address.js';
export {
  HostMatcher,
  type CompileResult,
  type HostMatcherKind,
} from './filter/host-matcher.js';
export { HostTable, type HostRecord } from './filter/host-table.js';
export {
  createLogger,
  createLoggerFromConfig,
  createChildLogger,
  type Logger,
  type LoggerOptions,
} from './logging/logger.js';

// Re-export errors
export * from './errors.js';

// Re-export validation
export {
  validateLoggingConfig,
  parsePortValue,
  parseTimeoutValue,
} from './validation/validator.js';
export {
  LoggingConfigSchema,
  LogLevelSchema,
  MAX_TIMEOUT_SECONDS,
  PortSchema,
  TimeoutSchema,
  type LogLevel,
  type ValidatedLoggingConfig,
} from './validation/schemas.js';
