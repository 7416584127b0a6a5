/**
 * Per-line diagnostics for malformed configuration content.
 *
 * @module config/diagnostics
 */

import type { Invalid, InvalidKind } from '../types/config.js';

/**
 * Fixed description of each diagnostic kind.
 */
export const INVALID_KIND_TEXT: Readonly<Record<InvalidKind, string>> = {
  SocketAddr: 'Cannot parse socket address',
  IpAddr: 'Cannot parse ip address',
  Regex: 'Cannot parse regular expression',
  Timeout: 'Cannot parse timeout',
  Other: 'Invalid line',
};

export function describeInvalidKind(kind: InvalidKind): string {
  return INVALID_KIND_TEXT[kind];
}

export function createInvalid(line: number, source: string, kind: InvalidKind): Invalid {
  return { line, source, kind };
}

/**
 * Render a diagnostic for display, e.g. `line 4: Invalid line: bind`.
 */
export function formatInvalid(invalid: Invalid): string {
  return `line ${invalid.line}: ${describeInvalidKind(invalid.kind)}: ${invalid.source.trim()}`;
}
