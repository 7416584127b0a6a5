/**
 * Line-oriented directive parser.
 *
 * Each non-blank line holds exactly two whitespace-separated tokens: a
 * directive keyword and its value, or a host record in either order:
 *
 * ```text
 * bind 0.0.0.0:53
 * proxy 1.2.3.4:53
 * timeout 30
 * import ./extra.conf
 * example.com 10.0.0.1
 * 10.0.0.2 *.example.com
 * ```
 *
 * Malformed lines never stop the scan; they are recorded as `Invalid`.
 *
 * @module config/parser
 */

import { HostMatcher } from '../filter/host-matcher.js';
import { HostTable } from '../filter/host-table.js';
import type { Invalid, InvalidKind, ParseResult, SocketAddress } from '../types/config.js';
import { parseTimeoutValue } from '../validation/validator.js';
import { isIpAddress, parseSocketAddress } from './address.js';
import { createInvalid } from './diagnostics.js';

/**
 * Classification of a single line.
 */
export type Directive =
  | { type: 'skip' }
  | { type: 'invalid'; invalid: Invalid }
  | { type: 'bind'; address: SocketAddress }
  | { type: 'proxy'; address: SocketAddress }
  | { type: 'timeout'; seconds: bigint }
  | { type: 'import'; path: string }
  | { type: 'host'; matcher: HostMatcher; address: string };

export type HostRecordResult =
  | { ok: true; matcher: HostMatcher; address: string }
  | { ok: false; kind: InvalidKind };

/**
 * Callbacks used by `parseDocument`.
 */
export interface DocumentHooks {
  /** Parse the file named by an `import` directive and return its result */
  resolveImport: (path: string, line: number) => Promise<ParseResult>;
  /** Called for each malformed line of this document, not of its imports */
  onInvalid?: (invalid: Invalid) => void;
}

const ASCII_WHITESPACE = /[ \t\n\f\r]+/;

export function createParseResult(): ParseResult {
  return {
    bind: [],
    proxy: [],
    hosts: new HostTable(),
    timeout: undefined,
    invalid: [],
  };
}

/**
 * Combine two results, `b` after `a`. Neither input is modified.
 *
 * `timeout` is taken from `b` when `b` set one, so the last directive in
 * document order wins across the whole import tree.
 */
export function mergeParseResults(a: ParseResult, b: ParseResult): ParseResult {
  return {
    bind: [...a.bind, ...b.bind],
    proxy: [...a.proxy, ...b.proxy],
    hosts: new HostTable().merge(a.hosts).merge(b.hosts),
    timeout: b.timeout !== undefined ? b.timeout : a.timeout,
    invalid: [...a.invalid, ...b.invalid],
  };
}

/**
 * Drop everything from the first `#` on. Quoting is not recognised.
 */
export function stripComment(line: string): string {
  const hash = line.indexOf('#');
  return hash === -1 ? line : line.slice(0, hash);
}

export function splitTokens(line: string): string[] {
  return line.split(ASCII_WHITESPACE).filter((token) => token.length > 0);
}

/**
 * Parse a host record written as `pattern address` or `address pattern`.
 *
 * When the first token is an address it wins, so `10.0.0.1 10.0.0.2` maps the
 * literal domain `10.0.0.2` to `10.0.0.1`.
 */
export function parseHostRecord(first: string, second: string): HostRecordResult {
  let pattern: string;
  let address: string;

  if (isIpAddress(first)) {
    address = first;
    pattern = second;
  } else if (isIpAddress(second)) {
    address = second;
    pattern = first;
  } else {
    return { ok: false, kind: 'IpAddr' };
  }

  const compiled = HostMatcher.compile(pattern);
  if (!compiled.ok) {
    return { ok: false, kind: compiled.kind };
  }
  return { ok: true, matcher: compiled.matcher, address };
}

/**
 * Classify one raw line.
 *
 * @param line - Line text without its terminator
 * @param lineNumber - 1-based position of the line in its file
 */
export function parseLine(line: string, lineNumber: number): Directive {
  const source = stripComment(line);
  if (source.trim() === '') {
    return { type: 'skip' };
  }

  const invalid = (kind: InvalidKind): Directive => ({
    type: 'invalid',
    invalid: createInvalid(lineNumber, source, kind),
  });

  const tokens = splitTokens(source);
  if (tokens.length !== 2) {
    return invalid('Other');
  }
  const [key, value] = tokens;

  switch (key) {
    case 'bind': {
      const address = parseSocketAddress(value);
      return address ? { type: 'bind', address } : invalid('SocketAddr');
    }
    case 'proxy': {
      const address = parseSocketAddress(value);
      return address ? { type: 'proxy', address } : invalid('SocketAddr');
    }
    case 'timeout': {
      const seconds = parseTimeoutValue(value);
      return seconds !== undefined ? { type: 'timeout', seconds } : invalid('Timeout');
    }
    case 'import':
      return { type: 'import', path: value };
    default: {
      const record = parseHostRecord(key, value);
      return record.ok
        ? { type: 'host', matcher: record.matcher, address: record.address }
        : invalid(record.kind);
    }
  }
}

/**
 * Parse the full text of one file.
 *
 * Imports are resolved when their line is reached and merged before the
 * next line is read, which gives the same order as inlining the imported
 * file at that point.
 */
export async function parseDocument(text: string, hooks: DocumentHooks): Promise<ParseResult> {
  let result = createParseResult();
  const lines = text.split(/\r?\n/);

  for (let index = 0; index < lines.length; index++) {
    const lineNumber = index + 1;
    const directive = parseLine(lines[index], lineNumber);

    switch (directive.type) {
      case 'skip':
        break;
      case 'invalid':
        result.invalid.push(directive.invalid);
        hooks.onInvalid?.(directive.invalid);
        break;
      case 'bind':
        result.bind.push(directive.address);
        break;
      case 'proxy':
        result.proxy.push(directive.address);
        break;
      case 'timeout':
        result.timeout = directive.seconds;
        break;
      case 'import':
        result = mergeParseResults(result, await hooks.resolveImport(directive.path, lineNumber));
        break;
      case 'host':
        result.hosts.push(directive.matcher, directive.address);
        break;
    }
  }

  return result;
}
