/**
 * IP and socket address parsing for directive values.
 *
 * @module config/address
 */

import net from 'node:net';
import type { SocketAddress } from '../types/config.js';
import { parsePortValue } from '../validation/validator.js';

/**
 * Returns the family of a textual IP address, or undefined if it is not one.
 *
 * Accepts dotted-quad IPv4 and IPv6 in any of its textual forms. Zone
 * identifiers (`fe80::1%eth0`) are rejected.
 *
 * @example
 * ```typescript
 * ipFamily('10.0.0.1');     // 4
 * ipFamily('::1');          // 6
 * ipFamily('example.com');  // undefined
 * ```
 */
export function ipFamily(text: string): 4 | 6 | undefined {
  if (net.isIPv4(text)) return 4;
  if (!text.includes('%') && net.isIPv6(text)) return 6;
  return undefined;
}

/**
 * Test if a token is a valid IP address.
 */
export function isIpAddress(text: string): boolean {
  return ipFamily(text) !== undefined;
}

/**
 * Parse an `ip:port` or `[ipv6]:port` socket address.
 *
 * @returns The parsed address, or undefined if malformed
 */
export function parseSocketAddress(text: string): SocketAddress | undefined {
  const colon = text.lastIndexOf(':');
  if (colon === -1) return undefined;

  const host = text.slice(0, colon);
  const port = parsePortValue(text.slice(colon + 1));
  if (port === undefined) return undefined;

  if (host.startsWith('[') && host.endsWith(']')) {
    const ip = host.slice(1, -1);
    return ipFamily(ip) === 6 ? { ip, port, family: 6 } : undefined;
  }

  return ipFamily(host) === 4 ? { ip: host, port, family: 4 } : undefined;
}

/**
 * Format a socket address the way it is written in a configuration file.
 */
export function formatSocketAddress(address: SocketAddress): string {
  return address.family === 6
    ? `[${address.ip}]:${address.port}`
    : `${address.ip}:${address.port}`;
}
