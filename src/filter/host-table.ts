/**
 * Ordered host override table.
 *
 * @module filter/host-table
 */

import type { HostMatcher } from './host-matcher.js';

/**
 * One override: a compiled pattern and the address it resolves to.
 */
export type HostRecord = readonly [matcher: HostMatcher, address: string];

/**
 * Ordered list of host overrides with first-match lookup.
 *
 * Entries are never reordered or deduplicated, so a broad pattern listed
 * before a narrower one shadows it.
 *
 * @example
 * ```typescript
 * const table = new HostTable();
 * table.push(HostMatcher.create('api.example.com'), '10.0.0.1');
 * table.push(HostMatcher.create('*.example.com'), '10.0.0.2');
 *
 * table.lookup('api.example.com'); // '10.0.0.1'
 * table.lookup('www.example.com'); // '10.0.0.2'
 * table.lookup('example.org');     // undefined
 * ```
 */
export class HostTable implements Iterable<HostRecord> {
  private readonly records: HostRecord[] = [];

  /**
   * Append an override after all existing ones.
   */
  push(matcher: HostMatcher, address: string): void {
    this.records.push([matcher, address]);
  }

  /**
   * Find the address of the first entry whose pattern accepts the domain.
   *
   * Lookup is a linear scan: patterns may be regular expressions, which
   * cannot be indexed.
   */
  lookup(domain: string): string | undefined {
    for (const [matcher, address] of this.records) {
      if (matcher.isMatch(domain)) {
        return address;
      }
    }
    return undefined;
  }

  /**
   * Append every entry of another table, keeping both orders.
   */
  merge(other: HostTable): this {
    for (const record of other.records) {
      this.records.push(record);
    }
    return this;
  }

  get size(): number {
    return this.records.length;
  }

  entries(): IterableIterator<HostRecord> {
    return this.records.values();
  }

  [Symbol.iterator](): IterableIterator<HostRecord> {
    return this.entries();
  }
}
