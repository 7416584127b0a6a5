/**
 * Domain pattern matching for host overrides.
 *
 * A pattern is classified by the characters it contains, never by trying to
 * compile it first.
 *
 * @module filter/host-matcher
 */

import { PatternCompileError } from '../errors.js';

/**
 * Which of the three matching strategies a pattern compiled to.
 */
export type HostMatcherKind = 'literal' | 'wildcard' | 'pattern';

type MatchMode =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'wildcard'; readonly regex: RegExp }
  | { readonly kind: 'pattern'; readonly regex: RegExp };

/**
 * Outcome of compiling a pattern.
 */
export type CompileResult =
  | { ok: true; matcher: HostMatcher }
  | { ok: false; kind: 'Regex'; message: string };

const LITERAL_CHARS = /^[a-z0-9\-.]*$/;
const WILDCARD_CHARS = /^[a-z0-9\-.*]*$/;

/**
 * Compiled domain pattern.
 *
 * Supports three kinds of patterns:
 * - **Literal**: `example.com` matches only `example.com`, case-sensitively
 * - **Wildcard**: `*.example.com` matches `api.example.com`; each `*` stands
 *   for one or more characters other than `.`, and the whole domain must match
 * - **Pattern**: anything else is a regular expression, tested without implicit
 *   anchors, so `example` matches `www.example.com`
 *
 * @example
 * ```typescript
 * const result = HostMatcher.compile('*.example.com');
 * if (result.ok) {
 *   result.matcher.isMatch('api.example.com');  // true
 *   result.matcher.isMatch('a.b.example.com');  // false
 * }
 * ```
 */
export class HostMatcher {
  private constructor(private readonly mode: MatchMode) {}

  /**
   * Compile a pattern, reporting failure as a value.
   */
  static compile(pattern: string): CompileResult {
    if (LITERAL_CHARS.test(pattern)) {
      return { ok: true, matcher: new HostMatcher({ kind: 'literal', text: pattern }) };
    }

    if (WILDCARD_CHARS.test(pattern)) {
      const source = `^${pattern.replace(/\./g, '\\.').replace(/\*/g, '[^.]+')}$`;
      return HostMatcher.compileRegex('wildcard', source);
    }

    return HostMatcher.compileRegex('pattern', pattern);
  }

  /**
   * Compile a pattern, throwing on failure.
   *
   * @throws PatternCompileError if the pattern is not a valid regular expression
   */
  static create(pattern: string): HostMatcher {
    const result = HostMatcher.compile(pattern);
    if (!result.ok) {
      throw new PatternCompileError(pattern, result.message);
    }
    return result.matcher;
  }

  private static compileRegex(kind: 'wildcard' | 'pattern', source: string): CompileResult {
    try {
      return { ok: true, matcher: new HostMatcher({ kind, regex: new RegExp(source) }) };
    } catch (error) {
      return {
        ok: false,
        kind: 'Regex',
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }

  get kind(): HostMatcherKind {
    return this.mode.kind;
  }

  /**
   * Test if a domain matches this pattern.
   */
  isMatch(domain: string): boolean {
    switch (this.mode.kind) {
      case 'literal':
        return this.mode.text === domain;
      case 'wildcard':
      case 'pattern':
        return this.mode.regex.test(domain);
    }
  }

  /**
   * The literal text, or the compiled expression's source for the other kinds.
   */
  asString(): string {
    return this.mode.kind === 'literal' ? this.mode.text : this.mode.regex.source;
  }

  toString(): string {
    return this.asString();
  }
}
