import { OAuthError } from '../errors/oauth-error.js';

/**
 * Ordered set of distinct scope tokens.
 * Equality and inclusion are set based; order only affects toString().
 */
export class ScopeSet implements Iterable<string> {
  private readonly tokens: readonly string[];

  private constructor(tokens: readonly string[]) {
    this.tokens = tokens;
  }

  static empty(): ScopeSet {
    return new ScopeSet([]);
  }

  /**
   * Build from a list, dropping blanks and duplicates
   */
  static from(tokens: Iterable<string>): ScopeSet {
    const seen = new Set<string>();
    for (const token of tokens) {
      const trimmed = token.trim();
      if (trimmed.length > 0) {
        seen.add(trimmed);
      }
    }
    return new ScopeSet([...seen]);
  }

  /**
   * Parse a space-delimited scope string
   */
  static parse(text: string | undefined): ScopeSet {
    if (!text) {
      return ScopeSet.empty();
    }
    return ScopeSet.from(text.split(/\s+/));
  }

  get size(): number {
    return this.tokens.length;
  }

  isEmpty(): boolean {
    return this.tokens.length === 0;
  }

  contains(token: string): boolean {
    return this.tokens.includes(token);
  }

  /**
   * True if every token of other is present in this set
   */
  includes(other: ScopeSet): boolean {
    return other.tokens.every((token) => this.contains(token));
  }

  /**
   * Tokens of other that this set lacks
   */
  missing(other: ScopeSet): string[] {
    return other.tokens.filter((token) => !this.contains(token));
  }

  equals(other: ScopeSet): boolean {
    return this.size === other.size && this.includes(other);
  }

  union(other: ScopeSet): ScopeSet {
    return ScopeSet.from([...this.tokens, ...other.tokens]);
  }

  toArray(): string[] {
    return [...this.tokens];
  }

  toString(): string {
    return this.tokens.join(' ');
  }

  toJSON(): string {
    return this.toString();
  }

  [Symbol.iterator](): Iterator<string> {
    return this.tokens[Symbol.iterator]();
  }
}

/**
 * Service for OAuth scope validation
 */
export class ScopeService {
  /**
   * Require requested ⊆ allowed
   *
   * @throws OAuthError invalid_scope naming the offending tokens
   */
  validate(requested: ScopeSet, allowed: ScopeSet, state?: string): ScopeSet {
    const invalid = allowed.missing(requested);

    if (invalid.length > 0) {
      throw OAuthError.invalidScope(
        `Invalid or unauthorized scopes: ${invalid.join(', ')}`,
        state
      );
    }

    return requested;
  }
}

// Singleton instance
export const scopeService = new ScopeService();
