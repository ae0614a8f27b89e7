/**
 * Token Cache
 * Request-scoped mapping from detected values to stable replacement tokens
 *
 * One instance per request; never stored in module scope. Within an instance
 * the same (entityType, value) pair always yields the same token and distinct
 * values never share one.
 */

import { hashValue } from "../crypto/value-crypto.js";

/**
 * Formats a token, e.g. <PERSON_1> or <EMAIL_ADDRESS_1a2b3c4d>
 */
export function formatToken(entityType: string, suffix: string | number): string {
  return `<${entityType}_${suffix}>`;
}

export class TokenCache {
  private readonly tokens = new Map<string, string>();
  private readonly hashTokens = new Map<string, Promise<string>>();
  private readonly counters = new Map<string, number>();

  /**
   * Counter token for a value; the first value of each type gets 1
   * The value is used exactly as detected (case-sensitive, untrimmed)
   */
  tokenFor(entityType: string, value: string): string {
    const key = JSON.stringify([entityType, value]);
    const existing = this.tokens.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const next = (this.counters.get(entityType) ?? 0) + 1;
    this.counters.set(entityType, next);
    const token = formatToken(entityType, next);
    this.tokens.set(key, token);
    return token;
  }

  /**
   * Digest token for a value (first 8 hex chars of its SHA-256)
   */
  hashTokenFor(entityType: string, value: string): Promise<string> {
    const key = JSON.stringify([entityType, value]);
    let token = this.hashTokens.get(key);
    if (token === undefined) {
      token = hashValue(value).then((digest) => formatToken(entityType, digest));
      this.hashTokens.set(key, token);
    }
    return token;
  }

  /**
   * Number of counter tokens issued per entity type
   */
  summary(): Record<string, number> {
    return Object.fromEntries(this.counters);
  }

  get size(): number {
    return this.tokens.size;
  }
}
