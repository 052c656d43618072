/**
 * ScopeSet - a set of canonical scope names
 *
 * Scopes are held sorted by compareScopes() with no duplicates, so every
 * set operation is a single two-pointer merge over both operands.
 */

import { compareScopes, tryCanonicalizeScope } from './canonical.js';
import { encodeScopes, splitScopeList, SCOPE_DELIMITER } from './codec.js';
import { InvalidScopeTokenError } from './errors.js';

export type ScopeSetInput = string | Iterable<string>;

export class ScopeSet implements Iterable<string> {
  private scopes: string[];

  /**
   * @param input - raw scope names, or a comma separated (escaped) scope list
   * @throws InvalidScopeTokenError if any name is empty after canonicalization
   * @throws MalformedEscapeSequenceError if a scope list ends in a lone escape
   */
  constructor(input?: ScopeSetInput) {
    if (input === undefined) {
      this.scopes = [];
    } else if (typeof input === 'string') {
      this.scopes = canonicalizeAll(splitScopeList(input));
    } else {
      this.scopes = canonicalizeAll(input);
    }
  }

  static empty(): ScopeSet {
    return new ScopeSet();
  }

  /**
   * Decode a comma separated scope list.
   */
  static fromString(text: string): ScopeSet {
    return new ScopeSet(text);
  }

  static from(scopes: Iterable<string>): ScopeSet {
    return new ScopeSet(scopes);
  }

  // Wraps storage that is already canonical, sorted and unique.
  private static fromSorted(sorted: string[]): ScopeSet {
    const set = new ScopeSet();
    set.scopes = sorted;
    return set;
  }

  // ===========================================================================
  // Container
  // ===========================================================================

  get size(): number {
    return this.scopes.length;
  }

  isEmpty(): boolean {
    return this.scopes.length === 0;
  }

  /**
   * Membership test on the canonical form of `scope`.
   * A name that is empty after canonicalization is never a member.
   */
  contains(scope: string): boolean {
    const canonical = tryCanonicalizeScope(scope);
    if (canonical === null) {
      return false;
    }

    let lo = 0;
    let hi = this.scopes.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const cmp = compareScopes(this.scopes[mid], canonical);
      if (cmp === 0) {
        return true;
      }
      if (cmp < 0) {
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return false;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.scopes[Symbol.iterator]();
  }

  values(): IterableIterator<string> {
    return this.scopes.values();
  }

  toArray(): string[] {
    return [...this.scopes];
  }

  clone(): ScopeSet {
    return ScopeSet.fromSorted([...this.scopes]);
  }

  equals(other: ScopeSet): boolean {
    if (this.scopes.length !== other.scopes.length) {
      return false;
    }
    for (let i = 0; i < this.scopes.length; i++) {
      if (this.scopes[i] !== other.scopes[i]) {
        return false;
      }
    }
    return true;
  }

  // ===========================================================================
  // Set Algebra
  // ===========================================================================

  /**
   * Whether at least one scope appears in both sets.
   */
  intersects(other: ScopeSet): boolean {
    const a = this.scopes;
    const b = other.scopes;
    let i = 0;
    let j = 0;
    while (i < a.length && j < b.length) {
      const cmp = compareScopes(a[i], b[j]);
      if (cmp === 0) {
        return true;
      }
      if (cmp < 0) {
        i++;
      } else {
        j++;
      }
    }
    return false;
  }

  /**
   * Number of scopes that appear in both sets.
   */
  intersectionCount(other: ScopeSet): number {
    const a = this.scopes;
    const b = other.scopes;
    let i = 0;
    let j = 0;
    let count = 0;
    while (i < a.length && j < b.length) {
      const cmp = compareScopes(a[i], b[j]);
      if (cmp === 0) {
        count++;
        i++;
        j++;
      } else if (cmp < 0) {
        i++;
      } else {
        j++;
      }
    }
    return count;
  }

  intersection(other: ScopeSet): ScopeSet {
    const a = this.scopes;
    const b = other.scopes;
    const result: string[] = [];
    let i = 0;
    let j = 0;
    while (i < a.length && j < b.length) {
      const cmp = compareScopes(a[i], b[j]);
      if (cmp === 0) {
        result.push(a[i]);
        i++;
        j++;
      } else if (cmp < 0) {
        i++;
      } else {
        j++;
      }
    }
    return ScopeSet.fromSorted(result);
  }

  /**
   * Scopes in this set that are not in `other`.
   */
  difference(other: ScopeSet): ScopeSet {
    return ScopeSet.fromSorted(this.partition(other).kept);
  }

  /**
   * Remove every scope that also appears in `other` from this set.
   *
   * @returns the scopes that were removed
   */
  differenceUpdate(other: ScopeSet): ScopeSet {
    const { kept, removed } = this.partition(other);
    this.scopes = kept;
    return ScopeSet.fromSorted(removed);
  }

  /**
   * Add every scope of `other` to this set.
   */
  update(other: ScopeSet): void {
    this.scopes = mergeSorted(this.scopes, other.scopes);
  }

  union(other: ScopeSet): ScopeSet {
    return ScopeSet.fromSorted(mergeSorted(this.scopes, other.scopes));
  }

  // ===========================================================================
  // Formatting
  // ===========================================================================

  /**
   * Scope list in wire format, ready to be placed in a discovery message.
   */
  toEscapedString(): string {
    return encodeScopes(this.scopes);
  }

  /**
   * Unescaped, human readable list. Not safe to decode.
   */
  toString(): string {
    return this.scopes.join(SCOPE_DELIMITER);
  }

  toJSON(): string[] {
    return this.toArray();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Walk both sets in lock-step, splitting this set into the scopes absent
   * from `other` and the ones present in it. Neither operand is modified.
   */
  private partition(other: ScopeSet): { kept: string[]; removed: string[] } {
    const a = this.scopes;
    const b = other.scopes;
    const kept: string[] = [];
    const removed: string[] = [];
    let i = 0;
    let j = 0;
    while (i < a.length && j < b.length) {
      const cmp = compareScopes(a[i], b[j]);
      if (cmp === 0) {
        removed.push(a[i]);
        i++;
        j++;
      } else if (cmp < 0) {
        kept.push(a[i]);
        i++;
      } else {
        j++;
      }
    }
    for (; i < a.length; i++) {
      kept.push(a[i]);
    }
    return { kept, removed };
  }
}

/**
 * Decode a comma separated scope list into a ScopeSet.
 *
 * @throws InvalidScopeTokenError on an empty entry, e.g. `"a,,b"`
 * @throws MalformedEscapeSequenceError on a trailing lone escape
 */
export function decodeScopes(text: string): ScopeSet {
  return ScopeSet.fromString(text);
}

function canonicalizeAll(raw: Iterable<string>): string[] {
  const canonical: string[] = [];
  let index = 0;
  for (const scope of raw) {
    const value = tryCanonicalizeScope(scope);
    if (value === null) {
      throw new InvalidScopeTokenError(scope, index);
    }
    canonical.push(value);
    index++;
  }

  canonical.sort(compareScopes);

  const unique: string[] = [];
  for (const value of canonical) {
    if (unique.length === 0 || unique[unique.length - 1] !== value) {
      unique.push(value);
    }
  }
  return unique;
}

function mergeSorted(a: readonly string[], b: readonly string[]): string[] {
  const merged: string[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const cmp = compareScopes(a[i], b[j]);
    if (cmp === 0) {
      merged.push(a[i]);
      i++;
      j++;
    } else if (cmp < 0) {
      merged.push(a[i]);
      i++;
    } else {
      merged.push(b[j]);
      j++;
    }
  }
  for (; i < a.length; i++) {
    merged.push(a[i]);
  }
  for (; j < b.length; j++) {
    merged.push(b[j]);
  }
  return merged;
}
