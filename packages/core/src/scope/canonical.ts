/**
 * Scope canonicalization
 *
 * Scope names compare case-insensitively, with leading and trailing white
 * space ignored and any interior run of white space folded to one space.
 * Every token entering a ScopeSet passes through canonicalizeScope().
 */

import { InvalidScopeTokenError } from './errors.js';

const WHITESPACE_RUN = /\s+/g;

/**
 * Reduce a raw scope token to its canonical, comparable form.
 *
 * @example
 * canonicalizeScope('  East   Wing ') // 'east wing'
 *
 * @throws InvalidScopeTokenError if nothing is left after trimming
 */
export function canonicalizeScope(raw: string): string {
  const canonical = tryCanonicalizeScope(raw);
  if (canonical === null) {
    throw new InvalidScopeTokenError(raw);
  }
  return canonical;
}

/**
 * Like canonicalizeScope(), but returns null instead of throwing.
 */
export function tryCanonicalizeScope(raw: string): string | null {
  const canonical = raw.trim().replace(WHITESPACE_RUN, ' ').toLowerCase();
  return canonical.length > 0 ? canonical : null;
}

/**
 * Whether a value is already a non-empty canonical scope.
 */
export function isCanonicalScope(value: string): boolean {
  return tryCanonicalizeScope(value) === value;
}

/**
 * Total order over canonical scopes (UTF-16 code unit order).
 */
export function compareScopes(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
