/**
 * Scope Module - canonical scope sets
 *
 * Exports scope canonicalization, the ScopeSet value type, the scope list
 * wire codec and the inbound scope matcher.
 */

export { canonicalizeScope, tryCanonicalizeScope, isCanonicalScope, compareScopes } from './canonical.js';
export {
  SCOPE_DELIMITER,
  SCOPE_ESCAPE,
  escapeScope,
  encodeScopes,
  splitScopeList,
} from './codec.js';
export {
  ScopeError,
  InvalidScopeTokenError,
  MalformedEscapeSequenceError,
  isScopeError,
} from './errors.js';
export type { ScopeErrorCode } from './errors.js';
export { ScopeSet, decodeScopes } from './scope-set.js';
export type { ScopeSetInput } from './scope-set.js';
export { ScopeMatcher } from './scope-matcher.js';
export type {
  ScopeMatcherConfig,
  ScopeMatchReason,
  ScopeMatchResult,
  ScopeMatcherStats,
} from './types.js';
