/**
 * Scope Types
 *
 * Types for matching inbound scope lists against the locally configured set.
 */

import type { Logger } from '../utils/logger.js';
import type { ScopeError } from './errors.js';
import type { ScopeSet } from './scope-set.js';

// =============================================================================
// Scope Matcher Configuration
// =============================================================================

export interface ScopeMatcherConfig {
  /** Maximum number of decoded inbound scope lists kept (default: 256, 0 disables) */
  maxCacheSize?: number;
  /** Logger used to report rejected scope lists */
  logger?: Logger;
}

// =============================================================================
// Scope Match Result
// =============================================================================

export type ScopeMatchReason = 'matched' | 'no-common-scope' | 'malformed';

export interface ScopeMatchResult {
  /** Whether the message should be accepted */
  accepted: boolean;
  /** Why it was accepted or rejected */
  reason: ScopeMatchReason;
  /** Scopes shared with the local set (empty unless accepted) */
  matched: ScopeSet;
  /** Decoding failure, only when reason is 'malformed' */
  error?: ScopeError;
}

// =============================================================================
// Scope Matcher Statistics
// =============================================================================

export interface ScopeMatcherStats {
  /** Total match operations */
  matchOperations: number;
  /** Messages accepted */
  accepted: number;
  /** Messages rejected for lack of a common scope */
  rejected: number;
  /** Messages rejected because the scope list could not be decoded */
  malformed: number;
  /** Cache hit count */
  cacheHits: number;
  /** Cache miss count */
  cacheMisses: number;
  /** Current cache size */
  cacheSize: number;
}
