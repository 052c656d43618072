/**
 * ScopeMatcher - accept or reject inbound discovery messages by scope
 *
 * Decodes the scope list carried by an inbound message and tests it against
 * the locally configured scopes. Decoded lists are cached by their raw text,
 * since peers tend to repeat the same scope list on every message.
 */

import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { isScopeError } from './errors.js';
import { ScopeSet, type ScopeSetInput } from './scope-set.js';
import type { ScopeMatcherConfig, ScopeMatcherStats, ScopeMatchResult } from './types.js';

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_MAX_CACHE_SIZE = 256;

// =============================================================================
// ScopeMatcher Class
// =============================================================================

export class ScopeMatcher {
  private readonly local: ScopeSet;
  private readonly maxCacheSize: number;
  private readonly logger: Logger;
  private readonly cache: Map<string, ScopeSet>;
  private stats: ScopeMatcherStats;

  /**
   * @param localScopes - the scopes this agent is configured with
   */
  constructor(localScopes: ScopeSetInput | ScopeSet, config: ScopeMatcherConfig = {}) {
    this.local = localScopes instanceof ScopeSet ? localScopes.clone() : new ScopeSet(localScopes);
    this.maxCacheSize = config.maxCacheSize ?? DEFAULT_MAX_CACHE_SIZE;
    this.logger = (config.logger ?? defaultLogger).child({ component: 'scope-matcher' });
    this.cache = new Map();
    this.stats = {
      matchOperations: 0,
      accepted: 0,
      rejected: 0,
      malformed: 0,
      cacheHits: 0,
      cacheMisses: 0,
      cacheSize: 0,
    };
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  get localScopes(): ScopeSet {
    return this.local.clone();
  }

  /**
   * Decide whether a message carrying `scopeList` shares a scope with us.
   * A scope list that cannot be decoded rejects the message.
   *
   * @param scopeList - the scope field of the inbound message, in wire format
   */
  match(scopeList: string): ScopeMatchResult {
    this.stats.matchOperations++;

    let remote: ScopeSet;
    try {
      remote = this.decode(scopeList);
    } catch (error) {
      if (!isScopeError(error)) {
        throw error;
      }
      this.stats.malformed++;
      this.logger.warn('Rejected message with malformed scope list', {
        scopeList,
        code: error.code,
        error: error.message,
      });
      return { accepted: false, reason: 'malformed', matched: ScopeSet.empty(), error };
    }

    if (!this.local.intersects(remote)) {
      this.stats.rejected++;
      this.logger.debug('No common scope', {
        local: this.local.toString(),
        remote: remote.toString(),
      });
      return { accepted: false, reason: 'no-common-scope', matched: ScopeSet.empty() };
    }

    this.stats.accepted++;
    return { accepted: true, reason: 'matched', matched: this.local.intersection(remote) };
  }

  matches(scopeList: string): boolean {
    return this.match(scopeList).accepted;
  }

  /**
   * Clear the decoded scope list cache.
   */
  clearCache(): void {
    this.cache.clear();
    this.stats.cacheSize = 0;
  }

  getStats(): ScopeMatcherStats {
    return {
      ...this.stats,
      cacheSize: this.cache.size,
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private decode(scopeList: string): ScopeSet {
    if (this.maxCacheSize <= 0) {
      return ScopeSet.fromString(scopeList);
    }

    const cached = this.cache.get(scopeList);
    if (cached) {
      this.stats.cacheHits++;
      return cached;
    }
    this.stats.cacheMisses++;

    const decoded = ScopeSet.fromString(scopeList);
    if (this.cache.size >= this.maxCacheSize) {
      this.evictOldestEntry();
    }
    this.cache.set(scopeList, decoded);
    return decoded;
  }

  /**
   * Evict the entry that was inserted first.
   */
  private evictOldestEntry(): void {
    const oldest = this.cache.keys().next();
    if (!oldest.done) {
      this.cache.delete(oldest.value);
    }
  }
}
