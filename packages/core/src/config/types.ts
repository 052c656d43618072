/**
 * Scope Configuration Types
 *
 * Type definitions for the YAML configuration an agent starts with.
 */

import type { ScopeSet } from '../scope/scope-set.js';
import type { LogLevel } from '../utils/logger.js';

export interface ScopeConfig {
  /** Scopes this agent belongs to, decoded once at load time */
  scopes: ScopeSet;
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
  matcher: {
    maxCacheSize: number;
  };
}

/** Scope every agent belongs to when none is configured */
export const DEFAULT_SCOPE = 'default';

export const DEFAULT_CONFIG = {
  scopes: DEFAULT_SCOPE,
  logging: { level: 'info', pretty: false },
  matcher: { maxCacheSize: 256 },
} as const;

export const VALID_LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
