/**
 * Configuration Module
 */

export type { ScopeConfig } from './types.js';
export { DEFAULT_CONFIG, DEFAULT_SCOPE, VALID_LOG_LEVELS } from './types.js';
export { ConfigLoadError, ConfigValidationError } from './errors.js';
export { ConfigManager } from './manager.js';
export type { ConfigManagerOptions, ConfigOverrides } from './manager.js';
