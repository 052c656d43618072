// Scope sets, algebra and wire codec
export * from './scope/index.js';

// Configuration
export * from './config/index.js';

// Logging
export { Logger, logger } from './utils/logger.js';
export type { LogDestination, LogLevel, LoggerOptions } from './utils/logger.js';
