/**
 * @switchyard/core - Core package for Switchyard
 *
 * Re-exports config, shared types, logging and utilities.
 */

// Types & Schemas
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Configuration
export * from './config/index.js';

// Logging
export { createLogger, type Logger } from './logger.js';

// Utilities
export { sleep, retry, errorMessage, randomHex, modelKey, isPlainObject } from './utils/index.js';
