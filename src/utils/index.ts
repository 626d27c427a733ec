/**
 * Utility Exports
 *
 * Re-exports all utility modules for convenient imports.
 */

export * from './logger.js';
export * from './errorLog.js';
export * from './timeout.js';
export * from './fileWriter.js';
export * from './concurrency.js';
