/**
 * Processing Module
 *
 * Exports normalization, deduplication and ranking functions.
 */

export * from './normalize.js';
export * from './dedup.js';
export * from './ranking.js';
