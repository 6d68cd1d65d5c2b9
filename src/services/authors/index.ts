/**
 * Author normalisation and consolidation
 *
 * @module services/authors
 */

export * from './rules.js';
export * from './credentials.js';
export * from './name-cleaner.js';
export * from './record-cleaner.js';
export * from './coerce.js';
export * from './text-patterns.js';
export * from './consolidator.js';
