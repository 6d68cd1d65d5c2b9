/**
 * Result storage
 *
 * @module services/storage
 */

export * from './csv.js';
export * from './result-store.js';
