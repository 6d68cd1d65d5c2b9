/**
 * Report Author Extractor - Data Models
 *
 * Barrel export for all model interfaces.
 */

export * from './author.js';
export * from './document.js';
export * from './endpoint.js';
