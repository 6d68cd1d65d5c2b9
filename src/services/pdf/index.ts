export * from './renderer.js';
export * from './text.js';
