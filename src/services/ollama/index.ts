export * from './client.js';
export * from './discovery.js';
export * from './prompts.js';
