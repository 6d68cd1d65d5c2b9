export * from './document-pipeline.js';
export * from './dispatcher.js';
export * from './batch.js';
