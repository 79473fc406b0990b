export * from './chunker.js';
export * from './chunking.module.js';
export * from './chunking.service.js';
