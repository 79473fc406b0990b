export * from './in-memory-knowledge.repository.js';
export * from './keyword-index.js';
export * from './knowledge.module.js';
export * from './knowledge.repository.js';
export * from './knowledge.types.js';
export * from './postgres-knowledge.repository.js';
export * from './vector-math.js';
