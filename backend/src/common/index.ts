export * from './abort.js';
export * from './api-exception.filter.js';
export * from './errors.js';
export * from './retry.js';
export * from './concurrency/index.js';
