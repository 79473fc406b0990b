export * from './fusion.js';
export * from './retrieval.module.js';
export * from './retrieval.service.js';
export * from './retrieval.types.js';
