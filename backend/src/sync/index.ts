export * from './sync.module.js';
export * from './sync.service.js';
export * from './sync.types.js';
export * from './webhook-signature.js';
