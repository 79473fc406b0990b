export * from './chat.errors.js';
export * from './chat.module.js';
export * from './chat.service.js';
export * from './chat.types.js';
