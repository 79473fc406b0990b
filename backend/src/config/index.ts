export * from './config.module.js';
export * from './configuration.js';
export * from './env.validation.js';
