export * from './embedding-gateway.service.js';
export * from './embedding.module.js';
