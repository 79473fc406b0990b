export * from './change-detector.service.js';
export * from './fingerprint.js';
export * from './ingestion.module.js';
export * from './ingestion.service.js';
export * from './ingestion.types.js';
