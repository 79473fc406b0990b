export * from './keyed-mutex.js';
export * from './semaphore.js';
