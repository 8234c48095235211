export * from './manager.js';
export * from './schema.js';
