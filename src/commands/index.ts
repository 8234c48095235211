export * from './attributes.js';
export * from './cache.js';
export * from './config.js';
export * from './db.js';
export * from './search.js';
