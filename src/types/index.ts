export * from './attributes.js';
export * from './config.js';
