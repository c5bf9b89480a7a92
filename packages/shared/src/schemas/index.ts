export * from './config.js';
export * from './inventory.js';
