/**
 * @opsdeck/shared - Shared Types, Schemas, Constants & Errors
 * Central package for definitions used across opsdeck workspaces
 */

// Types
export * from './types/index.js';

// Schemas
export * from './schemas/index.js';

// Constants
export * from './constants/index.js';

// Errors
export * from './errors/index.js';

// Utilities
export * from './utils/shell.js';

// Inventory
export * from './inventory/static.js';
