/**
 * @barsim/shared - Shared types, schemas, and utilities
 *
 * This package contains code shared between the engine and the scripts around it.
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './logger.js';
export * from './utils/load-env.js';
