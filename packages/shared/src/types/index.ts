/**
 * Shared types for barsim
 */

export * from './market.js';
export * from './order.js';
