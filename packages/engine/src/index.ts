/**
 * @barsim/engine - Bar-by-bar backtest engine
 */

export * from './errors.js';
export * from './position/index.js';
export * from './order/index.js';
export * from './backtest/index.js';
export * from './accounting/index.js';
export * from './metrics/index.js';
export * from './indicators/index.js';
export * from './strategies/index.js';
export * from './config/index.js';
