/**
 * Backtest Module
 *
 * Bars in, strategy decisions filled bar by bar, PnL table and stats out.
 *
 * @example
 * ```typescript
 * import { loadBarsFromCSV, runBacktest, printBacktestResult } from './backtest/index.js';
 * import { SmaCrossoverStrategy } from './strategies/index.js';
 *
 * const bars = loadBarsFromCSV('data/BTCUSD_1h.csv');
 * const result = runBacktest(bars, new SmaCrossoverStrategy(), { symbol: 'BTCUSD' });
 * printBacktestResult(result);
 * ```
 */

export * from './types.js';
export * from './engine/index.js';
export * from './data/index.js';
export * from './reporters/index.js';
