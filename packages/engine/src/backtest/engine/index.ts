/**
 * Backtest Engine - Core Components
 */

export { Backtester, runBacktest, type BacktesterOptions } from './backtester.js';
export {
  FillEngine,
  resolveFillPrice,
  resolveQuantity,
  type FillEngineOptions,
} from './fill-engine.js';
