/**
 * Unified Types for Backtest Engine
 *
 * This file contains all types shared across the backtest system.
 */

import type { Bar, Order } from '@barsim/shared';
import type { PositionSnapshot } from '../position/position.js';
import type { PositionsBook } from '../position/positions-book.js';


// =============================================================================
// STRATEGY
// =============================================================================

/**
 * A trading strategy: called once per interval with every bar up to and
 * including the current one, and the open positions before this interval's
 * fills. Returns the orders to fill at the next bar.
 */
export interface Strategy {
  onCandle(history: readonly Bar[], book: PositionsBook): Order[];
}

export type StrategyFactory = () => Strategy;

// =============================================================================
// BACKTEST CONFIGURATION
// =============================================================================

export interface BacktestConfig {
  /** Symbol stamped on every position */
  symbol: string;
  /** Starting cash. `Infinity` runs without capital constraints */
  startingEquity: number;
  /** Annualization factor for the Sharpe ratio */
  periodsPerYear: number;
}

export const DEFAULT_BACKTEST_CONFIG: BacktestConfig = {
  symbol: 'UNKNOWN',
  startingEquity: 10_000,
  periodsPerYear: 252,
};

// =============================================================================
// FILLS
// =============================================================================

export type FillKind = 'market' | 'limit';

export interface Fill {
  action: Order['action'];
  kind: FillKind;
  positionId: number;
  /** Signed quantity of the position the fill opened or closed */
  quantity: number;
  price: number;
  timestamp: number;
  /** Set on EXIT fills */
  realizedPnl?: number;
  /** Cash balance right after the fill */
  cashBalance: number;
}

export interface IntervalFillReport {
  fills: Fill[];
  /** Limit orders whose price the fill bar never traded at */
  dropped: Order[];
}

// =============================================================================
// PNL TABLE
// =============================================================================

export interface PnlRow {
  timestamp: number;
  close: number;
  /** Mark-to-market notional per position id (0 when not open) */
  positionValues: Record<number, number>;
  /** PnL contribution per position id (frozen at the realized value after exit) */
  positionPnl: Record<number, number>;
  /** Σ positionValues */
  openNotional: number;
  /** Σ |positionValues| */
  exposure: number;
  realizedPnl: number;
  unrealizedPnl: number;
  totalPnl: number;
  /** Change in totalPnl from the previous row */
  periodPnl: number;
  equity: number;
  cashBalance: number;
}

export type PnlTable = readonly PnlRow[];

// =============================================================================
// STATS
// =============================================================================

/** `null` marks a metric that does not apply to this run */
export type StatValue = number | null;

export interface BacktestStats {
  start: StatValue;
  end: StatValue;
  /** Seconds */
  duration: StatValue;
  intervals: StatValue;
  startingEquity: StatValue;
  finalEquity: StatValue;
  peakEquity: StatValue;
  totalPnl: StatValue;
  totalPnlPct: StatValue;
  realizedPnl: StatValue;
  realizedPnlPct: StatValue;
  unrealizedPnl: StatValue;
  buyAndHoldPnl: StatValue;
  buyAndHoldPnlPct: StatValue;
  exposureTime: StatValue;
  exposureTimePct: StatValue;
  maxDrawdown: StatValue;
  maxDrawdownPct: StatValue;
  sharpeRatio: StatValue;
  tradeCount: StatValue;
  openPositionCount: StatValue;
  winRate: StatValue;
  avgWin: StatValue;
  avgLoss: StatValue;
  bestTrade: StatValue;
  worstTrade: StatValue;
  profitFactor: StatValue;
  expectancy: StatValue;
  maxConsecutiveWins: StatValue;
  maxConsecutiveLosses: StatValue;
  maxPositionDuration: StatValue;
  avgPositionDuration: StatValue;
}

// =============================================================================
// BACKTEST RESULT
// =============================================================================

export interface BacktestResult {
  config: BacktestConfig;
  dateRange: {
    from: Date;
    to: Date;
    barCount: number;
  };
  positions: PositionSnapshot[];
  fills: Fill[];
  droppedOrders: number;
  pnl: PnlTable;
  stats: BacktestStats;
  executedAt: Date;
  executionTimeMs: number;
}
