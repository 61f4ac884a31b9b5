/**
 * Stats Engine
 *
 * Scalar performance metrics from a PnL table and its ledger.
 * Pure: reads both, mutates neither. Metrics that do not apply to a run
 * (no closed trades, zero capital base, flat returns...) come back as null.
 */

import type { PositionSnapshot } from '../position/position.js';
import type { BacktestStats, PnlTable, StatValue } from '../backtest/types.js';

export interface StatsOptions {
  /** `Infinity` means an unconstrained run: PnL is based at 0 */
  startingEquity: number;
  periodsPerYear: number;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample standard deviation (n - 1)
 */
export function sampleStdDev(values: readonly number[]): number | null {
  const avg = mean(values);
  if (avg === null || values.length < 2) {
    return null;
  }
  const variance = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) / (values.length - 1);
  return Math.sqrt(variance);
}

function pct(numerator: number, denominator: number): StatValue {
  return denominator > 0 ? (numerator / denominator) * 100 : null;
}

/**
 * Largest peak-to-trough fall of an equity series, and that fall as a
 * percentage of the peak it fell from
 */
export function maxDrawdown(equity: readonly number[]): { value: number; pct: StatValue } {
  const first = equity[0];
  if (first === undefined) {
    return { value: 0, pct: null };
  }

  let peak = first;
  let maxDd = 0;
  let peakAtMax = first;

  for (const value of equity) {
    peak = Math.max(peak, value);
    const drawdown = peak - value;
    if (drawdown > maxDd) {
      maxDd = drawdown;
      peakAtMax = peak;
    }
  }

  return { value: maxDd, pct: pct(maxDd, peakAtMax) };
}

/**
 * Annualized Sharpe ratio of period-over-period equity returns.
 * Null with fewer than two returns, a zero previous equity or flat returns.
 */
export function sharpeRatio(equity: readonly number[], periodsPerYear: number): StatValue {
  const returns: number[] = [];
  for (let i = 1; i < equity.length; i++) {
    const previous = equity[i - 1] ?? 0;
    const current = equity[i] ?? 0;
    if (previous === 0) {
      return null;
    }
    returns.push(current / previous - 1);
  }

  const avg = mean(returns);
  const std = sampleStdDev(returns);
  if (avg === null || std === null || std === 0) {
    return null;
  }
  return (avg / std) * Math.sqrt(periodsPerYear);
}

function consecutive(pnls: readonly number[], predicate: (pnl: number) => boolean): number {
  let current = 0;
  let max = 0;
  for (const pnl of pnls) {
    if (predicate(pnl)) {
      current++;
      max = Math.max(max, current);
    } else {
      current = 0;
    }
  }
  return max;
}

/**
 * Compute the stats summary of a finished run
 */
export function calculateStats(
  table: PnlTable,
  positions: readonly PositionSnapshot[],
  options: StatsOptions
): BacktestStats {
  const constrained = Number.isFinite(options.startingEquity);
  const capitalBase = constrained ? options.startingEquity : 0;

  const first = table[0];
  const last = table[table.length - 1];
  const equity = table.map((row) => row.equity);

  // Closed trades in exit order
  const closed = positions
    .filter((p) => p.status === 'CLOSED')
    .slice()
    .sort((a, b) => (a.exitTime ?? 0) - (b.exitTime ?? 0) || a.id - b.id);
  const pnls = closed.map((p) => p.realizedPnl ?? 0);
  const wins = pnls.filter((p) => p > 0);
  const losses = pnls.filter((p) => p < 0);

  const winRate = closed.length > 0 ? wins.length / closed.length : null;
  const avgWin = mean(wins);
  const avgLoss = mean(losses);
  const grossProfit = wins.reduce((sum, p) => sum + p, 0);
  const grossLoss = Math.abs(losses.reduce((sum, p) => sum + p, 0));

  const durations = closed.map((p) => (p.exitTime ?? p.entryTime) - p.entryTime);

  const exposureTime = table.filter((row) => row.exposure > 0).length;
  const drawdown = maxDrawdown(equity);

  const buyAndHoldChange = first && last ? last.close / first.close - 1 : null;

  return {
    start: first?.timestamp ?? null,
    end: last?.timestamp ?? null,
    duration: first && last ? last.timestamp - first.timestamp : null,
    intervals: table.length,
    startingEquity: constrained ? options.startingEquity : null,
    finalEquity: last?.equity ?? null,
    peakEquity: equity.length > 0 ? Math.max(...equity) : null,
    totalPnl: last?.totalPnl ?? null,
    totalPnlPct: last ? pct(last.totalPnl, capitalBase) : null,
    realizedPnl: last?.realizedPnl ?? null,
    realizedPnlPct: last ? pct(last.realizedPnl, capitalBase) : null,
    unrealizedPnl: last?.unrealizedPnl ?? null,
    buyAndHoldPnl: buyAndHoldChange !== null && capitalBase > 0 ? buyAndHoldChange * capitalBase : null,
    buyAndHoldPnlPct: buyAndHoldChange !== null ? buyAndHoldChange * 100 : null,
    exposureTime,
    exposureTimePct: pct(exposureTime, table.length),
    maxDrawdown: table.length > 0 ? drawdown.value : null,
    maxDrawdownPct: drawdown.pct,
    sharpeRatio: sharpeRatio(equity, options.periodsPerYear),
    tradeCount: closed.length,
    openPositionCount: positions.length - closed.length,
    winRate,
    avgWin,
    avgLoss,
    bestTrade: pnls.length > 0 ? Math.max(...pnls) : null,
    worstTrade: pnls.length > 0 ? Math.min(...pnls) : null,
    profitFactor: losses.length > 0 ? grossProfit / grossLoss : null,
    expectancy: winRate !== null ? winRate * (avgWin ?? 0) + (1 - winRate) * (avgLoss ?? 0) : null,
    maxConsecutiveWins: consecutive(pnls, (p) => p > 0),
    maxConsecutiveLosses: consecutive(pnls, (p) => p < 0),
    maxPositionDuration: durations.length > 0 ? Math.max(...durations) : null,
    avgPositionDuration: mean(durations),
  };
}

/**
 * Flat metric-name → value mapping of a stats summary
 */
export function statsToRecord(stats: BacktestStats): Record<string, StatValue> {
  return { ...stats };
}
