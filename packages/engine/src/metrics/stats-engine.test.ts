/**
 * Stats Engine Tests
 */

import { describe, it, expect } from 'vitest';
import type { Bar } from '@barsim/shared';
import { calculateStats, maxDrawdown, mean, sampleStdDev, sharpeRatio, statsToRecord } from './stats-engine.js';
import { buildPnlTable } from '../accounting/pnl-engine.js';
import { Position, type PositionSnapshot } from '../position/position.js';

function createBar(timestamp: number, close: number): Bar {
  return { timestamp, open: close, high: close, low: close, close, volume: 1 };
}

function createPosition(
  id: number,
  quantity: number,
  entryTime: number,
  entryPrice: number,
  exit?: { time: number; price: number }
): PositionSnapshot {
  const position = new Position({ id, symbol: 'BTCUSD', quantity, entryTime, entryPrice });
  if (exit) {
    position.close(exit.time, exit.price);
  }
  return position.toSnapshot();
}

describe('helpers', () => {
  it('mean should be null for no values', () => {
    expect(mean([])).toBeNull();
    expect(mean([1, 2, 3])).toBe(2);
  });

  it('sampleStdDev should use n - 1', () => {
    expect(sampleStdDev([1])).toBeNull();
    expect(sampleStdDev([2, 4])).toBeCloseTo(Math.SQRT2, 12);
  });
});

describe('maxDrawdown', () => {
  it('should measure the largest fall from a running peak', () => {
    expect(maxDrawdown([100, 120, 90, 130])).toEqual({ value: 30, pct: 25 });
  });

  it('should be zero for a rising curve', () => {
    expect(maxDrawdown([100, 110, 120])).toEqual({ value: 0, pct: 0 });
  });

  it('should have no percentage from a zero peak', () => {
    expect(maxDrawdown([0, -10, 5])).toEqual({ value: 10, pct: null });
  });
});

describe('sharpeRatio', () => {
  it('should be null with fewer than two returns', () => {
    expect(sharpeRatio([100], 252)).toBeNull();
    expect(sharpeRatio([100, 110], 252)).toBeNull();
  });

  it('should be null for flat equity', () => {
    expect(sharpeRatio([100, 100, 100], 252)).toBeNull();
  });

  it('should be null when a previous equity is zero', () => {
    expect(sharpeRatio([0, 10, 20], 252)).toBeNull();
  });

  it('should annualize mean over sample stdev', () => {
    // returns 0.1 and 0
    const expected = (0.05 / Math.sqrt(0.005)) * Math.sqrt(252);
    expect(sharpeRatio([100, 110, 110], 252)).toBeCloseTo(expected, 9);
  });
});

describe('calculateStats', () => {
  const bars = [createBar(1, 100), createBar(2, 110), createBar(3, 105), createBar(4, 120)];
  const positions = [createPosition(1, 10, 2, 110, { time: 3, price: 105 }), createPosition(2, 5, 3, 105)];
  const table = buildPnlTable(bars, positions, 1000);
  const stats = calculateStats(table, positions, { startingEquity: 1000, periodsPerYear: 252 });

  it('should summarize the run window', () => {
    expect(stats.start).toBe(1);
    expect(stats.end).toBe(4);
    expect(stats.duration).toBe(3);
    expect(stats.intervals).toBe(4);
  });

  it('should report equity and PnL', () => {
    expect(stats.startingEquity).toBe(1000);
    expect(stats.finalEquity).toBe(1025);
    expect(stats.peakEquity).toBe(1025);
    expect(stats.totalPnl).toBe(25);
    expect(stats.totalPnlPct).toBe(2.5);
    expect(stats.realizedPnl).toBe(-50);
    expect(stats.realizedPnlPct).toBe(-5);
    expect(stats.unrealizedPnl).toBe(75);
  });

  it('should compare against buy and hold', () => {
    expect(stats.buyAndHoldPnl).toBeCloseTo(200, 9);
    expect(stats.buyAndHoldPnlPct).toBeCloseTo(20, 9);
  });

  it('should report exposure and drawdown', () => {
    expect(stats.exposureTime).toBe(3);
    expect(stats.exposureTimePct).toBe(75);
    expect(stats.maxDrawdown).toBe(50);
    expect(stats.maxDrawdownPct).toBe(5);
    expect(stats.sharpeRatio).not.toBeNull();
  });

  it('should count closed trades only', () => {
    expect(stats.tradeCount).toBe(1);
    expect(stats.openPositionCount).toBe(1);
    expect(stats.winRate).toBe(0);
    expect(stats.avgWin).toBeNull();
    expect(stats.avgLoss).toBe(-50);
    expect(stats.bestTrade).toBe(-50);
    expect(stats.worstTrade).toBe(-50);
    expect(stats.profitFactor).toBe(0);
    expect(stats.expectancy).toBe(-50);
    expect(stats.maxConsecutiveWins).toBe(0);
    expect(stats.maxConsecutiveLosses).toBe(1);
    expect(stats.maxPositionDuration).toBe(1);
    expect(stats.avgPositionDuration).toBe(1);
  });

  it('should return null trade metrics without closed trades', () => {
    const open = [createPosition(1, 1, 1, 100)];
    const result = calculateStats(buildPnlTable(bars, open, 1000), open, { startingEquity: 1000, periodsPerYear: 252 });

    expect(result.tradeCount).toBe(0);
    expect(result.winRate).toBeNull();
    expect(result.profitFactor).toBeNull();
    expect(result.expectancy).toBeNull();
    expect(result.maxPositionDuration).toBeNull();
  });

  it('should leave profit factor null without losing trades', () => {
    const winners = [createPosition(1, 1, 1, 100, { time: 2, price: 110 })];
    const result = calculateStats(buildPnlTable(bars, winners, 1000), winners, {
      startingEquity: 1000,
      periodsPerYear: 252,
    });

    expect(result.winRate).toBe(1);
    expect(result.profitFactor).toBeNull();
    expect(result.expectancy).toBe(10);
  });

  it('should drop percentages for unconstrained runs', () => {
    const unconstrained = calculateStats(buildPnlTable(bars, positions, 0), positions, {
      startingEquity: Infinity,
      periodsPerYear: 252,
    });

    expect(unconstrained.startingEquity).toBeNull();
    expect(unconstrained.finalEquity).toBe(25);
    expect(unconstrained.totalPnlPct).toBeNull();
    expect(unconstrained.buyAndHoldPnl).toBeNull();
    expect(unconstrained.buyAndHoldPnlPct).toBeCloseTo(20, 9);
  });

  it('statsToRecord should flatten to name-value pairs', () => {
    const record = statsToRecord(stats);
    expect(record.totalPnl).toBe(25);
    expect(record.avgWin).toBeNull();
  });
});
