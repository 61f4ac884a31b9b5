/**
 * Reporter Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLogger, type Bar } from '@barsim/shared';
import { fmt, fmtCurrency, fmtDuration, fmtPct } from './console-reporter.js';
import { exportToJSON, generateFilename, toJSON } from './json-reporter.js';
import { runBacktest } from '../engine/backtester.js';
import { enter } from '../../order/order.js';
import type { BacktestResult } from '../types.js';

const bars: Bar[] = [
  { timestamp: 1704067200, open: 100, high: 101, low: 99, close: 100, volume: 1 },
  { timestamp: 1704070800, open: 103, high: 106, low: 102, close: 105, volume: 1 },
  { timestamp: 1704074400, open: 108, high: 111, low: 107, close: 110, volume: 1 },
];

function createResult(startingEquity = 10_000): BacktestResult {
  const result = runBacktest(
    bars,
    { onCandle: (history: readonly Bar[]) => (history.length === 1 ? [enter({ quantity: 1 })] : []) },
    { symbol: 'BTCUSD', startingEquity, logger: createLogger({ service: 'test', silent: true }) }
  );
  return { ...result, executedAt: new Date('2024-01-02T03:04:05.678Z') };
}

describe('console formatting', () => {
  it('should print n/a for metrics that do not apply', () => {
    expect(fmt(null)).toBe('n/a');
    expect(fmtCurrency(null)).toBe('n/a');
    expect(fmtPct(null)).toBe('n/a');
    expect(fmtDuration(null)).toBe('n/a');
  });

  it('should format numbers', () => {
    expect(fmt(1.2345)).toBe('1.23');
    expect(fmtCurrency(-5)).toBe('$-5.00');
    expect(fmtPct(12.345)).toBe('12.3%');
    expect(fmtDuration(90_061)).toBe('1d 1h 1m');
  });
});

describe('toJSON', () => {
  it('should include stats and positions by default', () => {
    const json = toJSON(createResult());

    expect(json.metadata).toEqual({
      symbol: 'BTCUSD',
      executedAt: '2024-01-02T03:04:05.678Z',
      executionTimeMs: expect.any(Number),
    });
    expect(json.dateRange).toEqual({
      from: '2024-01-01T00:00:00.000Z',
      to: '2024-01-01T02:00:00.000Z',
      barCount: 3,
    });
    expect(json.positions).toHaveLength(1);
    expect(json.pnl).toBeUndefined();
    expect(json.fills).toBeUndefined();
  });

  it('should honor include options', () => {
    const json = toJSON(createResult(), { includePositions: false, includeFills: true, includePnl: true });

    expect(json.positions).toBeUndefined();
    expect(json.positionCount).toBe(1);
    expect(json.fills).toHaveLength(1);
    expect(json.pnl).toHaveLength(3);
  });

  it('should write unconstrained equity as null', () => {
    const json = toJSON(createResult(Infinity));

    expect(json.config).toEqual({ symbol: 'BTCUSD', startingEquity: null, periodsPerYear: 252 });
  });
});

describe('exportToJSON', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) {
      fs.rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('should create the directory and write the report', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'barsim-'));
    const target = path.join(dir, 'nested', 'result.json');

    const written = exportToJSON(createResult(), target);
    const parsed: unknown = JSON.parse(fs.readFileSync(written, 'utf-8'));

    expect(written).toBe(target);
    expect(parsed).toMatchObject({ stats: { totalPnl: 7, avgWin: null } });
  });
});

describe('generateFilename', () => {
  it('should include symbol and execution time', () => {
    expect(generateFilename(createResult())).toBe('backtest_BTCUSD_2024-01-02_030405.json');
  });
});
