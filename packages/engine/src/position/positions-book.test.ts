/**
 * Positions Book Tests
 */

import { describe, it, expect } from 'vitest';
import type { Bar } from '@barsim/shared';
import { PositionsBook } from './positions-book.js';
import { Position, type PositionSnapshot } from './position.js';

function snapshot(id: number, quantity: number, entryPrice: number): PositionSnapshot {
  return new Position({ id, symbol: 'BTCUSD', quantity, entryTime: 1000, entryPrice }).toSnapshot();
}

const bar: Bar = { timestamp: 2000, open: 104, high: 112, low: 103, close: 110, volume: 5 };

describe('PositionsBook', () => {
  it('should be flat with no positions', () => {
    const book = new PositionsBook([]);

    expect(book.isFlat).toBe(true);
    expect(book.isLong).toBe(false);
    expect(book.isShort).toBe(false);
    expect(book.size).toBe(0);
    expect(book.quantity).toBe(0);
    expect(book.value).toBe(0);
    expect(book.close()).toEqual([]);
  });

  it('should ignore closed positions', () => {
    const closed = new Position({ id: 1, symbol: 'BTCUSD', quantity: 1, entryTime: 1000, entryPrice: 100 });
    closed.close(1500, 101);

    const book = new PositionsBook([closed.toSnapshot(), snapshot(2, 1, 100)]);

    expect(book.size).toBe(1);
    expect(book.get(1)).toBeUndefined();
    expect(book.get(2)?.quantity).toBe(1);
  });

  it('should aggregate long and short positions', () => {
    const book = new PositionsBook([snapshot(1, 3, 100), snapshot(2, -1, 105)], bar);

    expect(book.isLong).toBe(true);
    expect(book.isShort).toBe(true);
    expect(book.quantity).toBe(2);
    expect(book.value).toBe(220);
    // 3 * (110 - 100) + -1 * (110 - 105)
    expect(book.unrealizedPnl).toBe(25);
  });

  it('should value at 0 without a current bar', () => {
    const book = new PositionsBook([snapshot(1, 3, 100)]);
    expect(book.value).toBe(0);
    expect(book.unrealizedPnl).toBe(0);
  });

  it('close should emit one market exit per open position', () => {
    const book = new PositionsBook([snapshot(1, 3, 100), snapshot(4, -1, 105)], bar);

    expect(book.close()).toEqual([
      { action: 'EXIT', positionId: 1 },
      { action: 'EXIT', positionId: 4 },
    ]);
  });

  it('closeWhere should only exit matching positions', () => {
    const book = new PositionsBook([snapshot(1, 3, 100), snapshot(2, -1, 105)], bar);

    expect(book.closeWhere((p) => p.quantity < 0)).toEqual([{ action: 'EXIT', positionId: 2 }]);
  });

  it('should not expose a mutable position list', () => {
    const book = new PositionsBook([snapshot(1, 3, 100)], bar);
    expect(Object.isFrozen(book.openPositions)).toBe(true);
  });
});
