/**
 * Fill Engine Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Bar } from '@barsim/shared';
import { FillEngine, resolveFillPrice, resolveQuantity } from './fill-engine.js';
import { PositionLedger } from '../../position/position-ledger.js';
import { enter, exit } from '../../order/order.js';
import { InsufficientCapitalError, MalformedOrderError, UnknownPositionError } from '../../errors.js';

function createBar(timestamp: number, open: number, high: number, low: number, close: number): Bar {
  return { timestamp, open, high, low, close, volume: 1 };
}

const bar = createBar(2000, 100, 110, 90, 105);

describe('resolveFillPrice', () => {
  it('should fill market orders at the open', () => {
    expect(resolveFillPrice(enter({ quantity: 1 }), bar)).toBe(100);
  });

  it('should fill limit orders inside the range at the limit price', () => {
    expect(resolveFillPrice(enter({ quantity: 1 }, 95), bar)).toBe(95);
    expect(resolveFillPrice(exit(1, 110), bar)).toBe(110);
    expect(resolveFillPrice(exit(1, 90), bar)).toBe(90);
  });

  it('should return null for limits the bar never traded', () => {
    expect(resolveFillPrice(enter({ quantity: 1 }, 89.99), bar)).toBeNull();
    expect(resolveFillPrice(exit(1, 111), bar)).toBeNull();
  });
});

describe('resolveQuantity', () => {
  it('should convert value to units at the fill price', () => {
    expect(resolveQuantity(enter({ value: -1000 }), 50)).toBe(-20);
    expect(resolveQuantity(enter({ quantity: 3 }), 50)).toBe(3);
  });
});

describe('FillEngine', () => {
  let ledger: PositionLedger;
  let engine: FillEngine;

  beforeEach(() => {
    ledger = new PositionLedger();
    engine = new FillEngine(ledger, { symbol: 'BTCUSD', startingEquity: 1000 });
  });

  it('should open a position at the open and debit cash', () => {
    const report = engine.processInterval([enter({ quantity: 5 })], bar);

    expect(report.fills).toHaveLength(1);
    expect(report.fills[0]).toMatchObject({ action: 'ENTER', kind: 'market', positionId: 1, quantity: 5, price: 100 });
    expect(engine.cashBalance).toBe(500);
    expect(ledger.openSnapshots()[0]?.symbol).toBe('BTCUSD');
  });

  it('should size value orders at the fill price', () => {
    engine.processInterval([enter({ value: 500 }, 95)], bar);

    const position = ledger.openSnapshots()[0];
    expect(position?.entryPrice).toBe(95);
    expect(position?.quantity).toBeCloseTo(500 / 95, 12);
  });

  it('should credit cash when shorting', () => {
    engine.processInterval([enter({ quantity: -5 })], bar);

    expect(engine.cashBalance).toBe(1500);
    expect(engine.equityAt(100)).toBe(1000);
    expect(engine.grossExposureAt(100)).toBe(500);
    expect(engine.buyingPowerAt(100)).toBe(500);
  });

  it('should close positions and credit the exit value', () => {
    engine.processInterval([enter({ quantity: 5 })], bar);

    const report = engine.processInterval([exit(1)], createBar(3000, 120, 125, 115, 118));

    expect(report.fills[0]).toMatchObject({ action: 'EXIT', positionId: 1, price: 120, realizedPnl: 100 });
    expect(engine.cashBalance).toBe(1100);
    expect(ledger.openCount).toBe(0);
  });

  it('should drop limit orders that do not cross', () => {
    const report = engine.processInterval([enter({ quantity: 1 }, 50)], bar);

    expect(report.fills).toHaveLength(0);
    expect(report.dropped).toEqual([{ action: 'ENTER', quantity: 1, price: 50 }]);
    expect(ledger.size).toBe(0);
    expect(engine.cashBalance).toBe(1000);
  });

  it('should fill exits before entries', () => {
    engine.processInterval([enter({ quantity: 10 })], bar);

    // Entry alone would need 1000 with 0 buying power left
    const report = engine.processInterval([enter({ quantity: 10 }), exit(1)], createBar(3000, 100, 101, 99, 100));

    expect(report.fills.map((f) => f.action)).toEqual(['EXIT', 'ENTER']);
    expect(ledger.openSnapshots().map((p) => p.id)).toEqual([2]);
    expect(engine.cashBalance).toBe(0);
  });

  it('should validate every order before filling any', () => {
    expect(() => engine.processInterval([enter({ quantity: 1 }), { action: 'ENTER' }], bar)).toThrow(
      MalformedOrderError
    );
    expect(ledger.size).toBe(0);
    expect(engine.cashBalance).toBe(1000);
  });

  it('should reject exits for unknown positions even when the limit would not fill', () => {
    expect(() => engine.processInterval([exit(9, 500)], bar)).toThrow(UnknownPositionError);
  });

  it('should throw when an entry exceeds buying power', () => {
    expect(() => engine.processInterval([enter({ quantity: 11 })], bar)).toThrow(InsufficientCapitalError);
    expect(ledger.size).toBe(0);
    expect(engine.cashBalance).toBe(1000);
  });

  it('should allow spending exactly the available buying power', () => {
    engine.processInterval([enter({ value: 1000 })], createBar(2000, 3, 3.5, 2.5, 3));

    expect(ledger.openCount).toBe(1);
    expect(engine.cashBalance).toBeCloseTo(0, 9);
  });

  describe('assertSolvent', () => {
    it('should pass while equity is non-negative', () => {
      engine.processInterval([enter({ quantity: -5 })], bar);
      expect(() => engine.assertSolvent(createBar(3000, 300, 300, 300, 300))).not.toThrow();
    });

    it('should throw once a short has wiped out equity', () => {
      engine.processInterval([enter({ quantity: -10 })], bar);

      // 2000 cash - 10 * 250
      expect(() => engine.assertSolvent(createBar(3000, 250, 260, 240, 255))).toThrow(InsufficientCapitalError);
    });
  });

  describe('unconstrained', () => {
    it('should skip capital checks and base cash at 0', () => {
      const free = new FillEngine(ledger, { symbol: 'BTCUSD', startingEquity: Infinity });

      free.processInterval([enter({ quantity: 1_000_000 })], bar);

      expect(free.enforceCapital).toBe(false);
      expect(free.capitalBase).toBe(0);
      expect(free.cashBalance).toBe(-100_000_000);
    });
  });
});
