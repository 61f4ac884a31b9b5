/**
 * SMA Crossover Strategy
 *
 * Goes long when the fast SMA crosses above the slow SMA and flattens (or
 * reverses into a short) when it crosses back below. Sizing is by notional
 * value so the same parameters work across price levels.
 */

import type { Bar, Order } from '@barsim/shared';
import { InvalidInputError } from '../errors.js';
import { calculateSMA, lastPair } from '../indicators/index.js';
import { enter } from '../order/order.js';
import type { PositionsBook } from '../position/positions-book.js';
import type { Strategy } from '../backtest/types.js';

export interface SmaCrossoverParams {
  fastPeriod: number;
  slowPeriod: number;
  /** Notional committed per entry */
  positionValue: number;
  /** Open a short on a bearish cross instead of only closing the long */
  allowShort: boolean;
}

export const DEFAULT_SMA_CROSSOVER_PARAMS: SmaCrossoverParams = {
  fastPeriod: 10,
  slowPeriod: 30,
  positionValue: 1_000,
  allowShort: false,
};

export type CrossSignal = 'BULLISH' | 'BEARISH' | null;

export class SmaCrossoverStrategy implements Strategy {
  readonly params: SmaCrossoverParams;

  constructor(params: Partial<SmaCrossoverParams> = {}) {
    this.params = { ...DEFAULT_SMA_CROSSOVER_PARAMS, ...params };

    const { fastPeriod, slowPeriod, positionValue } = this.params;
    if (!Number.isInteger(fastPeriod) || fastPeriod < 1) {
      throw new InvalidInputError(`fastPeriod must be a positive integer, got ${fastPeriod}`);
    }
    if (!Number.isInteger(slowPeriod) || slowPeriod <= fastPeriod) {
      throw new InvalidInputError(`slowPeriod must be an integer above fastPeriod, got ${slowPeriod}`);
    }
    if (!(positionValue > 0)) {
      throw new InvalidInputError(`positionValue must be positive, got ${positionValue}`);
    }
  }

  /**
   * Direction of a cross on the last bar of `history`, if any
   */
  signal(history: readonly Bar[]): CrossSignal {
    // One extra bar so both SMAs have a previous value
    if (history.length < this.params.slowPeriod + 1) {
      return null;
    }

    const fast = lastPair(calculateSMA(history, this.params.fastPeriod));
    const slow = lastPair(calculateSMA(history, this.params.slowPeriod));
    if (!fast || !slow) {
      return null;
    }

    const [fastPrev, fastNow] = fast;
    const [slowPrev, slowNow] = slow;

    if (fastPrev <= slowPrev && fastNow > slowNow) {
      return 'BULLISH';
    }
    if (fastPrev >= slowPrev && fastNow < slowNow) {
      return 'BEARISH';
    }
    return null;
  }

  onCandle(history: readonly Bar[], book: PositionsBook): Order[] {
    const signal = this.signal(history);
    const { positionValue, allowShort } = this.params;

    if (signal === 'BULLISH' && !book.isLong) {
      return [...book.closeWhere((p) => p.quantity < 0), enter({ value: positionValue })];
    }

    if (signal === 'BEARISH') {
      const orders: Order[] = book.closeWhere((p) => p.quantity > 0);
      if (allowShort && !book.isShort) {
        orders.push(enter({ value: -positionValue }));
      }
      return orders;
    }

    return [];
  }
}
