/**
 * Positions Book
 *
 * Strategy-facing view of the open positions as they stand before the
 * current interval's fills. Built fresh for every `onCandle` call; nothing
 * a strategy does to it reaches the ledger.
 */

import type { Bar, ExitOrder } from '@barsim/shared';
import { exit } from '../order/order.js';
import type { PositionSnapshot } from './position.js';

export class PositionsBook {
  readonly openPositions: readonly PositionSnapshot[];
  /** Last bar of the history passed alongside this book */
  readonly currentBar: Bar | null;

  constructor(openPositions: readonly PositionSnapshot[], currentBar: Bar | null = null) {
    this.openPositions = Object.freeze(openPositions.filter((p) => p.status === 'OPEN'));
    this.currentBar = currentBar;
  }

  get size(): number {
    return this.openPositions.length;
  }

  get(id: number): PositionSnapshot | undefined {
    return this.openPositions.find((p) => p.id === id);
  }

  /**
   * Net quantity across open positions
   */
  get quantity(): number {
    return this.openPositions.reduce((sum, p) => sum + p.quantity, 0);
  }

  /**
   * Net notional of open positions at the current close
   */
  get value(): number {
    const close = this.currentBar?.close;
    if (close === undefined) {
      return 0;
    }
    return this.openPositions.reduce((sum, p) => sum + p.quantity * close, 0);
  }

  /**
   * Unrealized PnL of open positions at the current close
   */
  get unrealizedPnl(): number {
    const close = this.currentBar?.close;
    if (close === undefined) {
      return 0;
    }
    return this.openPositions.reduce((sum, p) => sum + p.quantity * (close - p.entryPrice), 0);
  }

  /** At least one open long */
  get isLong(): boolean {
    return this.openPositions.some((p) => p.quantity > 0);
  }

  /** At least one open short */
  get isShort(): boolean {
    return this.openPositions.some((p) => p.quantity < 0);
  }

  get isFlat(): boolean {
    return this.openPositions.length === 0;
  }

  /**
   * One market EXIT per open position
   */
  close(): ExitOrder[] {
    return this.openPositions.map((p) => exit(p.id));
  }

  /**
   * Market EXITs for the open positions matching `predicate`
   */
  closeWhere(predicate: (position: PositionSnapshot) => boolean): ExitOrder[] {
    return this.openPositions.filter(predicate).map((p) => exit(p.id));
  }
}
