/**
 * Position
 *
 * One trade from entry fill to exit fill. Identity and entry data never
 * change; the exit fill is the only mutation and happens at most once.
 */

import { InvalidInputError, UnknownPositionError } from '../errors.js';

export type PositionStatus = 'OPEN' | 'CLOSED';

/**
 * Read-only view of a position handed to strategies and callers
 */
export interface PositionSnapshot {
  readonly id: number;
  readonly symbol: string;
  /** Signed size: > 0 long, < 0 short */
  readonly quantity: number;
  readonly entryTime: number;
  readonly entryPrice: number;
  readonly exitTime: number | null;
  readonly exitPrice: number | null;
  readonly status: PositionStatus;
  /** Locked-in PnL, null while open */
  readonly realizedPnl: number | null;
}

export interface PositionEntry {
  id: number;
  symbol: string;
  quantity: number;
  entryTime: number;
  entryPrice: number;
}

/**
 * PnL of `quantity` units moved from `entryPrice` to `price`.
 * The sign of quantity carries the direction, so longs and shorts share it.
 */
export function positionPnl(quantity: number, entryPrice: number, price: number): number {
  return quantity * (price - entryPrice);
}

export class Position {
  readonly id: number;
  readonly symbol: string;
  readonly quantity: number;
  readonly entryTime: number;
  readonly entryPrice: number;
  private _exitTime: number | null = null;
  private _exitPrice: number | null = null;

  constructor(entry: PositionEntry) {
    if (entry.quantity === 0 || !Number.isFinite(entry.quantity)) {
      throw new InvalidInputError(`Position quantity must be a non-zero finite number, got ${entry.quantity}`, {
        positionId: entry.id,
      });
    }
    this.id = entry.id;
    this.symbol = entry.symbol;
    this.quantity = entry.quantity;
    this.entryTime = entry.entryTime;
    this.entryPrice = entry.entryPrice;
  }

  get exitTime(): number | null {
    return this._exitTime;
  }

  get exitPrice(): number | null {
    return this._exitPrice;
  }

  get status(): PositionStatus {
    return this._exitTime === null ? 'OPEN' : 'CLOSED';
  }

  get isOpen(): boolean {
    return this.status === 'OPEN';
  }

  get isLong(): boolean {
    return this.quantity > 0;
  }

  get isShort(): boolean {
    return this.quantity < 0;
  }

  /**
   * Entry notional (signed)
   */
  get entryValue(): number {
    return this.quantity * this.entryPrice;
  }

  get realizedPnl(): number | null {
    return this._exitPrice === null ? null : positionPnl(this.quantity, this.entryPrice, this._exitPrice);
  }

  /**
   * Mark-to-market PnL at `price`
   */
  unrealizedPnl(price: number): number {
    return positionPnl(this.quantity, this.entryPrice, price);
  }

  /**
   * Apply the exit fill. Returns the realized PnL.
   */
  close(exitTime: number, exitPrice: number): number {
    if (!this.isOpen) {
      throw new UnknownPositionError(this.id, 'closed');
    }
    this._exitTime = exitTime;
    this._exitPrice = exitPrice;
    return positionPnl(this.quantity, this.entryPrice, exitPrice);
  }

  toSnapshot(): PositionSnapshot {
    return Object.freeze({
      id: this.id,
      symbol: this.symbol,
      quantity: this.quantity,
      entryTime: this.entryTime,
      entryPrice: this.entryPrice,
      exitTime: this._exitTime,
      exitPrice: this._exitPrice,
      status: this.status,
      realizedPnl: this.realizedPnl,
    });
  }
}
