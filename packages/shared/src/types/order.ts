/**
 * Order types produced by strategies
 */

export type OrderAction = 'ENTER' | 'EXIT';

/**
 * Open a new position.
 *
 * Exactly one of `quantity` or `value` is set. Both are signed: a negative
 * size opens a short position. Without `price` the order is a market order.
 */
export interface EnterOrder {
  action: 'ENTER';
  /** Units of the asset */
  quantity?: number;
  /** Notional value, converted to units at the fill price */
  value?: number;
  /** Limit price */
  price?: number;
}

/**
 * Close an open position in full
 */
export interface ExitOrder {
  action: 'EXIT';
  positionId: number;
  /** Limit price */
  price?: number;
}

export type Order = EnterOrder | ExitOrder;
