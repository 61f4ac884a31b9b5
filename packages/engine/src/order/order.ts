/**
 * Order builders and validation
 *
 * Strategies may build orders by hand or through these helpers. Either way
 * every order goes through `validateOrder` before the fill engine sees it.
 */

import { OrderSchema } from '@barsim/shared';
import type { EnterOrder, ExitOrder, Order } from '@barsim/shared';
import { MalformedOrderError } from '../errors.js';

export type EnterSize = { quantity: number; value?: never } | { value: number; quantity?: never };

/**
 * Build an ENTER order. Pass `price` for a limit order.
 *
 * @example
 * ```typescript
 * enter({ quantity: 10 });              // buy 10 units at next open
 * enter({ value: -1000 });              // short $1000 worth at next open
 * enter({ quantity: 5 }, 98.5);         // buy 5 units if price trades at 98.5
 * ```
 */
export function enter(size: EnterSize, price?: number): EnterOrder {
  const order: EnterOrder = { action: 'ENTER', ...size };
  if (price !== undefined) {
    order.price = price;
  }
  return order;
}

/**
 * Build an EXIT order for an open position
 */
export function exit(positionId: number, price?: number): ExitOrder {
  const order: ExitOrder = { action: 'EXIT', positionId };
  if (price !== undefined) {
    order.price = price;
  }
  return order;
}

export function isLimitOrder(order: Order): boolean {
  return order.price !== undefined;
}

/**
 * Validate an order coming out of a strategy.
 * Throws MalformedOrderError with the schema issues attached.
 */
export function validateOrder(order: unknown): Order {
  const result = OrderSchema.safeParse(order);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new MalformedOrderError(
      `Invalid order: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`,
      { order, issues }
    );
  }
  return result.data;
}

/**
 * Split orders into exits and entries, keeping each group's input order
 */
export function partitionOrders(orders: readonly Order[]): { exits: ExitOrder[]; entries: EnterOrder[] } {
  const exits: ExitOrder[] = [];
  const entries: EnterOrder[] = [];
  for (const order of orders) {
    if (order.action === 'EXIT') {
      exits.push(order);
    } else {
      entries.push(order);
    }
  }
  return { exits, entries };
}
