/**
 * Fill Engine
 *
 * Turns one interval's orders into ledger mutations at the next bar.
 *
 * Rules:
 * 1. Every order is validated before any of them fills
 * 2. All EXITs fill before any ENTER, each group in input order
 * 3. Market orders fill at the bar's open
 * 4. Limit orders fill at their own price if the bar traded through it,
 *    otherwise they are dropped for good
 * 5. An ENTER that needs more buying power than is available aborts the run
 */

import type { Bar, EnterOrder, ExitOrder, Logger, Order } from '@barsim/shared';
import { InsufficientCapitalError } from '../../errors.js';
import { partitionOrders, validateOrder } from '../../order/order.js';
import type { PositionLedger } from '../../position/position-ledger.js';
import type { Fill, FillKind, IntervalFillReport } from '../types.js';

/** Relative slack on capital checks so that "spend everything" orders survive rounding */
const CAPITAL_EPSILON = 1e-9;

export interface FillEngineOptions {
  symbol: string;
  /** `Infinity` disables capital checks and bases cash at 0 */
  startingEquity: number;
  logger?: Logger;
}

/**
 * Price an order fills at on `bar`, or null when a limit is out of range
 */
export function resolveFillPrice(order: Order, bar: Bar): number | null {
  if (order.price === undefined) {
    return bar.open;
  }
  if (order.price >= bar.low && order.price <= bar.high) {
    return order.price;
  }
  return null;
}

/**
 * Signed quantity an ENTER order asks for at `fillPrice`
 */
export function resolveQuantity(order: EnterOrder, fillPrice: number): number {
  if (order.quantity !== undefined) {
    return order.quantity;
  }
  // validateOrder guarantees value is set when quantity is not
  return (order.value ?? 0) / fillPrice;
}

export class FillEngine {
  readonly enforceCapital: boolean;
  readonly capitalBase: number;
  private cash: number;
  private readonly symbol: string;
  private readonly ledger: PositionLedger;
  private readonly logger?: Logger;

  constructor(ledger: PositionLedger, options: FillEngineOptions) {
    this.ledger = ledger;
    this.symbol = options.symbol;
    this.logger = options.logger;
    this.enforceCapital = Number.isFinite(options.startingEquity);
    this.capitalBase = this.enforceCapital ? options.startingEquity : 0;
    this.cash = this.capitalBase;
  }

  get cashBalance(): number {
    return this.cash;
  }

  /**
   * Cash plus open positions marked at `price`
   */
  equityAt(price: number): number {
    return this.ledger.openPositions().reduce((sum, p) => sum + p.quantity * price, this.cash);
  }

  /**
   * Gross notional of open positions at `price`
   */
  grossExposureAt(price: number): number {
    return this.ledger.openPositions().reduce((sum, p) => sum + Math.abs(p.quantity * price), 0);
  }

  /**
   * Capital left for new exposure with no leverage: equity minus gross exposure
   */
  buyingPowerAt(price: number): number {
    return this.equityAt(price) - this.grossExposureAt(price);
  }

  /**
   * Fail the run when open positions, marked at the bar's open, have wiped out
   * the account (a short that can no longer be covered)
   */
  assertSolvent(bar: Bar): void {
    if (!this.enforceCapital) {
      return;
    }
    const equity = this.equityAt(bar.open);
    if (equity < 0) {
      throw new InsufficientCapitalError(
        `Equity is negative (${equity}) at open on ${bar.timestamp}; the account would be liquidated`,
        0,
        equity,
        { timestamp: bar.timestamp }
      );
    }
  }

  /**
   * Fill one interval's orders against `bar`
   */
  processInterval(orders: readonly unknown[], bar: Bar): IntervalFillReport {
    const validated = orders.map((order) => validateOrder(order));
    const { exits, entries } = partitionOrders(validated);

    const report: IntervalFillReport = { fills: [], dropped: [] };

    for (const order of exits) {
      const fill = this.fillExit(order, bar);
      if (fill) {
        report.fills.push(fill);
      } else {
        report.dropped.push(order);
      }
    }

    for (const order of entries) {
      const fill = this.fillEnter(order, bar);
      if (fill) {
        report.fills.push(fill);
      } else {
        report.dropped.push(order);
      }
    }

    if (report.dropped.length > 0) {
      this.logger?.debug('Limit orders dropped', {
        timestamp: bar.timestamp,
        count: report.dropped.length,
        low: bar.low,
        high: bar.high,
      });
    }

    return report;
  }

  private fillExit(order: ExitOrder, bar: Bar): Fill | null {
    // Unknown or closed ids fail even when the limit would not have filled
    const position = this.ledger.requireOpen(order.positionId);

    const price = resolveFillPrice(order, bar);
    if (price === null) {
      return null;
    }

    const closed = this.ledger.close(position.id, bar.timestamp, price);
    this.cash += position.quantity * price;

    const fill: Fill = {
      action: 'EXIT',
      kind: fillKind(order),
      positionId: closed.id,
      quantity: closed.quantity,
      price,
      timestamp: bar.timestamp,
      realizedPnl: closed.realizedPnl ?? 0,
      cashBalance: this.cash,
    };
    this.logger?.debug('Position closed', { ...fill });
    return fill;
  }

  private fillEnter(order: EnterOrder, bar: Bar): Fill | null {
    const price = resolveFillPrice(order, bar);
    if (price === null) {
      return null;
    }

    const quantity = resolveQuantity(order, price);
    const required = Math.abs(quantity * price);

    if (this.enforceCapital) {
      const available = this.buyingPowerAt(price);
      if (required - available > CAPITAL_EPSILON * Math.max(1, Math.abs(available))) {
        throw new InsufficientCapitalError(
          `Insufficient buying power at ${bar.timestamp}: required ${required}, available ${available}`,
          required,
          available,
          { order, timestamp: bar.timestamp, price }
        );
      }
    }

    const opened = this.ledger.open({
      symbol: this.symbol,
      quantity,
      entryTime: bar.timestamp,
      entryPrice: price,
    });
    this.cash -= quantity * price;

    const fill: Fill = {
      action: 'ENTER',
      kind: fillKind(order),
      positionId: opened.id,
      quantity,
      price,
      timestamp: bar.timestamp,
      cashBalance: this.cash,
    };
    this.logger?.debug('Position opened', { ...fill });
    return fill;
  }
}

function fillKind(order: Order): FillKind {
  return order.price === undefined ? 'market' : 'limit';
}
