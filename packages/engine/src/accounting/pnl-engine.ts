/**
 * PnL / Equity Engine
 *
 * Second pass over a finished ledger. Every number depends only on each
 * position's entry/exit timestamps and prices and on the bar closes, never
 * on the order the loop did things in.
 */

import type { Bar } from '@barsim/shared';
import { positionPnl, type PositionSnapshot } from '../position/position.js';
import type { PnlRow, PnlTable } from '../backtest/types.js';

interface PositionMark {
  value: number;
  pnl: number;
  open: boolean;
}

/**
 * Value and PnL contribution of one position at one bar
 */
export function markPosition(position: PositionSnapshot, bar: Bar): PositionMark {
  if (bar.timestamp < position.entryTime) {
    return { value: 0, pnl: 0, open: false };
  }
  if (position.exitTime === null || position.exitPrice === null || bar.timestamp < position.exitTime) {
    return {
      value: position.quantity * bar.close,
      pnl: positionPnl(position.quantity, position.entryPrice, bar.close),
      open: true,
    };
  }
  // Closed: frozen at the realized value from the exit bar on
  return {
    value: 0,
    pnl: positionPnl(position.quantity, position.entryPrice, position.exitPrice),
    open: false,
  };
}

/**
 * Build one row per bar with per-position columns, totals, equity and cash
 */
export function buildPnlTable(
  bars: readonly Bar[],
  positions: readonly PositionSnapshot[],
  capitalBase: number
): PnlTable {
  const rows: PnlRow[] = [];
  let previousTotal = 0;

  for (const bar of bars) {
    const positionValues: Record<number, number> = {};
    const positionPnlColumns: Record<number, number> = {};
    let openNotional = 0;
    let exposure = 0;
    let realizedPnl = 0;
    let unrealizedPnl = 0;

    for (const position of positions) {
      const mark = markPosition(position, bar);
      positionValues[position.id] = mark.value;
      positionPnlColumns[position.id] = mark.pnl;
      openNotional += mark.value;
      exposure += Math.abs(mark.value);
      if (mark.open) {
        unrealizedPnl += mark.pnl;
      } else {
        realizedPnl += mark.pnl;
      }
    }

    const totalPnl = realizedPnl + unrealizedPnl;
    const equity = capitalBase + totalPnl;

    rows.push(
      Object.freeze({
        timestamp: bar.timestamp,
        close: bar.close,
        positionValues: Object.freeze(positionValues),
        positionPnl: Object.freeze(positionPnlColumns),
        openNotional,
        exposure,
        realizedPnl,
        unrealizedPnl,
        totalPnl,
        periodPnl: totalPnl - previousTotal,
        equity,
        cashBalance: equity - openNotional,
      })
    );
    previousTotal = totalPnl;
  }

  return Object.freeze(rows);
}

/**
 * Equity column of a PnL table
 */
export function equityCurve(table: PnlTable): number[] {
  return table.map((row) => row.equity);
}
