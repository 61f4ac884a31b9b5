/**
 * JSON Reporter for Backtest Results
 *
 * Exports backtest results to JSON files.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { BacktestResult } from '../types.js';

/**
 * Options for JSON export
 */
export interface JSONExportOptions {
  /** Pretty print with indentation */
  pretty?: boolean;
  /** Include the ledger */
  includePositions?: boolean;
  /** Include every fill */
  includeFills?: boolean;
  /** Include the per-bar PnL table */
  includePnl?: boolean;
}

const DEFAULT_OPTIONS: Required<JSONExportOptions> = {
  pretty: true,
  includePositions: true,
  includeFills: false,
  includePnl: false,
};

/**
 * Convert BacktestResult to a JSON-serializable object.
 * Not-applicable stats stay null.
 */
export function toJSON(result: BacktestResult, options?: JSONExportOptions): Record<string, unknown> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const json: Record<string, unknown> = {
    metadata: {
      symbol: result.config.symbol,
      executedAt: result.executedAt.toISOString(),
      executionTimeMs: result.executionTimeMs,
    },
    config: {
      ...result.config,
      // JSON has no Infinity
      startingEquity: Number.isFinite(result.config.startingEquity) ? result.config.startingEquity : null,
    },
    dateRange: {
      from: result.dateRange.from.toISOString(),
      to: result.dateRange.to.toISOString(),
      barCount: result.dateRange.barCount,
    },
    stats: result.stats,
    droppedOrders: result.droppedOrders,
  };

  if (opts.includePositions) {
    json.positions = result.positions;
  } else {
    json.positionCount = result.positions.length;
  }

  if (opts.includeFills) {
    json.fills = result.fills;
  }

  if (opts.includePnl) {
    json.pnl = result.pnl;
  }

  return json;
}

/**
 * Export backtest result to JSON file
 */
export function exportToJSON(result: BacktestResult, outputPath: string, options?: JSONExportOptions): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const json = toJSON(result, opts);

  const content = opts.pretty ? JSON.stringify(json, null, 2) : JSON.stringify(json);

  // Ensure directory exists
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  fs.writeFileSync(outputPath, content, 'utf-8');

  return outputPath;
}

/**
 * Generate default filename for result
 */
export function generateFilename(result: BacktestResult): string {
  const date = result.executedAt.toISOString().split('T')[0];
  const time = result.executedAt.toISOString().split('T')[1]?.split('.')[0]?.replace(/:/g, '');
  return `backtest_${result.config.symbol}_${date}_${time}.json`;
}
