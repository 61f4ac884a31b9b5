/**
 * Backtester
 *
 * Drives the interval-by-interval simulation:
 *
 *   bars → strategy.onCandle(history, book) → orders → FillEngine → ledger
 *        → (after the loop) PnL table → stats
 *
 * Strategies see bars 0..i and decide; their orders fill at bar i+1.
 * One instance runs once.
 *
 * @example
 * ```typescript
 * const backtester = new Backtester(bars, new SmaCrossoverStrategy(), {
 *   symbol: 'BTCUSD',
 *   startingEquity: 10_000,
 * });
 * const result = backtester.run();
 * console.log(result.stats.totalPnl);
 * ```
 */

import { createLogger, type Bar, type Logger } from '@barsim/shared';
import { BacktestError, InvalidInputError } from '../../errors.js';
import { PositionLedger } from '../../position/position-ledger.js';
import { PositionsBook } from '../../position/positions-book.js';
import type { PositionSnapshot } from '../../position/position.js';
import { buildPnlTable } from '../../accounting/pnl-engine.js';
import { calculateStats } from '../../metrics/stats-engine.js';
import { validateBars } from '../data/validate-bars.js';
import { FillEngine } from './fill-engine.js';
import {
  DEFAULT_BACKTEST_CONFIG,
  type BacktestConfig,
  type BacktestResult,
  type BacktestStats,
  type Fill,
  type PnlTable,
  type Strategy,
  type StrategyFactory,
} from '../types.js';

export interface BacktesterOptions extends Partial<BacktestConfig> {
  logger?: Logger;
  /** Progress callback, called once per interval */
  onProgress?: (progress: { current: number; total: number }) => void;
}

export class Backtester {
  readonly config: BacktestConfig;
  readonly bars: readonly Bar[];
  private readonly strategy: Strategy;
  private readonly ledger = new PositionLedger();
  private readonly fillEngine: FillEngine;
  private readonly logger: Logger;
  private readonly onProgress?: BacktesterOptions['onProgress'];
  private readonly fillLog: Fill[] = [];
  private dropped = 0;
  private started = false;
  private result: BacktestResult | null = null;

  constructor(bars: readonly unknown[], strategy: Strategy | StrategyFactory, options: BacktesterOptions = {}) {
    const { logger, onProgress, ...config } = options;
    this.config = { ...DEFAULT_BACKTEST_CONFIG, ...config };

    if (Number.isNaN(this.config.startingEquity) || this.config.startingEquity < 0) {
      throw new InvalidInputError(`startingEquity must be a non-negative number, got ${this.config.startingEquity}`);
    }
    if (!(this.config.periodsPerYear > 0)) {
      throw new InvalidInputError(`periodsPerYear must be positive, got ${this.config.periodsPerYear}`);
    }

    this.bars = validateBars(bars);
    this.strategy = typeof strategy === 'function' ? strategy() : strategy;
    this.logger = logger ?? createLogger({ service: 'engine' });
    this.onProgress = onProgress;
    this.fillEngine = new FillEngine(this.ledger, {
      symbol: this.config.symbol,
      startingEquity: this.config.startingEquity,
      logger: this.logger,
    });
  }

  /**
   * Subscribe to ledger events ('position:opened', 'position:closed')
   */
  get events(): PositionLedger {
    return this.ledger;
  }

  /**
   * Every position created so far, open and closed
   */
  get positions(): PositionSnapshot[] {
    return this.ledger.snapshots();
  }

  get fills(): readonly Fill[] {
    return this.fillLog;
  }

  get cashBalance(): number {
    return this.fillEngine.cashBalance;
  }

  get pnlTable(): PnlTable {
    return this.requireResult().pnl;
  }

  stats(): BacktestStats {
    return this.requireResult().stats;
  }

  /**
   * Run the simulation to completion. Any BacktestError aborts the run and
   * propagates; the ledger keeps the state of the last successful fill.
   */
  run(): BacktestResult {
    if (this.started) {
      throw new BacktestError('RUN_ALREADY_COMPLETED', 'Backtester instances run once; create a new one');
    }
    this.started = true;

    const startTime = Date.now();
    const total = this.bars.length - 1;

    this.logger.info('Backtest started', {
      symbol: this.config.symbol,
      bars: this.bars.length,
      startingEquity: this.config.startingEquity,
    });

    try {
      for (let i = 0; i < total; i++) {
        this.step(i);
        this.onProgress?.({ current: i + 1, total });
      }
    } catch (error) {
      this.logger.error('Backtest aborted', {
        error: error instanceof Error ? error.message : String(error),
        code: error instanceof BacktestError ? error.code : undefined,
        positions: this.ledger.size,
        cashBalance: this.fillEngine.cashBalance,
      });
      throw error;
    }

    const positions = this.ledger.snapshots();
    const pnl = buildPnlTable(this.bars, positions, this.fillEngine.capitalBase);
    const stats = calculateStats(pnl, positions, {
      startingEquity: this.config.startingEquity,
      periodsPerYear: this.config.periodsPerYear,
    });

    const firstBar = this.bars[0];
    const lastBar = this.bars[this.bars.length - 1];

    this.result = {
      config: { ...this.config },
      dateRange: {
        from: new Date((firstBar?.timestamp ?? 0) * 1000),
        to: new Date((lastBar?.timestamp ?? 0) * 1000),
        barCount: this.bars.length,
      },
      positions,
      fills: [...this.fillLog],
      droppedOrders: this.dropped,
      pnl,
      stats,
      executedAt: new Date(),
      executionTimeMs: Date.now() - startTime,
    };

    this.logger.info('Backtest finished', {
      positions: positions.length,
      fills: this.fillLog.length,
      droppedOrders: this.dropped,
      finalEquity: stats.finalEquity,
      totalPnl: stats.totalPnl,
    });

    return this.result;
  }

  /**
   * Interval i: strategy sees bars[0..i], orders fill on bars[i+1]
   */
  private step(i: number): void {
    const history = this.bars.slice(0, i + 1);
    const current = this.bars[i];
    const next = this.bars[i + 1];
    if (!current || !next) {
      return;
    }

    this.fillEngine.assertSolvent(next);

    const book = new PositionsBook(this.ledger.openSnapshots(), current);
    const orders = this.strategy.onCandle(history, book);
    if (!Array.isArray(orders)) {
      throw new InvalidInputError(`Strategy must return an array of orders at ${current.timestamp}`);
    }
    if (orders.length === 0) {
      return;
    }

    const report = this.fillEngine.processInterval(orders, next);
    this.fillLog.push(...report.fills);
    this.dropped += report.dropped.length;
  }

  private requireResult(): BacktestResult {
    if (!this.result) {
      throw new BacktestError('RUN_NOT_COMPLETED', 'Results are only available after run() completes');
    }
    return this.result;
  }
}

/**
 * Construct a Backtester and run it
 */
export function runBacktest(
  bars: readonly unknown[],
  strategy: Strategy | StrategyFactory,
  options?: BacktesterOptions
): BacktestResult {
  return new Backtester(bars, strategy, options).run();
}
