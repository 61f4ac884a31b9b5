#!/usr/bin/env npx tsx
/**
 * SMA Crossover Backtest Runner
 *
 * Loads bars from a CSV, runs the SMA crossover strategy over them and prints
 * the result. Writes the JSON report when BACKTEST_OUTPUT is set.
 *
 * Usage:
 *   BACKTEST_CSV=data/BTCUSD_1h.csv BACKTEST_SYMBOL=BTCUSD npx tsx src/scripts/run-backtest.ts
 */

import { createLogger, loadEnvFromRoot } from '@barsim/shared';
import { loadBacktestConfigFromEnv } from '../config/backtest-config.js';
import { detectCSVFormat, loadBarsFromCSV } from '../backtest/data/csv-loader.js';
import { Backtester } from '../backtest/engine/backtester.js';
import { exportToJSON, printBacktestResult } from '../backtest/reporters/index.js';
import { SmaCrossoverStrategy } from '../strategies/sma-crossover.strategy.js';
import { BacktestError } from '../errors.js';
import * as fs from 'fs';

loadEnvFromRoot();

async function main(): Promise<void> {
  const config = loadBacktestConfigFromEnv();
  const logger = createLogger({ service: 'run-backtest', level: config.logLevel });

  try {
    const sample = fs.existsSync(config.csvPath) ? fs.readFileSync(config.csvPath, 'utf-8').slice(0, 4096) : '';
    const bars = loadBarsFromCSV(config.csvPath, { ...detectCSVFormat(sample), logger });
    logger.info('Bars loaded', { path: config.csvPath, count: bars.length });

    const backtester = new Backtester(
      bars,
      new SmaCrossoverStrategy({ fastPeriod: config.fastPeriod, slowPeriod: config.slowPeriod }),
      { ...config.backtest, logger }
    );
    const result = backtester.run();

    printBacktestResult(result);

    if (config.outputPath) {
      const written = exportToJSON(result, config.outputPath, { includeFills: true });
      logger.info('Result exported', { path: written });
    }
  } finally {
    await logger.close();
  }
}

main().catch((error: unknown) => {
  const code = error instanceof BacktestError ? ` [${error.code}]` : '';
  console.error(`❌ Backtest failed${code}:`, error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
