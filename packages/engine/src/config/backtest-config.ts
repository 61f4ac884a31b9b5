/**
 * Backtest configuration
 *
 * Run parameters come from the environment (a root `.env` is loaded by the
 * run script) and are validated here before anything touches the engine.
 */

import { z } from 'zod';
import { parseLogLevel, type LogLevel } from '@barsim/shared';
import { InvalidInputError } from '../errors.js';
import { DEFAULT_BACKTEST_CONFIG, type BacktestConfig } from '../backtest/types.js';
import { DEFAULT_SMA_CROSSOVER_PARAMS } from '../strategies/sma-crossover.strategy.js';

/**
 * `startingEquity` accepts Infinity for unconstrained runs
 */
export const BacktestConfigSchema = z.object({
  symbol: z.string().min(1),
  startingEquity: z.number().nonnegative(),
  periodsPerYear: z.number().positive().finite(),
});

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z
  .object({
    BACKTEST_CSV: z.string().min(1, 'BACKTEST_CSV is required'),
    BACKTEST_SYMBOL: z.string().min(1).default(DEFAULT_BACKTEST_CONFIG.symbol),
    // "unlimited" is accepted as an alias for Infinity
    BACKTEST_STARTING_EQUITY: z
      .string()
      .default(String(DEFAULT_BACKTEST_CONFIG.startingEquity))
      .transform((value) => (value.trim().toLowerCase() === 'unlimited' ? Infinity : Number(value)))
      .pipe(z.number().nonnegative()),
    BACKTEST_PERIODS_PER_YEAR: z.coerce.number().positive().finite().default(DEFAULT_BACKTEST_CONFIG.periodsPerYear),
    BACKTEST_FAST_PERIOD: positiveInt(DEFAULT_SMA_CROSSOVER_PARAMS.fastPeriod),
    BACKTEST_SLOW_PERIOD: positiveInt(DEFAULT_SMA_CROSSOVER_PARAMS.slowPeriod),
    BACKTEST_OUTPUT: z.string().min(1).optional(),
    LOG_LEVEL: z.string().optional(),
  })
  .refine((env) => env.BACKTEST_SLOW_PERIOD > env.BACKTEST_FAST_PERIOD, {
    message: 'BACKTEST_SLOW_PERIOD must be greater than BACKTEST_FAST_PERIOD',
    path: ['BACKTEST_SLOW_PERIOD'],
  });

export interface RunBacktestConfig {
  csvPath: string;
  backtest: BacktestConfig;
  fastPeriod: number;
  slowPeriod: number;
  outputPath?: string;
  logLevel: LogLevel;
}

/**
 * Validate a partial engine config and fill in defaults
 */
export function parseBacktestConfig(input: Partial<BacktestConfig>): BacktestConfig {
  const result = BacktestConfigSchema.safeParse({ ...DEFAULT_BACKTEST_CONFIG, ...input });
  if (!result.success) {
    throw new InvalidInputError(`Invalid backtest config: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Read the run-backtest configuration from environment variables
 */
export function loadBacktestConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RunBacktestConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidInputError(`Invalid environment: ${formatIssues(result.error)}`);
  }
  const parsed = result.data;

  return {
    csvPath: parsed.BACKTEST_CSV,
    backtest: {
      symbol: parsed.BACKTEST_SYMBOL,
      startingEquity: parsed.BACKTEST_STARTING_EQUITY,
      periodsPerYear: parsed.BACKTEST_PERIODS_PER_YEAR,
    },
    fastPeriod: parsed.BACKTEST_FAST_PERIOD,
    slowPeriod: parsed.BACKTEST_SLOW_PERIOD,
    outputPath: parsed.BACKTEST_OUTPUT,
    logLevel: parseLogLevel(parsed.LOG_LEVEL),
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
