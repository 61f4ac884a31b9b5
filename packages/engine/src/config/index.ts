export {
  BacktestConfigSchema,
  parseBacktestConfig,
  loadBacktestConfigFromEnv,
  type RunBacktestConfig,
} from './backtest-config.js';
