export {
  SmaCrossoverStrategy,
  DEFAULT_SMA_CROSSOVER_PARAMS,
  type SmaCrossoverParams,
  type CrossSignal,
} from './sma-crossover.strategy.js';
