export {
  calculateStats,
  statsToRecord,
  maxDrawdown,
  sharpeRatio,
  mean,
  sampleStdDev,
  type StatsOptions,
} from './stats-engine.js';
