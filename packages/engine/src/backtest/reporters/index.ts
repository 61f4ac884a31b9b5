/**
 * Backtest Reporters
 */

export {
  printBacktestResult,
  printStats,
  printCompactSummary,
  fmt,
  fmtCurrency,
  fmtPct,
  fmtDuration,
} from './console-reporter.js';
export { toJSON, exportToJSON, generateFilename, type JSONExportOptions } from './json-reporter.js';
