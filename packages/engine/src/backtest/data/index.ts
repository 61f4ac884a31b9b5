/**
 * Backtest Data - loading and validating bars
 */

export {
  loadBarsFromCSV,
  parseBarsCSV,
  parseCSVLine,
  parseTimestamp,
  detectCSVFormat,
  type CSVLoadOptions,
  type TimestampFormat,
} from './csv-loader.js';
export { validateBars } from './validate-bars.js';
