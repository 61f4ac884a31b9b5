/**
 * Market data types
 */

/**
 * One OHLCV record for a fixed time window
 */
export interface Bar {
  /** Interval start time (Unix timestamp in seconds) */
  timestamp: number;
  /** Opening price */
  open: number;
  /** Highest price */
  high: number;
  /** Lowest price */
  low: number;
  /** Closing price */
  close: number;
  /** Traded volume */
  volume: number;
}

/**
 * Price fields of a bar
 */
export type PriceField = 'open' | 'high' | 'low' | 'close';
