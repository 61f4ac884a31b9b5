/**
 * CSV Loader for Backtest Engine
 *
 * Loads OHLCV bars from CSV files with configurable columns and timestamp
 * formats. Output is sorted by timestamp and de-duplicated, ready for
 * validateBars.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Bar, Logger } from '@barsim/shared';
import { InvalidInputError } from '../../errors.js';

export type TimestampFormat = 'unix_s' | 'unix_ms' | 'iso';

/**
 * CSV parsing options
 */
export interface CSVLoadOptions {
  /** Column name or index for timestamp (default: 'timestamp') */
  timestampColumn?: string | number;
  /** Column name or index for open (default: 'open') */
  openColumn?: string | number;
  /** Column name or index for high (default: 'high') */
  highColumn?: string | number;
  /** Column name or index for low (default: 'low') */
  lowColumn?: string | number;
  /** Column name or index for close (default: 'close') */
  closeColumn?: string | number;
  /** Column name or index for volume (default: 'volume') */
  volumeColumn?: string | number;
  /** Delimiter (default: ',') */
  delimiter?: string;
  /** Has header row (default: true) */
  hasHeader?: boolean;
  /** Timestamp format (default: 'unix_s') */
  timestampFormat?: TimestampFormat;
  /** Skip rows with invalid data instead of throwing (default: true) */
  skipInvalid?: boolean;
  /** Receives a warning when rows are skipped */
  logger?: Logger;
}

const DEFAULT_OPTIONS = {
  timestampColumn: 'timestamp',
  openColumn: 'open',
  highColumn: 'high',
  lowColumn: 'low',
  closeColumn: 'close',
  volumeColumn: 'volume',
  delimiter: ',',
  hasHeader: true,
  timestampFormat: 'unix_s',
  skipInvalid: true,
} satisfies Required<Omit<CSVLoadOptions, 'logger'>>;

/**
 * Parse a CSV line handling quoted values
 */
export function parseCSVLine(line: string, delimiter: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Get column index from header or use numeric index
 */
function getColumnIndex(column: string | number, headers: string[]): number {
  if (typeof column === 'number') {
    return column;
  }

  const index = headers.findIndex((h) => h.toLowerCase() === column.toLowerCase());

  if (index === -1) {
    throw new InvalidInputError(`Column "${column}" not found in headers: ${headers.join(', ')}`);
  }

  return index;
}

/**
 * Parse timestamp to Unix seconds
 */
export function parseTimestamp(value: string, format: TimestampFormat): number {
  switch (format) {
    case 'unix_s':
      return Number(value);
    case 'unix_ms':
      return Math.floor(Number(value) / 1000);
    case 'iso':
      return Math.floor(new Date(value).getTime() / 1000);
  }
}

/**
 * Parse bars from CSV text
 */
export function parseBarsCSV(content: string, options?: CSVLoadOptions): Bar[] {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);

  const firstLine = lines[0];
  if (firstLine === undefined) {
    throw new InvalidInputError('CSV content is empty');
  }

  // Parse header
  let headers: string[];
  let dataStartIndex = 0;

  if (opts.hasHeader) {
    headers = parseCSVLine(firstLine, opts.delimiter);
    dataStartIndex = 1;
  } else {
    headers = parseCSVLine(firstLine, opts.delimiter).map((_, i) => i.toString());
  }

  const tsIdx = getColumnIndex(opts.timestampColumn, headers);
  const openIdx = getColumnIndex(opts.openColumn, headers);
  const highIdx = getColumnIndex(opts.highColumn, headers);
  const lowIdx = getColumnIndex(opts.lowColumn, headers);
  const closeIdx = getColumnIndex(opts.closeColumn, headers);
  const volumeIdx = getColumnIndex(opts.volumeColumn, headers);

  const bars: Bar[] = [];
  let skipped = 0;

  for (let i = dataStartIndex; i < lines.length; i++) {
    const values = parseCSVLine(lines[i] ?? '', opts.delimiter);
    const field = (idx: number): number => parseFloat(values[idx] ?? '');

    const bar: Bar = {
      timestamp: parseTimestamp(values[tsIdx] ?? '', opts.timestampFormat),
      open: field(openIdx),
      high: field(highIdx),
      low: field(lowIdx),
      close: field(closeIdx),
      volume: field(volumeIdx),
    };

    if (Object.values(bar).some((v) => !Number.isFinite(v))) {
      if (opts.skipInvalid) {
        skipped++;
        continue;
      }
      throw new InvalidInputError(`Invalid numeric value on line ${i + 1}`, { line: i + 1 });
    }

    bars.push(bar);
  }

  if (skipped > 0) {
    opts.logger?.warn('Skipped invalid CSV rows', { skipped });
  }

  // Sort and deduplicate by timestamp
  bars.sort((a, b) => a.timestamp - b.timestamp);

  const deduped: Bar[] = [];
  for (const bar of bars) {
    const previous = deduped[deduped.length - 1];
    if (!previous || previous.timestamp !== bar.timestamp) {
      deduped.push(bar);
    }
  }

  return deduped;
}

/**
 * Load bars from a CSV file
 */
export function loadBarsFromCSV(filePath: string, options?: CSVLoadOptions): Bar[] {
  const absolutePath = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new InvalidInputError(`CSV file not found: ${absolutePath}`);
  }

  const content = fs.readFileSync(absolutePath, 'utf-8');
  return parseBarsCSV(content, options);
}

/**
 * Auto-detect column names and timestamp format from the header and first row
 */
export function detectCSVFormat(content: string, delimiter = ','): CSVLoadOptions {
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const headers = parseCSVLine(lines[0] ?? '', delimiter);
  const sampleRow = lines[1] ? parseCSVLine(lines[1], delimiter) : [];
  const lowerHeaders = headers.map((h) => h.toLowerCase());
  const options: CSVLoadOptions = { delimiter };

  const find = (variants: string[]): string | undefined => {
    for (const variant of variants) {
      const idx = lowerHeaders.indexOf(variant);
      if (idx !== -1) {
        return headers[idx];
      }
    }
    return undefined;
  };

  const columns = {
    timestampColumn: find(['timestamp', 'time', 'date', 'datetime', 'epoch']),
    openColumn: find(['open', 'o', 'open_price']),
    highColumn: find(['high', 'h', 'high_price']),
    lowColumn: find(['low', 'l', 'low_price']),
    closeColumn: find(['close', 'c', 'close_price']),
    volumeColumn: find(['volume', 'v', 'vol']),
  };
  // Only set what was found so the defaults apply to the rest
  const keys = ['timestampColumn', 'openColumn', 'highColumn', 'lowColumn', 'closeColumn', 'volumeColumn'] as const;
  for (const key of keys) {
    const value = columns[key];
    if (value !== undefined) {
      options[key] = value;
    }
  }

  const tsIdx = columns.timestampColumn ? headers.indexOf(columns.timestampColumn) : 0;
  const tsValue = sampleRow[tsIdx];
  if (tsValue) {
    if (tsValue.includes('T') || tsValue.includes('-')) {
      options.timestampFormat = 'iso';
    } else if (tsValue.length > 10) {
      options.timestampFormat = 'unix_ms';
    } else {
      options.timestampFormat = 'unix_s';
    }
  }

  return options;
}
