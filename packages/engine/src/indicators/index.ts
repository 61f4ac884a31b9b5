/**
 * Technical Indicators
 *
 * Wrapper around technicalindicators library
 * Provides type-safe, Bar-compatible API
 */

import { SMA, EMA } from 'technicalindicators';
import type { Bar, PriceField } from '@barsim/shared';

/**
 * Extract values from bars
 */
function extractValues(bars: readonly Bar[], field: PriceField): number[] {
  return bars.map((b) => b[field]);
}

/**
 * Simple Moving Average
 */
export function calculateSMA(bars: readonly Bar[], period: number, field: PriceField = 'close'): number[] {
  return SMA.calculate({
    period,
    values: extractValues(bars, field),
  });
}

/**
 * Exponential Moving Average
 */
export function calculateEMA(bars: readonly Bar[], period: number, field: PriceField = 'close'): number[] {
  return EMA.calculate({
    period,
    values: extractValues(bars, field),
  });
}

/**
 * Last two values of an indicator series, or null while it is warming up
 */
export function lastPair(values: readonly number[]): [previous: number, current: number] | null {
  const previous = values[values.length - 2];
  const current = values[values.length - 1];
  if (previous === undefined || current === undefined) {
    return null;
  }
  return [previous, current];
}
