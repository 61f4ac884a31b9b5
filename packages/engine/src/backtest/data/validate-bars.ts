/**
 * Bar sequence validation
 *
 * The engine refuses to start on bad input rather than simulate on it.
 */

import { BarSchema, type Bar } from '@barsim/shared';
import { InvalidInputError } from '../../errors.js';

/**
 * Validate a bar sequence and return frozen copies.
 *
 * Checks every bar against BarSchema (fields present, finite, positive
 * prices, high >= low) and that timestamps strictly increase.
 */
export function validateBars(bars: readonly unknown[]): readonly Bar[] {
  if (bars.length === 0) {
    throw new InvalidInputError('Bar sequence is empty');
  }

  const validated: Bar[] = [];

  for (let i = 0; i < bars.length; i++) {
    const result = BarSchema.safeParse(bars[i]);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new InvalidInputError(
        `Invalid bar at index ${i}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown error'}`,
        { index: i, issues: result.error.issues }
      );
    }

    const bar = result.data;
    const previous = validated[i - 1];
    if (previous && bar.timestamp <= previous.timestamp) {
      throw new InvalidInputError(
        `Bars must be strictly ordered by timestamp: index ${i} (${bar.timestamp}) follows ${previous.timestamp}`,
        { index: i, timestamp: bar.timestamp, previousTimestamp: previous.timestamp }
      );
    }

    validated.push(Object.freeze({ ...bar }));
  }

  return Object.freeze(validated);
}
