/**
 * Pure reductions over samples. Edge cases are explicit: an empty sample is an
 * error, a single sample has zero spread.
 */

import { AggregationError } from '../errors.js';
import type { Moments } from '../types.js';

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new AggregationError('Cannot compute the mean of an empty sample');
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample (n - 1) standard deviation.
 */
export function sampleStdDev(values: readonly number[]): number {
  const m = mean(values);
  if (values.length === 1) return 0;
  const squares = values.reduce((sum, v) => sum + (v - m) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function moments(values: readonly number[]): Moments {
  return { mean: mean(values), stdDev: sampleStdDev(values) };
}
