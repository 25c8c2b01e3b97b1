/**
 * @fileoverview Price calculation utilities.
 * @module @xau-signal/signal-engine/utils/price-utils
 */

import type { Bar } from '@xau-signal/contracts';

export function mean(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * True Range of a bar against the previous close.
 */
export function trueRange(current: Bar, previous: Bar): number {
  const highLow = current.high - current.low;
  const highClose = Math.abs(current.high - previous.close);
  const lowClose = Math.abs(current.low - previous.close);
  return Math.max(highLow, highClose, lowClose);
}

export function highestHigh(bars: readonly Bar[]): number {
  return bars.reduce((max, bar) => Math.max(max, bar.high), Number.NEGATIVE_INFINITY);
}

export function lowestLow(bars: readonly Bar[]): number {
  return bars.reduce((min, bar) => Math.min(min, bar.low), Number.POSITIVE_INFINITY);
}

/**
 * Rounds half away from zero to `decimals` places.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
