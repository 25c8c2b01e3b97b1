/**
 * @fileoverview Simple and exponential moving averages.
 * @module @xau-signal/signal-engine/indicators/moving-average
 */

import { determined, undetermined, type Reading } from '@xau-signal/contracts';
import { mean } from '../utils/price-utils.js';

export type MovingAverageKind = 'sma' | 'ema';

/**
 * Mean of the last `period` values.
 */
export function simpleMovingAverage(values: readonly number[], period: number): Reading<number> {
  if (values.length < period) {
    return undetermined(`SMA(${period}) needs ${period} values, got ${values.length}`);
  }
  return determined(mean(values.slice(values.length - period)));
}

/**
 * EMA with smoothing 2 / (period + 1), seeded with the first value and run
 * over the whole series.
 */
export function exponentialMovingAverage(
  values: readonly number[],
  period: number
): Reading<number> {
  const first = values[0];
  if (values.length < period || first === undefined) {
    return undetermined(`EMA(${period}) needs ${period} values, got ${values.length}`);
  }

  const alpha = 2 / (period + 1);
  let ema = first;
  for (let i = 1; i < values.length; i++) {
    const value = values[i];
    if (value === undefined) continue;
    ema = alpha * value + (1 - alpha) * ema;
  }

  return determined(ema);
}

export function movingAverage(
  values: readonly number[],
  period: number,
  kind: MovingAverageKind = 'sma'
): Reading<number> {
  return kind === 'ema'
    ? exponentialMovingAverage(values, period)
    : simpleMovingAverage(values, period);
}
