/**
 * @fileoverview Trend direction from the close against a long moving average.
 * @module @xau-signal/signal-engine/indicators/trend
 */

import { determined, undetermined } from '@xau-signal/contracts';
import type { Bar, Reading, TrendDirection } from '@xau-signal/contracts';
import { movingAverage, type MovingAverageKind } from './moving-average.js';

export interface TrendOptions {
  period: number;
  maType: MovingAverageKind;
}

/** Relative distance under which close and average count as equal */
const FLAT_TOLERANCE = 1e-9;

/**
 * Sign of (last close - MA(period)).
 *
 * @example
 * ```typescript
 * const trend = trendDirection(snapshot.slow.bars, { period: 200, maType: 'sma' });
 * if (trend.determined) console.log(trend.value); // 'BULLISH'
 * ```
 */
export function trendDirection(
  bars: readonly Bar[],
  options: TrendOptions
): Reading<TrendDirection> {
  const last = bars[bars.length - 1];
  if (bars.length < options.period || !last) {
    return undetermined(`trend needs ${options.period} bars, got ${bars.length}`);
  }

  const average = movingAverage(
    bars.map((bar) => bar.close),
    options.period,
    options.maType
  );
  if (!average.determined) {
    return average;
  }

  const diff = last.close - average.value;
  if (Math.abs(diff) <= FLAT_TOLERANCE * Math.max(1, Math.abs(average.value))) {
    return determined('NEUTRAL');
  }
  return determined(diff > 0 ? 'BULLISH' : 'BEARISH');
}

/**
 * The trend the engine trades with: the slow trend when it points somewhere,
 * otherwise the fast trend.
 */
export function prevailingTrend(
  fast: Reading<TrendDirection>,
  slow: Reading<TrendDirection>
): Reading<TrendDirection> {
  if (slow.determined && slow.value !== 'NEUTRAL') return slow;
  if (fast.determined) return fast;
  return slow;
}
