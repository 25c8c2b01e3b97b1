/**
 * @fileoverview Yield bias analyzer.
 *
 * Gold tends to move against real yields. Over the same window, compares the
 * direction of price with the direction of the yield series aligned to the
 * window's first and last bars.
 *
 * @module @xau-signal/signal-engine/yield/yield-bias
 */

import { determined, toTernary, undetermined } from '@xau-signal/contracts';
import type { Bar, Bias, MacroPoint, MacroSeries, Reading, Ternary } from '@xau-signal/contracts';

export interface YieldBiasOptions {
  /** Fast bars the price change is measured over */
  window: number;
  /** Oldest a yield point may be relative to the bar it is aligned to */
  maxStalenessMs: number;
}

export interface YieldBias {
  /** +1 yields confirm the bias, -1 they move with price, 0 otherwise */
  support: Ternary;
  priceDirection: Ternary;
  yieldDirection: Ternary;
}

/**
 * Value of the latest point at or before `time`, or null when there is none
 * or it is older than `maxStalenessMs`.
 */
export function alignNearestPreceding(
  points: readonly MacroPoint[],
  time: number,
  maxStalenessMs: number
): number | null {
  let low = 0;
  let high = points.length - 1;
  let found: MacroPoint | undefined;

  while (low <= high) {
    const mid = (low + high) >> 1;
    const point = points[mid];
    if (!point) break;
    if (Date.parse(point.timestamp) <= time) {
      found = point;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  if (!found || time - Date.parse(found.timestamp) > maxStalenessMs) {
    return null;
  }
  return found.value;
}

/**
 * Never changes the bias; only tells the scorer whether yields back it.
 *
 * @example
 * ```typescript
 * const yieldBias = analyzeYieldBias(snapshot.fast.bars, snapshot.yields, 'BUY', {
 *   window: 12,
 *   maxStalenessMs: 2 * 60 * 60 * 1000,
 * });
 * ```
 */
export function analyzeYieldBias(
  bars: readonly Bar[],
  yields: MacroSeries,
  bias: Bias,
  options: YieldBiasOptions
): Reading<YieldBias> {
  const end = bars[bars.length - 1];
  const start = bars[bars.length - 1 - options.window];
  if (!end || !start) {
    return undetermined(`yield bias needs ${options.window + 1} bars, got ${bars.length}`);
  }

  const yieldStart = alignNearestPreceding(
    yields.points,
    Date.parse(start.timestamp),
    options.maxStalenessMs
  );
  const yieldEnd = alignNearestPreceding(
    yields.points,
    Date.parse(end.timestamp),
    options.maxStalenessMs
  );
  if (yieldStart === null || yieldEnd === null) {
    return undetermined(`${yields.name} does not align with the price window`);
  }

  const priceDirection = toTernary(end.close - start.close);
  const yieldDirection = toTernary(yieldEnd - yieldStart);
  const biasDirection: Ternary = bias === 'BUY' ? 1 : bias === 'SELL' ? -1 : 0;

  let support: Ternary = 0;
  if (biasDirection !== 0 && priceDirection !== 0 && yieldDirection !== 0) {
    if (yieldDirection === priceDirection) {
      support = -1;
    } else if (priceDirection === biasDirection) {
      support = 1;
    }
  }

  return determined({ support, priceDirection, yieldDirection });
}
