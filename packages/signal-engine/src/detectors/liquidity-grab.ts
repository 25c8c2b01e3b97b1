/**
 * @fileoverview Liquidity grab (stop-hunt) detection.
 *
 * The current bar runs past the extreme of the preceding `lookback` bars by
 * more than a small ATR-scaled margin, then closes back inside it. Sweeping
 * the highs and closing below them is a bearish stop-run; sweeping the lows
 * and closing above them is a bullish one.
 *
 * @module @xau-signal/signal-engine/detectors/liquidity-grab
 */

import { determined, undetermined } from '@xau-signal/contracts';
import type { Bar, Reading, Ternary } from '@xau-signal/contracts';
import { averageTrueRange } from '../indicators/atr.js';
import { highestHigh, lowestLow } from '../utils/price-utils.js';

export interface LiquidityGrabOptions {
  /** Prior bars, excluding the current one, that define the extremes */
  lookback: number;
  /** Sweep margin as a multiple of ATR */
  sweepMarginAtr: number;
  atrPeriod: number;
}

export interface LiquidityGrab {
  /** +1 bullish stop-run, -1 bearish stop-run, 0 none */
  direction: Ternary;
  priorHigh: number;
  priorLow: number;
  /** Price distance the sweep had to clear */
  margin: number;
}

/**
 * @example
 * ```typescript
 * const grab = detectLiquidityGrab(snapshot.fast.bars, {
 *   lookback: 15,
 *   sweepMarginAtr: 0.1,
 *   atrPeriod: 14,
 * });
 * if (grab.determined && grab.value.direction === 1) {
 *   // lows swept and reclaimed
 * }
 * ```
 */
export function detectLiquidityGrab(
  bars: readonly Bar[],
  options: LiquidityGrabOptions
): Reading<LiquidityGrab> {
  const current = bars[bars.length - 1];
  if (bars.length < options.lookback + 1 || !current) {
    return undetermined(
      `liquidity grab needs ${options.lookback + 1} bars, got ${bars.length}`
    );
  }

  const prior = bars.slice(bars.length - 1 - options.lookback, bars.length - 1);
  const priorHigh = highestHigh(prior);
  const priorLow = lowestLow(prior);

  // Margin shrinks to zero while ATR lacks history
  const atr = averageTrueRange(bars, options.atrPeriod);
  const margin = atr.determined ? options.sweepMarginAtr * atr.value : 0;

  const bearishSweep = current.high > priorHigh + margin && current.close < priorHigh;
  const bullishSweep = current.low < priorLow - margin && current.close > priorLow;

  let direction: Ternary = 0;
  if (bearishSweep && !bullishSweep) direction = -1;
  else if (bullishSweep && !bearishSweep) direction = 1;

  return determined({ direction, priorHigh, priorLow, margin });
}
