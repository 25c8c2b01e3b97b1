/**
 * @fileoverview Stop-loss and take-profit levels.
 *
 * The stop sits a multiple of ATR beyond the recent swing extreme on the
 * losing side; the target sits `riskReward` times that risk on the winning
 * side. Both are whole ticks of `pricePrecision`, rounded away from entry,
 * and the reported reward is never below `riskReward` times the reported risk.
 *
 * @module @xau-signal/signal-engine/report/levels
 */

import type { Bar, Bias, Reading } from '@xau-signal/contracts';
import { highestHigh, lowestLow } from '../utils/price-utils.js';

export interface LevelOptions {
  /** Fast bars searched for the swing extreme */
  swingLookback: number;
  stopAtrMultiple: number;
  riskReward: number;
  pricePrecision: number;
}

export interface PriceLevels {
  entry: number;
  stopLoss: number;
  takeProfit: number;
  /** |entry - stopLoss| */
  riskAmount: number;
  /** |takeProfit - entry| */
  rewardAmount: number;
}

/**
 * Levels for the bias side, or null when the bias is neutral, ATR is
 * undetermined or the stop would not sit beyond the entry.
 *
 * @example
 * ```typescript
 * const levels = calculatePriceLevels(bars, 'BUY', atr, {
 *   swingLookback: 10,
 *   stopAtrMultiple: 1.5,
 *   riskReward: 2,
 *   pricePrecision: 2,
 * });
 * ```
 */
export function calculatePriceLevels(
  bars: readonly Bar[],
  bias: Bias,
  atr: Reading<number>,
  options: LevelOptions
): PriceLevels | null {
  const last = bars[bars.length - 1];
  if (bias === 'NEUTRAL' || !atr.determined || !last) {
    return null;
  }

  const entry = last.close;
  const swing = bars.slice(-options.swingLookback);
  const buffer = options.stopAtrMultiple * atr.value;
  const factor = 10 ** options.pricePrecision;
  const side = bias === 'BUY' ? 1 : -1;

  // Stop in whole ticks beyond the swing extreme
  const stopTicks =
    side > 0
      ? Math.floor((lowestLow(swing) - buffer) * factor)
      : Math.ceil((highestHigh(swing) + buffer) * factor);
  const stopLoss = stopTicks / factor;
  const riskAmount = (entry - stopLoss) * side;
  if (!(riskAmount > 0)) return null;

  const target = options.riskReward * riskAmount;
  let targetTicks =
    side > 0 ? Math.ceil((entry + target) * factor) : Math.floor((entry - target) * factor);
  let takeProfit = targetTicks / factor;
  // Converting back from ticks can land a hair short of the target distance
  while ((takeProfit - entry) * side < target) {
    targetTicks += side;
    takeProfit = targetTicks / factor;
  }

  return { entry, stopLoss, takeProfit, riskAmount, rewardAmount: (takeProfit - entry) * side };
}
