/**
 * @fileoverview RSI momentum oscillator.
 * @module @xau-signal/signal-engine/indicators/rsi
 */

import { determined, undetermined } from '@xau-signal/contracts';
import type { Bar, Reading, Ternary } from '@xau-signal/contracts';

export interface MomentumOptions {
  period: number;
  bullishAbove: number;
  bearishBelow: number;
}

/**
 * RSI in [0, 100] from the mean gain and mean loss of the last `period`
 * close-to-close changes. An all-gain window gives 100, a flat one 50.
 */
export function relativeStrength(bars: readonly Bar[], period: number = 14): Reading<number> {
  if (bars.length < period + 1) {
    return undetermined(`RSI(${period}) needs ${period + 1} bars, got ${bars.length}`);
  }

  let gains = 0;
  let losses = 0;
  for (let i = bars.length - period; i < bars.length; i++) {
    const current = bars[i];
    const previous = bars[i - 1];
    if (!current || !previous) continue;
    const change = current.close - previous.close;
    if (change > 0) gains += change;
    else losses -= change;
  }

  if (gains === 0 && losses === 0) return determined(50);
  if (losses === 0) return determined(100);

  const rs = gains / period / (losses / period);
  return determined(100 - 100 / (1 + rs));
}

/**
 * Direction an RSI value points in: +1 above the bullish line, -1 below the
 * bearish one, 0 in between.
 */
export function momentumSign(rsi: number, options: MomentumOptions): Ternary {
  if (rsi > options.bullishAbove) return 1;
  if (rsi < options.bearishBelow) return -1;
  return 0;
}
