/**
 * @fileoverview Average True Range.
 * @module @xau-signal/signal-engine/indicators/atr
 */

import { determined, undetermined, type Bar, type Reading } from '@xau-signal/contracts';
import { trueRange } from '../utils/price-utils.js';

/**
 * Mean True Range over the last `period` bars. Each true range needs the
 * previous close, so `period + 1` bars are required.
 */
export function averageTrueRange(bars: readonly Bar[], period: number = 14): Reading<number> {
  if (bars.length < period + 1) {
    return undetermined(`ATR(${period}) needs ${period + 1} bars, got ${bars.length}`);
  }

  let sum = 0;
  for (let i = bars.length - period; i < bars.length; i++) {
    const current = bars[i];
    const previous = bars[i - 1];
    if (!current || !previous) continue;
    sum += trueRange(current, previous);
  }

  return determined(sum / period);
}
