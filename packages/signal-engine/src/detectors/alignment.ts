/**
 * @fileoverview Multi-timeframe trend alignment.
 * @module @xau-signal/signal-engine/detectors/alignment
 */

import type { Reading, Ternary, TrendDirection } from '@xau-signal/contracts';

/**
 * +1 when both timeframes are bullish, -1 when both are bearish, 0 otherwise
 * (including when either trend is undetermined).
 */
export function detectTimeframeAlignment(
  fast: Reading<TrendDirection>,
  slow: Reading<TrendDirection>
): Ternary {
  if (!fast.determined || !slow.determined || fast.value !== slow.value) {
    return 0;
  }
  if (fast.value === 'BULLISH') return 1;
  if (fast.value === 'BEARISH') return -1;
  return 0;
}
