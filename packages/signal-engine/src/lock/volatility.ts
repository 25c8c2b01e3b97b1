/**
 * @fileoverview Volatility shock detection on the currency-strength proxy.
 * @module @xau-signal/signal-engine/lock/volatility
 */

import { determined, undetermined, type MacroSeries, type Reading } from '@xau-signal/contracts';
import { mean } from '../utils/price-utils.js';

export interface VolatilityShockOptions {
  /** Points before the tested one that form its baseline */
  baselineWindow: number;
  /** Absolute deviation from the baseline that counts as a shock */
  maxDeviation: number;
  /** Earlier points whose shock still counts; 0 tests only the latest */
  cooldownBars: number;
}

export interface VolatilityShock {
  shocked: boolean;
  /** Deviation of the latest point from its baseline */
  deviation: number;
  /** Points back from the latest where the most recent shock sits, or null */
  shockAge: number | null;
}

function deviationAt(values: readonly number[], index: number, baselineWindow: number): number | null {
  const value = values[index];
  if (value === undefined || index < baselineWindow) return null;
  return Math.abs(value - mean(values.slice(index - baselineWindow, index)));
}

/**
 * Tests the latest point, then each of the `cooldownBars` points before it,
 * so a shock holds the lock for a while without state kept between cycles.
 */
export function detectVolatilityShock(
  series: MacroSeries,
  options: VolatilityShockOptions
): Reading<VolatilityShock> {
  const values = series.points.map((point) => point.value);
  const last = values.length - 1;
  const deviation = deviationAt(values, last, options.baselineWindow);

  if (deviation === null) {
    return undetermined(
      `${series.name} needs ${options.baselineWindow + 1} points, got ${values.length}`
    );
  }

  let shockAge: number | null = null;
  for (let age = 0; age <= options.cooldownBars; age++) {
    const past = deviationAt(values, last - age, options.baselineWindow);
    if (past === null) break;
    if (past > options.maxDeviation) {
      shockAge = age;
      break;
    }
  }

  return determined({ shocked: shockAge !== null, deviation, shockAge });
}
