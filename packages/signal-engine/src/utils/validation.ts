/**
 * @fileoverview Input validation utilities.
 *
 * Validators report problems as error values instead of throwing, so a bad
 * series degrades one cycle rather than crashing the caller.
 *
 * @module @xau-signal/signal-engine/utils/validation
 */

import { MisalignedSeriesError } from '@xau-signal/contracts';
import type { Bar, MacroSeries, TimeframeSeries } from '@xau-signal/contracts';

/**
 * Validate a single bar. Returns a description of the first problem, or null.
 */
export function validateBar(bar: Bar): string | null {
  const values = [bar.open, bar.high, bar.low, bar.close];
  if (!values.every((value) => Number.isFinite(value))) {
    return 'OHLC values must be finite numbers';
  }

  if (bar.high < bar.low) {
    return 'high must be >= low';
  }

  if (bar.volume !== undefined && !(bar.volume >= 0)) {
    return 'volume cannot be negative';
  }

  return null;
}

/**
 * Check bars for valid values and strictly increasing timestamps.
 *
 * @example
 * ```typescript
 * const problem = validateSeries(snapshot.fast, 'fast');
 * if (problem) return degradedReport(snapshot.symbol, snapshot.evaluatedAt, problem.message);
 * ```
 */
export function validateSeries(
  series: TimeframeSeries,
  name: string
): MisalignedSeriesError | null {
  let previous = Number.NEGATIVE_INFINITY;

  for (const [index, bar] of series.bars.entries()) {
    const time = Date.parse(bar.timestamp);
    if (Number.isNaN(time)) {
      return new MisalignedSeriesError(`${name}: bar ${index} has an invalid timestamp`, {
        series: name,
        index,
      });
    }

    if (time <= previous) {
      return new MisalignedSeriesError(`${name}: timestamps must be strictly increasing`, {
        series: name,
        index,
      });
    }
    previous = time;

    const problem = validateBar(bar);
    if (problem) {
      return new MisalignedSeriesError(`${name}: bar ${index} ${problem}`, { series: name, index });
    }
  }

  return null;
}

/**
 * Check a macro series for finite values and strictly increasing timestamps.
 */
export function validateMacroSeries(series: MacroSeries): MisalignedSeriesError | null {
  let previous = Number.NEGATIVE_INFINITY;

  for (const [index, point] of series.points.entries()) {
    const time = Date.parse(point.timestamp);
    if (Number.isNaN(time) || time <= previous || !Number.isFinite(point.value)) {
      return new MisalignedSeriesError(`${series.name}: point ${index} is out of order or invalid`, {
        series: series.name,
        index,
      });
    }
    previous = time;
  }

  return null;
}
