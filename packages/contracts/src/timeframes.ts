/**
 * @fileoverview Timeframe enumeration and bar durations.
 *
 * Defines the canonical bar timeframes the engine consumes. Values are the
 * interval strings used by the chart providers ('5m', '1h', ...).
 *
 * @module @xau-signal/contracts/timeframes
 */

/**
 * Supported timeframes for market data and analysis.
 *
 * @invariant Members are ordered from smallest to largest duration
 */
export enum Timeframe {
  /** 1-minute bars */
  M1 = '1m',
  /** 5-minute bars - default fast timeframe */
  M5 = '5m',
  /** 15-minute bars */
  M15 = '15m',
  /** 1-hour bars - default slow timeframe */
  H1 = '1h',
  /** 4-hour bars */
  H4 = '4h',
  /** Daily bars */
  D1 = '1d',
}

const MINUTE_MS = 60 * 1000;

/**
 * @internal
 */
const TIMEFRAME_MS: Record<Timeframe, number> = {
  [Timeframe.M1]: MINUTE_MS,
  [Timeframe.M5]: 5 * MINUTE_MS,
  [Timeframe.M15]: 15 * MINUTE_MS,
  [Timeframe.H1]: 60 * MINUTE_MS,
  [Timeframe.H4]: 240 * MINUTE_MS,
  [Timeframe.D1]: 1440 * MINUTE_MS,
};

/**
 * Duration of one bar in milliseconds.
 *
 * @example
 * ```typescript
 * timeframeToMs(Timeframe.M5)  // 300000
 * ```
 */
export function timeframeToMs(timeframe: Timeframe): number {
  return TIMEFRAME_MS[timeframe];
}
