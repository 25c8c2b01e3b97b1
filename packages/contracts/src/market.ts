/**
 * @fileoverview Market data types consumed by the signal engine.
 *
 * Provider-agnostic shapes for OHLC bars, per-timeframe series, macro series
 * (bond yield, dollar index) and the scheduled news calendar. All types are
 * pure data with no I/O.
 *
 * @module @xau-signal/contracts/market
 */

import type { Timeframe } from './timeframes.js';

/**
 * A single OHLC bar with optional volume.
 *
 * @invariant high >= low
 * @invariant timestamp is a valid ISO 8601 string (UTC)
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   timestamp: '2025-03-10T14:05:00.000Z',
 *   open: 2911.4,
 *   high: 2913.9,
 *   low: 2910.8,
 *   close: 2913.1,
 *   volume: 1840
 * };
 * ```
 */
export interface Bar {
  /** ISO 8601 timestamp of bar open (UTC) */
  readonly timestamp: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  /** Traded volume; absent for instruments whose feed carries none */
  readonly volume?: number;
}

/**
 * Ordered bars for one timeframe.
 *
 * @invariant timestamps strictly increasing, no duplicates
 */
export interface TimeframeSeries {
  readonly timeframe: Timeframe;
  readonly bars: readonly Bar[];
}

/**
 * One observation of a macro series.
 */
export interface MacroPoint {
  /** ISO 8601 timestamp (UTC) */
  readonly timestamp: string;
  readonly value: number;
}

/**
 * Ordered observations of a macro series such as the 10-year yield or the
 * dollar index.
 *
 * @invariant timestamps strictly increasing
 */
export interface MacroSeries {
  /** Series identifier (e.g. '^TNX', 'DX-Y.NYB') */
  readonly name: string;
  readonly points: readonly MacroPoint[];
}

export type NewsImpact = 'high' | 'medium' | 'low';

/**
 * A scheduled economic release.
 */
export interface NewsEvent {
  /** ISO 8601 release time (UTC) */
  readonly timestamp: string;
  readonly impact: NewsImpact;
  readonly title?: string;
}

/**
 * Everything one evaluation cycle needs, captured at a single instant.
 *
 * @invariant evaluatedAt >= timestamp of the last bar in each series
 */
export interface MarketSnapshot {
  /** Instrument identifier (e.g. 'XAUUSD') */
  readonly symbol: string;
  /** Evaluation instant (ISO 8601 UTC); the engine never reads the clock */
  readonly evaluatedAt: string;
  /** Fast timeframe bars (default 5m) */
  readonly fast: TimeframeSeries;
  /** Slow timeframe bars (default 1h) */
  readonly slow: TimeframeSeries;
  /** Sovereign bond yield series */
  readonly yields: MacroSeries;
  /** Currency-strength index used as the volatility proxy */
  readonly volatility: MacroSeries;
  /** Optional news calendar; when absent the news trigger stays inactive */
  readonly calendar?: readonly NewsEvent[];
}

/**
 * Result of an indicator that may lack the history it needs.
 *
 * @example
 * ```typescript
 * const atr: Reading<number> = { determined: false, reason: 'needs 15 bars, got 9' };
 * ```
 */
export type Reading<T> =
  | { readonly determined: true; readonly value: T }
  | { readonly determined: false; readonly reason: string };

/**
 * Builds a determined reading.
 */
export function determined<T>(value: T): Reading<T> {
  return { determined: true, value };
}

/**
 * Builds an undetermined reading.
 */
export function undetermined<T>(reason: string): Reading<T> {
  return { determined: false, reason };
}

/**
 * Unwraps a reading, falling back when undetermined.
 */
export function readingOr<T>(reading: Reading<T>, fallback: T): T {
  return reading.determined ? reading.value : fallback;
}
