/**
 * @fileoverview Series provider contract.
 *
 * A provider assembles one MarketSnapshot from its upstream source. The
 * application owns timeouts and cancellation and passes them in as an
 * AbortSignal.
 *
 * @module @xau-signal/contracts/provider
 */

import type { MarketSnapshot } from './market.js';
import type { Timeframe } from './timeframes.js';

/**
 * What to fetch for one evaluation cycle.
 *
 * @example
 * ```typescript
 * const request: SnapshotRequest = {
 *   symbol: 'XAUUSD',
 *   asOf: new Date(),
 *   fast: { timeframe: Timeframe.M5, lookback: 300 },
 *   slow: { timeframe: Timeframe.H1, lookback: 300 }
 * };
 * ```
 */
export interface SnapshotRequest {
  /** Instrument identifier reported back on the snapshot */
  symbol: string;

  /** Evaluation instant; bars opening after it are dropped */
  asOf: Date;

  fast: SeriesWindow;
  slow: SeriesWindow;
}

export interface SeriesWindow {
  timeframe: Timeframe;
  /** Bars to keep, newest last */
  lookback: number;
}

/**
 * Source of market snapshots.
 *
 * @throws {DataUnavailableError} From fetchSnapshot when the upstream fails,
 * times out or is aborted
 */
export interface SeriesProvider {
  /** Short identifier used in logs (e.g. 'yahoo', 'fixture') */
  readonly id: string;

  fetchSnapshot(request: SnapshotRequest, signal?: AbortSignal): Promise<MarketSnapshot>;
}
