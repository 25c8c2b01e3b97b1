/**
 * @fileoverview Public API for @xau-signal/provider-yahoo package.
 *
 * @module @xau-signal/provider-yahoo
 * @example
 * ```typescript
 * import { YahooSeriesProvider } from '@xau-signal/provider-yahoo';
 * import { Timeframe } from '@xau-signal/contracts';
 *
 * const provider = new YahooSeriesProvider();
 * const snapshot = await provider.fetchSnapshot({
 *   symbol: 'XAUUSD',
 *   asOf: new Date(),
 *   fast: { timeframe: Timeframe.M5, lookback: 300 },
 *   slow: { timeframe: Timeframe.H1, lookback: 300 },
 * });
 * ```
 */

export {
  YahooSeriesProvider,
  DEFAULT_SYMBOLS,
  YAHOO_CHART_URL,
  toDataUnavailable,
} from './yahoo-provider.js';

export { parseChartResponse, chartResponseSchema, toMacroSeries, clipBars } from './parser.js';
export type { YahooChartResponse } from './parser.js';

export type { YahooProviderOptions, YahooSymbols, ParsedChart } from './types.js';
