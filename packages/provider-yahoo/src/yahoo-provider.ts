/**
 * @fileoverview Yahoo Finance series provider.
 *
 * Fetches the instrument on the fast and slow timeframes plus the yield and
 * dollar-index series on the fast timeframe, in parallel, and assembles them
 * into one MarketSnapshot. Every failure surfaces as DataUnavailableError.
 *
 * @module @xau-signal/provider-yahoo
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import { DataUnavailableError, Timeframe, timeframeToMs } from '@xau-signal/contracts';
import type {
  Bar,
  MarketSnapshot,
  SeriesProvider,
  SeriesWindow,
  SnapshotRequest,
} from '@xau-signal/contracts';
import type { Logger } from '@xau-signal/logger';
import { clipBars, parseChartResponse, toMacroSeries } from './parser.js';
import type { YahooProviderOptions, YahooSymbols } from './types.js';

export const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

export const DEFAULT_SYMBOLS: Readonly<YahooSymbols> = Object.freeze({
  instrument: 'GC=F',
  yields: '^TNX',
  volatility: 'DX-Y.NYB',
});

const DEFAULT_TIMEOUT_MS = 10_000;

/** Covers a weekend close plus a holiday */
const MARKET_CLOSURE_MS = 4 * 24 * 60 * 60 * 1000;

const YAHOO_INTERVALS: Partial<Record<Timeframe, string>> = {
  [Timeframe.M1]: '1m',
  [Timeframe.M5]: '5m',
  [Timeframe.M15]: '15m',
  [Timeframe.H1]: '60m',
  [Timeframe.D1]: '1d',
};

/**
 * Yahoo Finance chart API provider.
 *
 * @example
 * ```typescript
 * const provider = new YahooSeriesProvider({ timeoutMs: 8000 });
 * const snapshot = await provider.fetchSnapshot({
 *   symbol: 'XAUUSD',
 *   asOf: new Date(),
 *   fast: { timeframe: Timeframe.M5, lookback: 300 },
 *   slow: { timeframe: Timeframe.H1, lookback: 300 },
 * });
 * ```
 */
export class YahooSeriesProvider implements SeriesProvider {
  readonly id = 'yahoo';

  private readonly http: AxiosInstance;
  private readonly symbols: YahooSymbols;
  private readonly logger?: Logger;

  constructor(options: YahooProviderOptions = {}) {
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl ?? YAHOO_CHART_URL,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      });
    this.symbols = { ...DEFAULT_SYMBOLS, ...options.symbols };
    this.logger = options.logger;
  }

  async fetchSnapshot(request: SnapshotRequest, signal?: AbortSignal): Promise<MarketSnapshot> {
    const { asOf } = request;
    const [fast, slow, yields, volatility] = await Promise.all([
      this.fetchBars(this.symbols.instrument, request.fast, asOf, signal),
      this.fetchBars(this.symbols.instrument, request.slow, asOf, signal),
      this.fetchBars(this.symbols.yields, request.fast, asOf, signal),
      this.fetchBars(this.symbols.volatility, request.fast, asOf, signal),
    ]);

    return {
      symbol: request.symbol,
      evaluatedAt: asOf.toISOString(),
      fast: { timeframe: request.fast.timeframe, bars: fast },
      slow: { timeframe: request.slow.timeframe, bars: slow },
      yields: toMacroSeries(this.symbols.yields, yields),
      volatility: toMacroSeries(this.symbols.volatility, volatility),
    };
  }

  /**
   * Fetches and clips one series.
   *
   * @throws {DataUnavailableError}
   */
  async fetchBars(
    symbol: string,
    window: SeriesWindow,
    asOf: Date,
    signal?: AbortSignal
  ): Promise<Bar[]> {
    const interval = YAHOO_INTERVALS[window.timeframe];
    if (!interval) {
      throw new DataUnavailableError(`Yahoo chart API has no ${window.timeframe} interval`, {
        provider: this.id,
        symbol,
        timeframe: window.timeframe,
      });
    }

    const span = timeframeToMs(window.timeframe) * window.lookback * 2 + MARKET_CLOSURE_MS;
    const params = {
      interval,
      period1: Math.floor((asOf.getTime() - span) / 1000),
      period2: Math.ceil(asOf.getTime() / 1000),
      includePrePost: false,
    };

    this.logger?.debug('Yahoo chart request', { provider: this.id, symbol, ...params });

    let body: unknown;
    try {
      const response = await this.http.get<unknown>(`/${encodeURIComponent(symbol)}`, {
        params,
        signal,
      });
      body = response.data;
    } catch (error) {
      throw toDataUnavailable(error, symbol);
    }

    const { bars, dropped } = parseChartResponse(body, symbol);
    if (dropped > 0) {
      this.logger?.debug('Dropped incomplete Yahoo rows', { provider: this.id, symbol, dropped });
    }

    return clipBars(bars, asOf, window.lookback);
  }
}

/**
 * Maps axios failures onto the error taxonomy.
 */
export function toDataUnavailable(error: unknown, symbol: string): DataUnavailableError {
  if (axios.isCancel(error)) {
    return new DataUnavailableError(`Yahoo chart request for ${symbol} was aborted`, {
      provider: 'yahoo',
      symbol,
      reason: 'aborted',
    });
  }

  if (error instanceof AxiosError) {
    if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
      return new DataUnavailableError(`Yahoo chart request for ${symbol} timed out`, {
        provider: 'yahoo',
        symbol,
        reason: 'timeout',
      });
    }

    return new DataUnavailableError(`Yahoo chart request for ${symbol} failed: ${error.message}`, {
      provider: 'yahoo',
      symbol,
      reason: 'http',
      status: error.response?.status,
      code: error.code,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new DataUnavailableError(`Yahoo chart request for ${symbol} failed: ${message}`, {
    provider: 'yahoo',
    symbol,
    reason: 'unknown',
  });
}
