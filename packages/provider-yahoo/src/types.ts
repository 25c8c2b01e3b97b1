/**
 * @fileoverview Yahoo Finance provider-specific types.
 *
 * @module @xau-signal/provider-yahoo/types
 */

import type { AxiosInstance } from 'axios';
import type { Bar } from '@xau-signal/contracts';
import type { Logger } from '@xau-signal/logger';

/**
 * Yahoo tickers for the instrument and its macro inputs.
 */
export interface YahooSymbols {
  /** Gold futures by default */
  instrument: string;

  /** 10-year Treasury yield by default */
  yields: string;

  /** US dollar index by default */
  volatility: string;
}

/**
 * Options for YahooSeriesProvider configuration.
 */
export interface YahooProviderOptions {
  /**
   * Preconfigured axios instance. When given, `baseUrl` and `timeoutMs`
   * are ignored.
   */
  httpClient?: AxiosInstance;

  /** Defaults to https://query1.finance.yahoo.com/v8/finance/chart */
  baseUrl?: string;

  /** Per-request timeout in milliseconds (default 10000) */
  timeoutMs?: number;

  symbols?: Partial<YahooSymbols>;

  logger?: Logger;
}

/**
 * Bars parsed from one chart response.
 */
export interface ParsedChart {
  bars: Bar[];

  /** Rows skipped for null prices, inverted ranges or repeated timestamps */
  dropped: number;
}
