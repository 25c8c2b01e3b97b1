/**
 * Chart response builders and an in-process axios adapter for provider tests.
 */

import axios from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface ChartRow {
  at: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume?: number | null;
}

export function chartBody(symbol: string, rows: ChartRow[]): unknown {
  return {
    chart: {
      result: [
        {
          meta: { symbol, currency: 'USD' },
          timestamp: rows.map((row) => Date.parse(row.at) / 1000),
          indicators: {
            quote: [
              {
                open: rows.map((row) => row.open),
                high: rows.map((row) => row.high),
                low: rows.map((row) => row.low),
                close: rows.map((row) => row.close),
                volume: rows.map((row) => row.volume ?? null),
              },
            ],
          },
        },
      ],
      error: null,
    },
  };
}

export function priceRow(at: string, close: number, volume: number | null = 100): ChartRow {
  return { at, open: close, high: close + 1, low: close - 1, close, volume };
}

export interface RecordedRequest {
  symbol: string;
  interval: string;
  period1: number;
  period2: number;
}

function numberParam(params: unknown, key: string): number {
  if (typeof params === 'object' && params !== null && key in params) {
    const value: unknown = Reflect.get(params, key);
    return typeof value === 'number' ? value : Number.NaN;
  }
  return Number.NaN;
}

function stringParam(params: unknown, key: string): string {
  if (typeof params === 'object' && params !== null && key in params) {
    const value: unknown = Reflect.get(params, key);
    return typeof value === 'string' ? value : '';
  }
  return '';
}

export function ok(config: InternalAxiosRequestConfig, data: unknown): AxiosResponse<unknown> {
  return { data, status: 200, statusText: 'OK', headers: {}, config };
}

/**
 * An axios instance whose adapter answers in process. `respond` gets the
 * decoded ticker and interval of each request.
 */
export function fakeHttp(
  respond: (
    symbol: string,
    interval: string,
    config: InternalAxiosRequestConfig
  ) => Promise<AxiosResponse<unknown>>
): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const http = axios.create({
    adapter: (config) => {
      const symbol = decodeURIComponent((config.url ?? '').replace(/^\//, ''));
      const params: unknown = config.params;
      const interval = stringParam(params, 'interval');
      requests.push({
        symbol,
        interval,
        period1: numberParam(params, 'period1'),
        period2: numberParam(params, 'period2'),
      });
      return respond(symbol, interval, config);
    },
  });

  return { http, requests };
}
