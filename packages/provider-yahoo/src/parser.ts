/**
 * @fileoverview Parser for Yahoo Finance chart responses.
 *
 * Validates the response shape with zod and converts the column-oriented
 * quote arrays into Bar rows. Rows with a null price are dropped, as Yahoo
 * emits them for minutes without trades.
 *
 * @module @xau-signal/provider-yahoo/parser
 */

import { z } from 'zod';
import { DataUnavailableError } from '@xau-signal/contracts';
import type { Bar, MacroSeries } from '@xau-signal/contracts';
import type { ParsedChart } from './types.js';

const column = z.array(z.number().nullable());

const quoteSchema = z.object({
  open: column.optional(),
  high: column.optional(),
  low: column.optional(),
  close: column.optional(),
  volume: column.optional(),
});

const chartResultSchema = z.object({
  meta: z.object({ symbol: z.string().optional() }).passthrough().optional(),
  /** Absent when the range holds no bars */
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({ quote: z.array(quoteSchema) }),
});

export const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(chartResultSchema).nullable().optional(),
    error: z
      .object({ code: z.string().optional(), description: z.string().optional() })
      .nullable()
      .optional(),
  }),
});

export type YahooChartResponse = z.infer<typeof chartResponseSchema>;

/**
 * Parses a raw chart response body into bars.
 *
 * @throws {DataUnavailableError} When the body is malformed or reports an error
 *
 * @example
 * ```typescript
 * const { bars, dropped } = parseChartResponse(response.data, 'GC=F');
 * ```
 */
export function parseChartResponse(body: unknown, symbol: string): ParsedChart {
  const parsed = chartResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new DataUnavailableError(`Yahoo chart response for ${symbol} is malformed`, {
      provider: 'yahoo',
      symbol,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const { chart } = parsed.data;
  if (chart.error) {
    throw new DataUnavailableError(
      `Yahoo chart error for ${symbol}: ${chart.error.description ?? chart.error.code ?? 'unknown'}`,
      { provider: 'yahoo', symbol, code: chart.error.code }
    );
  }

  const result = chart.result?.[0];
  if (!result) {
    throw new DataUnavailableError(`Yahoo chart response for ${symbol} has no result`, {
      provider: 'yahoo',
      symbol,
    });
  }

  const timestamps = result.timestamp ?? [];
  const quote = result.indicators.quote[0];
  if (!quote) {
    return { bars: [], dropped: timestamps.length };
  }

  const bars: Bar[] = [];
  let dropped = 0;
  let previous = Number.NEGATIVE_INFINITY;

  for (const [i, seconds] of timestamps.entries()) {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];
    const volume = quote.volume?.[i];

    if (open == null || high == null || low == null || close == null) {
      dropped++;
      continue;
    }

    // Yahoo repeats the live bar at the end of intraday ranges
    if (seconds <= previous || high < low) {
      dropped++;
      continue;
    }
    previous = seconds;

    const timestamp = new Date(seconds * 1000).toISOString();
    bars.push(
      volume == null
        ? { timestamp, open, high, low, close }
        : { timestamp, open, high, low, close, volume }
    );
  }

  return { bars, dropped };
}

/**
 * Closing values of `bars` as a macro series.
 */
export function toMacroSeries(name: string, bars: readonly Bar[]): MacroSeries {
  return {
    name,
    points: bars.map((bar) => ({ timestamp: bar.timestamp, value: bar.close })),
  };
}

/**
 * Keeps bars opening at or before `asOf`, newest `lookback` of them.
 */
export function clipBars(bars: readonly Bar[], asOf: Date, lookback: number): Bar[] {
  const cutoff = asOf.getTime();
  const eligible = bars.filter((bar) => Date.parse(bar.timestamp) <= cutoff);
  return eligible.slice(Math.max(0, eligible.length - lookback));
}
