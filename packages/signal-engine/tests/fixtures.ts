/**
 * Deterministic bar and snapshot builders shared by the engine tests.
 */

import { Timeframe } from '@xau-signal/contracts';
import type {
  Bar,
  FactorSet,
  MacroSeries,
  MarketSnapshot,
  TimeframeSeries,
} from '@xau-signal/contracts';

export const FIVE_MINUTES = 5 * 60 * 1000;
export const HOUR = 60 * 60 * 1000;

export interface TrendingOptions {
  start: number;
  stepMs?: number;
  first?: number;
  /** Close-to-close change per bar */
  step?: number;
  /** Wick beyond the body on each side */
  spread?: number;
  volume?: number;
}

/**
 * Bars whose close moves by `step` each bar; each bar opens at the previous
 * close, so every true range is |step| + 2 * spread.
 */
export function trendingBars(count: number, options: TrendingOptions): Bar[] {
  const { start, stepMs = FIVE_MINUTES, first = 2000, step = 0.5, spread = 0.25, volume = 1000 } =
    options;
  const bars: Bar[] = [];
  let previousClose = first - step;

  for (let i = 0; i < count; i++) {
    const close = first + step * i;
    const open = previousClose;
    bars.push({
      timestamp: new Date(start + i * stepMs).toISOString(),
      open,
      high: Math.max(open, close) + spread,
      low: Math.min(open, close) - spread,
      close,
      volume,
    });
    previousClose = close;
  }

  return bars;
}

/**
 * Bars with open = close = price and a one-point range.
 */
export function flatBars(count: number, price: number, start: number, stepMs = FIVE_MINUTES): Bar[] {
  return Array.from({ length: count }, (_, i) => ({
    timestamp: new Date(start + i * stepMs).toISOString(),
    open: price,
    high: price + 0.5,
    low: price - 0.5,
    close: price,
    volume: 1000,
  }));
}

/**
 * Appends a bar one interval after the last one.
 */
export function withBar(
  bars: readonly Bar[],
  bar: Omit<Bar, 'timestamp'>,
  stepMs = FIVE_MINUTES
): Bar[] {
  const last = bars[bars.length - 1];
  const time = last ? Date.parse(last.timestamp) + stepMs : 0;
  return [...bars, { ...bar, timestamp: new Date(time).toISOString() }];
}

/**
 * One macro point per bar timestamp, value from `valueAt(index)`.
 */
export function macroSeries(
  name: string,
  bars: readonly Bar[],
  valueAt: (index: number) => number
): MacroSeries {
  return {
    name,
    points: bars.map((bar, i) => ({ timestamp: bar.timestamp, value: valueAt(i) })),
  };
}

export function series(timeframe: Timeframe, bars: Bar[]): TimeframeSeries {
  return { timeframe, bars };
}

const BULLISH_FAST_START = Date.UTC(2025, 2, 10, 0, 0);

/**
 * Fast and slow uptrends, a volume-spike expansion bar in the trend's
 * direction, yields falling and a calm dollar index. Last fast bar opens at
 * 18:20 UTC; evaluated at 18:25 (New York session).
 */
export function bullishSnapshot(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  const trend = trendingBars(220, { start: BULLISH_FAST_START });
  const last = trend[trend.length - 1];
  const open = last ? last.close : 2000;
  const fast = withBar(trend, {
    open,
    high: open + 3 + 0.25,
    low: open - 0.25,
    close: open + 3,
    volume: 2000,
  });

  return {
    symbol: 'XAUUSD',
    evaluatedAt: '2025-03-10T18:25:00.000Z',
    fast: series(Timeframe.M5, fast),
    slow: series(
      Timeframe.H1,
      trendingBars(210, { start: Date.UTC(2025, 2, 1, 0, 0), stepMs: HOUR, first: 1950 })
    ),
    yields: macroSeries('^TNX', fast, (i) => 4.5 - 0.001 * i),
    volatility: macroSeries('DX-Y.NYB', fast.slice(-30), () => 104),
    ...overrides,
  };
}

/**
 * Mirror of `bullishSnapshot`: both trends fall, the last bar is a
 * volume-spike expansion down and yields rise.
 */
export function bearishSnapshot(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  const trend = trendingBars(220, { start: BULLISH_FAST_START, step: -0.5 });
  const last = trend[trend.length - 1];
  const open = last ? last.close : 2000;
  const fast = withBar(trend, {
    open,
    high: open + 0.25,
    low: open - 3 - 0.25,
    close: open - 3,
    volume: 2000,
  });

  return {
    symbol: 'XAUUSD',
    evaluatedAt: '2025-03-10T18:25:00.000Z',
    fast: series(Timeframe.M5, fast),
    slow: series(
      Timeframe.H1,
      trendingBars(210, { start: Date.UTC(2025, 2, 1, 0, 0), stepMs: HOUR, first: 2050, step: -0.5 })
    ),
    yields: macroSeries('^TNX', fast, (i) => 4.5 + 0.001 * i),
    volatility: macroSeries('DX-Y.NYB', fast.slice(-30), () => 104),
    ...overrides,
  };
}

const RANGE_START = Date.UTC(2025, 2, 10, 8, 0);

/**
 * 30 flat fast bars (08:00-10:25 UTC) with short histories, so neither
 * trend is determined. `lastBar` replaces the final flat bar.
 */
export function rangeSnapshot(lastBar?: Omit<Bar, 'timestamp'>): MarketSnapshot {
  const flat = flatBars(29, 2000, RANGE_START);
  const fast = withBar(flat, lastBar ?? { open: 2000, high: 2000.5, low: 1999.5, close: 2000, volume: 1000 });

  return {
    symbol: 'XAUUSD',
    evaluatedAt: '2025-03-10T10:30:00.000Z',
    fast: series(Timeframe.M5, fast),
    slow: series(Timeframe.H1, flatBars(30, 2000, Date.UTC(2025, 2, 8, 0, 0), HOUR)),
    yields: macroSeries('^TNX', fast, () => 4.5),
    volatility: macroSeries('DX-Y.NYB', fast, () => 104),
  };
}

export function factorSet(overrides: Partial<FactorSet> = {}): FactorSet {
  return {
    trendAlignment: 0,
    vsaConfirmation: 0,
    liquidityReversal: 0,
    momentum: 0,
    yieldSupport: 0,
    volatilityDanger: false,
    fastTrend: 'NEUTRAL',
    slowTrend: 'NEUTRAL',
    vsaLabel: 'neutral',
    readings: { rsi: null, atr: null, movingAverage: null, volumeSpike: false, expansion: false },
    undetermined: [],
    ...overrides,
  };
}
