/**
 * Fixture-based series provider for deterministic runs
 *
 * Serves either a snapshot JSON file or synthetic series computed from the
 * bar timestamps alone, so the same `asOf` always yields the same snapshot.
 */

import { readFile } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import { DataUnavailableError, timeframeToMs } from '@xau-signal/contracts';
import type {
  Bar,
  MacroSeries,
  MarketSnapshot,
  SeriesProvider,
  SeriesWindow,
  SnapshotRequest,
} from '@xau-signal/contracts';
import type { Logger } from '@xau-signal/logger';
import { snapshotSchema } from './snapshot-schema.js';

export interface FixtureProviderConfig {
  logger?: Logger;
  /** Snapshot JSON to serve instead of synthetic data */
  snapshotPath?: string;
  /** Artificial delay before each snapshot; aborting the signal cancels it */
  latencyMs?: number;
}

export interface FixtureProviderStats {
  requests: number;
  errors: number;
  latencyMs: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const TWO_PI = 2 * Math.PI;

/**
 * Gold price at an instant: a three-day swing with an intraday ripple.
 */
function goldPrice(time: number): number {
  return 2900 + 25 * Math.sin((TWO_PI * time) / (3 * DAY_MS)) + 6 * Math.sin((TWO_PI * time) / (5 * 3_600_000));
}

/** Yields move against the three-day gold swing */
function yieldAt(time: number): number {
  return 4.3 - 0.05 * Math.sin((TWO_PI * time) / (3 * DAY_MS));
}

function dollarIndexAt(time: number): number {
  return 104 + 0.3 * Math.sin((TWO_PI * time) / (2 * DAY_MS));
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Open times of the `lookback` bars ending at the last one opened by `asOf`.
 */
export function barTimes(window: SeriesWindow, asOf: Date): number[] {
  const step = timeframeToMs(window.timeframe);
  const last = Math.floor(asOf.getTime() / step) * step;
  return Array.from({ length: window.lookback }, (_, i) => last - (window.lookback - 1 - i) * step);
}

export function syntheticBars(window: SeriesWindow, asOf: Date): Bar[] {
  const step = timeframeToMs(window.timeframe);

  return barTimes(window, asOf).map((time) => {
    const open = round(goldPrice(time), 2);
    const close = round(goldPrice(time + step), 2);
    const wick = 0.15 + 0.1 * Math.abs(Math.sin(time / 420_000));
    return {
      timestamp: new Date(time).toISOString(),
      open,
      high: round(Math.max(open, close) + wick, 2),
      low: round(Math.min(open, close) - wick, 2),
      close,
      volume: Math.round(800 + 400 * Math.abs(Math.sin(time / 2_700_000))),
    };
  });
}

function syntheticMacro(
  name: string,
  window: SeriesWindow,
  asOf: Date,
  valueAt: (time: number) => number
): MacroSeries {
  return {
    name,
    points: barTimes(window, asOf).map((time) => ({
      timestamp: new Date(time).toISOString(),
      value: round(valueAt(time), 4),
    })),
  };
}

/**
 * Provider that returns fixture data
 */
export class FixtureSeriesProvider implements SeriesProvider {
  readonly id = 'fixture';

  private readonly logger?: Logger;
  private readonly snapshotPath?: string;
  private readonly latencyMs: number;
  private stats: FixtureProviderStats = { requests: 0, errors: 0, latencyMs: 0 };

  constructor(config: FixtureProviderConfig = {}) {
    this.logger = config.logger;
    this.snapshotPath = config.snapshotPath;
    this.latencyMs = config.latencyMs ?? 0;
  }

  async fetchSnapshot(request: SnapshotRequest, signal?: AbortSignal): Promise<MarketSnapshot> {
    this.stats.requests++;
    const startTime = Date.now();

    try {
      await this.simulateDelay(signal);

      const snapshot = this.snapshotPath
        ? await this.loadSnapshot(this.snapshotPath)
        : this.generateSnapshot(request);

      this.stats.latencyMs = Date.now() - startTime;
      this.logger?.debug('Fixture provider returning snapshot', {
        provider: this.id,
        symbol: snapshot.symbol,
        fastBars: snapshot.fast.bars.length,
        slowBars: snapshot.slow.bars.length,
      });

      return snapshot;
    } catch (error) {
      this.stats.errors++;
      throw error;
    }
  }

  getStats(): FixtureProviderStats {
    return { ...this.stats };
  }

  private generateSnapshot(request: SnapshotRequest): MarketSnapshot {
    const { asOf, fast, slow } = request;

    return {
      symbol: request.symbol,
      evaluatedAt: asOf.toISOString(),
      fast: { timeframe: fast.timeframe, bars: syntheticBars(fast, asOf) },
      slow: { timeframe: slow.timeframe, bars: syntheticBars(slow, asOf) },
      yields: syntheticMacro('^TNX', fast, asOf, yieldAt),
      volatility: syntheticMacro('DX-Y.NYB', fast, asOf, dollarIndexAt),
    };
  }

  private async loadSnapshot(path: string): Promise<MarketSnapshot> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DataUnavailableError(`Cannot read snapshot ${path}: ${reason}`, {
        provider: this.id,
        path,
      });
    }

    const result = snapshotSchema.safeParse(raw);
    if (!result.success) {
      throw new DataUnavailableError(`Invalid snapshot ${path}`, {
        provider: this.id,
        path,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    return result.data;
  }

  private async simulateDelay(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new DataUnavailableError('Fixture request was aborted', { provider: this.id });
    }
    if (this.latencyMs <= 0) return;

    try {
      await delay(this.latencyMs, undefined, { signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new DataUnavailableError('Fixture request was aborted', { provider: this.id });
      }
      throw error;
    }
  }
}
