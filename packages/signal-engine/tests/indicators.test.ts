import { describe, it, expect } from 'vitest';
import { determined, undetermined, type Bar, type TrendDirection } from '@xau-signal/contracts';
import {
  simpleMovingAverage,
  exponentialMovingAverage,
  movingAverage,
} from '../src/indicators/moving-average.js';
import { trendDirection, prevailingTrend } from '../src/indicators/trend.js';
import { averageTrueRange } from '../src/indicators/atr.js';
import { relativeStrength, momentumSign } from '../src/indicators/rsi.js';
import { classifyVolumeSpread, vsaFactor } from '../src/indicators/vsa.js';
import { flatBars, trendingBars, withBar } from './fixtures.js';

const START = Date.UTC(2025, 2, 10, 9, 0);
const VSA_OPTIONS = {
  baselineWindow: 20,
  volumeSpikeRatio: 1.5,
  expansionRatio: 1.8,
  rangeSpikeRatio: 1.5,
};

describe('moving averages', () => {
  it('should average the last period values', () => {
    expect(simpleMovingAverage([1, 2, 3, 4, 5], 3)).toEqual(determined(4));
  });

  it('should run the EMA from the first value', () => {
    expect(exponentialMovingAverage([1, 2, 3], 3)).toEqual(determined(2.25));
  });

  it('should be undetermined with too few values', () => {
    expect(simpleMovingAverage([1, 2], 3)).toEqual(
      undetermined('SMA(3) needs 3 values, got 2')
    );
    expect(movingAverage([1, 2], 3, 'ema')).toEqual(undetermined('EMA(3) needs 3 values, got 2'));
  });
});

describe('trendDirection', () => {
  const options = { period: 5, maType: 'sma' as const };

  it('should be bullish when the close is above its average', () => {
    expect(trendDirection(trendingBars(5, { start: START }), options)).toEqual(
      determined('BULLISH')
    );
  });

  it('should be bearish when the close is below its average', () => {
    expect(trendDirection(trendingBars(5, { start: START, step: -0.5 }), options)).toEqual(
      determined('BEARISH')
    );
  });

  it('should be neutral on a flat series', () => {
    expect(trendDirection(flatBars(5, 2000, START), options)).toEqual(determined('NEUTRAL'));
  });

  it('should be undetermined below the period', () => {
    expect(trendDirection(trendingBars(4, { start: START }), options)).toEqual(
      undetermined('trend needs 5 bars, got 4')
    );
  });

  it('should honor the EMA option', () => {
    expect(
      trendDirection(trendingBars(5, { start: START }), { period: 5, maType: 'ema' })
    ).toEqual(determined('BULLISH'));
  });
});

describe('prevailingTrend', () => {
  const bullish = determined<TrendDirection>('BULLISH');
  const bearish = determined<TrendDirection>('BEARISH');
  const neutral = determined<TrendDirection>('NEUTRAL');
  const unknown = undetermined<TrendDirection>('short');

  it('should prefer a directional slow trend', () => {
    expect(prevailingTrend(bearish, bullish)).toBe(bullish);
  });

  it('should fall back to the fast trend', () => {
    expect(prevailingTrend(bearish, neutral)).toBe(bearish);
    expect(prevailingTrend(bearish, unknown)).toBe(bearish);
  });

  it('should stay undetermined when neither is known', () => {
    expect(prevailingTrend(unknown, unknown)).toBe(unknown);
  });
});

describe('averageTrueRange', () => {
  it('should average true ranges including gaps from the previous close', () => {
    expect(averageTrueRange(trendingBars(15, { start: START }), 14)).toEqual(determined(1));
  });

  it('should need period + 1 bars', () => {
    expect(averageTrueRange(trendingBars(14, { start: START }), 14)).toEqual(
      undetermined('ATR(14) needs 15 bars, got 14')
    );
  });
});

describe('relativeStrength', () => {
  it('should be 100 for an all-gain window', () => {
    expect(relativeStrength(trendingBars(15, { start: START }), 14)).toEqual(determined(100));
  });

  it('should be 0 for an all-loss window', () => {
    expect(relativeStrength(trendingBars(15, { start: START, step: -1 }), 14)).toEqual(
      determined(0)
    );
  });

  it('should be 50 for a flat or balanced window', () => {
    expect(relativeStrength(flatBars(15, 2000, START), 14)).toEqual(determined(50));

    const zigzag = flatBars(15, 2000, START).map((bar, i) => ({
      ...bar,
      close: i % 2 === 0 ? 2000 : 2001,
    }));
    expect(relativeStrength(zigzag, 14)).toEqual(determined(50));
  });

  it('should need period + 1 bars', () => {
    expect(relativeStrength(flatBars(14, 2000, START), 14).determined).toBe(false);
  });
});

describe('momentumSign', () => {
  const options = { period: 14, bullishAbove: 58, bearishBelow: 42 };

  it('should read the oscillator against both lines', () => {
    expect(momentumSign(60, options)).toBe(1);
    expect(momentumSign(40, options)).toBe(-1);
    expect(momentumSign(58, options)).toBe(0);
    expect(momentumSign(50, options)).toBe(0);
  });
});

describe('classifyVolumeSpread', () => {
  const baseline = trendingBars(20, { start: START });
  const lastClose = 2009.5;
  const spikeBar = {
    open: lastClose,
    high: lastClose + 0.75,
    low: lastClose - 0.25,
    close: lastClose + 0.5,
    volume: 1600,
  };

  it('should confirm a volume spike closing with the trend', () => {
    const reading = classifyVolumeSpread(withBar(baseline, spikeBar), determined('BULLISH'), VSA_OPTIONS);

    expect(reading).toEqual(
      determined({
        label: 'confirm',
        barDirection: 1,
        volumeSpike: true,
        expansion: false,
        rangeSpike: false,
      })
    );
    if (reading.determined) expect(vsaFactor(reading.value)).toBe(1);
  });

  it('should contradict a spike closing against the trend', () => {
    const reading = classifyVolumeSpread(withBar(baseline, spikeBar), determined('BEARISH'), VSA_OPTIONS);

    expect(reading.determined && reading.value.label).toBe('contradict');
    if (reading.determined) expect(vsaFactor(reading.value)).toBe(1);
  });

  it('should stay neutral on an ordinary bar or a neutral trend', () => {
    const ordinary = withBar(baseline, { ...spikeBar, volume: 1000 });
    const quiet = classifyVolumeSpread(ordinary, determined('BULLISH'), VSA_OPTIONS);
    const flat = classifyVolumeSpread(withBar(baseline, spikeBar), determined('NEUTRAL'), VSA_OPTIONS);

    expect(quiet.determined && quiet.value.label).toBe('neutral');
    expect(flat.determined && flat.value.label).toBe('neutral');
    if (quiet.determined) expect(vsaFactor(quiet.value)).toBe(0);
  });

  it('should flag an expansion body without a volume spike', () => {
    const expansion = withBar(baseline, {
      open: lastClose,
      high: lastClose + 2.25,
      low: lastClose - 0.25,
      close: lastClose + 2,
      volume: 1000,
    });
    const reading = classifyVolumeSpread(expansion, determined('BULLISH'), VSA_OPTIONS);

    expect(reading.determined && reading.value.expansion).toBe(true);
    expect(reading.determined && reading.value.label).toBe('confirm');
  });

  it('should use the range spike when the feed has no volume', () => {
    const noVolume: Bar[] = baseline.map(({ volume: _volume, ...bar }) => bar);
    const wide = withBar(noVolume, {
      open: lastClose,
      high: lastClose + 1.5,
      low: lastClose - 0.25,
      close: lastClose + 0.5,
    });
    const reading = classifyVolumeSpread(wide, determined('BULLISH'), VSA_OPTIONS);

    expect(reading).toEqual(
      determined({
        label: 'confirm',
        barDirection: 1,
        volumeSpike: false,
        expansion: false,
        rangeSpike: true,
      })
    );
  });

  it('should be undetermined without a baseline or a trend', () => {
    expect(classifyVolumeSpread(baseline, determined('BULLISH'), VSA_OPTIONS)).toEqual(
      undetermined('VSA needs 21 bars, got 20')
    );
    expect(
      classifyVolumeSpread(withBar(baseline, spikeBar), undetermined('trend needs 200 bars, got 21'), VSA_OPTIONS)
    ).toEqual(undetermined('VSA needs a trend: trend needs 200 bars, got 21'));
  });
});
