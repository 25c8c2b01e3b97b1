import { describe, it, expect } from 'vitest';
import { determined, undetermined, type Bar } from '@xau-signal/contracts';
import { calculatePriceLevels } from '../src/report/levels.js';
import { assembleReport } from '../src/report/assemble.js';
import { LOCK_OFF } from '../src/lock/safety-lock.js';
import { ENGINE_VERSION } from '../src/config.js';
import { factorSet } from './fixtures.js';

const OPTIONS = { swingLookback: 10, stopAtrMultiple: 1.5, riskReward: 2, pricePrecision: 2 };

function bar(minute: number, low: number, high: number, close: number): Bar {
  return {
    timestamp: new Date(Date.UTC(2025, 2, 10, 9, minute)).toISOString(),
    open: close,
    high,
    low,
    close,
  };
}

const BARS: Bar[] = [bar(0, 1995, 2002, 2000), bar(5, 1997, 2005, 2001), bar(10, 1998, 2003, 2000)];

describe('calculatePriceLevels', () => {
  it('should put a BUY stop below the swing low by a multiple of ATR', () => {
    expect(calculatePriceLevels(BARS, 'BUY', determined(2), OPTIONS)).toEqual({
      entry: 2000,
      stopLoss: 1992,
      takeProfit: 2016,
      riskAmount: 8,
      rewardAmount: 16,
    });
  });

  it('should mirror the levels for a SELL', () => {
    expect(calculatePriceLevels(BARS, 'SELL', determined(2), OPTIONS)).toEqual({
      entry: 2000,
      stopLoss: 2008,
      takeProfit: 1984,
      riskAmount: 8,
      rewardAmount: 16,
    });
  });

  it('should only search the swing lookback', () => {
    const levels = calculatePriceLevels(BARS, 'BUY', determined(2), { ...OPTIONS, swingLookback: 1 });

    expect(levels?.stopLoss).toBe(1995);
    expect(levels?.takeProfit).toBe(2010);
  });

  it('should round the stop away from entry', () => {
    const levels = calculatePriceLevels(BARS, 'BUY', determined(1.01), OPTIONS);

    expect(levels?.stopLoss).toBe(1993.48);
    expect(levels?.takeProfit).toBe(2013.04);
  });

  it('should never report less reward than riskReward times the risk', () => {
    let seed = 20250310;
    const next = (): number => {
      seed = (seed * 16807) % 2147483647;
      return seed;
    };
    const shortfalls: string[] = [];

    for (let k = 0; k < 2000; k++) {
      const entry = (180000 + (next() % 40000)) / 100;
      const swing = Array.from({ length: 10 }, (_, i) =>
        bar(i, entry - (next() % 2000) / 100, entry + (next() % 2000) / 100, entry)
      );
      const atr = determined(0.5 + (next() % 300) / 100);

      for (const bias of ['BUY', 'SELL'] as const) {
        for (const riskReward of [1.5, 2, 3]) {
          const levels = calculatePriceLevels(swing, bias, atr, { ...OPTIONS, riskReward });
          if (!levels) {
            shortfalls.push(`${bias} ${entry}: no levels`);
            continue;
          }
          const reward = Math.abs(levels.takeProfit - levels.entry);
          const risk = Math.abs(levels.entry - levels.stopLoss);
          if (reward < riskReward * risk || levels.rewardAmount < riskReward * levels.riskAmount) {
            shortfalls.push(`${bias} ${entry} sl=${levels.stopLoss} tp=${levels.takeProfit}`);
          }
        }
      }
    }

    expect(shortfalls).toEqual([]);
  });

  it('should move the target a tick further when the tick grid falls short', () => {
    const swing = [bar(0, 1985.1, 1992.56, 1988), bar(5, 1981.9, 1984.2, 1982.59)];

    const levels = calculatePriceLevels(swing, 'SELL', determined(0), OPTIONS);

    expect(levels?.stopLoss).toBe(1992.56);
    expect(levels?.takeProfit).toBe(1962.64);
  });

  it('should return null without a direction, an ATR or bars', () => {
    expect(calculatePriceLevels(BARS, 'NEUTRAL', determined(2), OPTIONS)).toBeNull();
    expect(calculatePriceLevels(BARS, 'BUY', undetermined('ATR(14) needs 15 bars, got 3'), OPTIONS)).toBeNull();
    expect(calculatePriceLevels([], 'BUY', determined(2), OPTIONS)).toBeNull();
  });

  it('should return null when the stop would not sit beyond entry', () => {
    const pinned = [bar(0, 2000, 2001, 2000)];

    expect(
      calculatePriceLevels(pinned, 'BUY', determined(0), { ...OPTIONS, stopAtrMultiple: 1 })
    ).toBeNull();
  });
});

describe('assembleReport', () => {
  const parts = {
    symbol: 'XAUUSD',
    evaluatedAt: '2025-03-10T09:15:00.000Z',
    signal: 'BUY' as const,
    confidence: 66,
    bias: 'BUY' as const,
    probabilities: { buy: 66, sell: 34 },
    lock: LOCK_OFF,
    session: { session: 'LONDON' as const, softLock: false, confidenceMultiplier: 1 },
    forecast: 'Probable Upside/Downside' as const,
    trendDirection: 'BULLISH' as const,
    entryPrice: 2000,
    levels: { entry: 2000, stopLoss: 1992, takeProfit: 2016, riskAmount: 8, rewardAmount: 16 },
    riskReward: 2,
    factors: factorSet({ vsaConfirmation: 1 }),
  };

  it('should copy the levels and mark an unlocked directional report actionable', () => {
    const report = assembleReport(parts);

    expect(report.signal).toBe('BUY');
    expect(report.actionable).toBe(true);
    expect(report.stopLoss).toBe(1992);
    expect(report.takeProfit).toBe(2016);
    expect(report.engineVersion).toBe(ENGINE_VERSION);
  });

  it('should force WAIT while locked but keep the confidence', () => {
    const report = assembleReport({
      ...parts,
      lock: { state: 'ON', reason: 'news-window', triggers: ['news-window'], detail: 'CPI in 2 min' },
    });

    expect(report.signal).toBe('WAIT');
    expect(report.actionable).toBe(false);
    expect(report.confidence).toBe(66);
  });

  it('should freeze the report all the way down', () => {
    const report = assembleReport(parts);

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.probabilities)).toBe(true);
    expect(Object.isFrozen(report.session)).toBe(true);
  });
});
