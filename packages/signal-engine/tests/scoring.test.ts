import { describe, it, expect } from 'vitest';
import type { ScoreResult, SessionLock } from '@xau-signal/contracts';
import { biasFromNet, netDirectional, scoreFactors } from '../src/scoring/scorer.js';
import { mapSignal, signalProbabilities } from '../src/scoring/signal-mapping.js';
import { DEFAULT_WEIGHTS } from '../src/scoring/weights.js';
import { factorSet } from './fixtures.js';

const THRESHOLDS = { insufficientEdge: 45, actionable: 60, strong: 80 };
const ASIAN: SessionLock = { session: 'ASIAN', softLock: true, confidenceMultiplier: 0.5 };

function score(confidence: number, bias: ScoreResult['bias']): ScoreResult {
  return { confidence, bias, netDirectional: 0 };
}

describe('netDirectional', () => {
  it('should weight and sum the directional factors', () => {
    expect(netDirectional(factorSet({ trendAlignment: 1, vsaConfirmation: -1 }))).toBe(2);
    expect(
      netDirectional(
        factorSet({ trendAlignment: 1, vsaConfirmation: 1, liquidityReversal: 1, momentum: 1 })
      )
    ).toBe(30);
  });

  it('should ignore yield support', () => {
    expect(netDirectional(factorSet({ yieldSupport: 1 }))).toBe(0);
  });
});

describe('biasFromNet', () => {
  it('should resolve ties to NEUTRAL', () => {
    expect(biasFromNet(3)).toBe('BUY');
    expect(biasFromNet(-0.5)).toBe('SELL');
    expect(biasFromNet(0)).toBe('NEUTRAL');
  });
});

describe('scoreFactors', () => {
  const allBullish = factorSet({
    trendAlignment: 1,
    vsaConfirmation: 1,
    liquidityReversal: 1,
    momentum: 1,
    yieldSupport: 1,
  });

  it('should add the absolute net sum and yield support to 50', () => {
    expect(scoreFactors(allBullish)).toEqual({ confidence: 85, bias: 'BUY', netDirectional: 30 });
  });

  it('should give bearish factors the same confidence with a SELL bias', () => {
    const allBearish = factorSet({
      trendAlignment: -1,
      vsaConfirmation: -1,
      liquidityReversal: -1,
      momentum: -1,
      yieldSupport: 1,
    });

    expect(scoreFactors(allBearish)).toEqual({ confidence: 85, bias: 'SELL', netDirectional: -30 });
  });

  it('should subtract the volatility penalty', () => {
    const result = scoreFactors(factorSet({ trendAlignment: 1, volatilityDanger: true }));

    expect(result.confidence).toBe(45);
    expect(result.bias).toBe('BUY');
  });

  it('should halve the distance from 50 in a soft-locked session', () => {
    expect(scoreFactors(allBullish, DEFAULT_WEIGHTS, ASIAN).confidence).toBe(67.5);
  });

  it('should clamp all-positive extremes to 100', () => {
    const heavy = { ...DEFAULT_WEIGHTS, trendAlignment: 40, vsa: 40, liquidity: 40, momentum: 40, yieldSupport: 40 };

    expect(scoreFactors(allBullish, heavy).confidence).toBe(100);
  });

  it('should clamp all-negative extremes to 0', () => {
    const punishing = { ...DEFAULT_WEIGHTS, yieldSupport: 100, volatilityPenalty: 100 };
    const result = scoreFactors(factorSet({ yieldSupport: -1, volatilityDanger: true }), punishing);

    expect(result).toEqual({ confidence: 0, bias: 'NEUTRAL', netDirectional: 0 });
  });

  it('should round to two decimals', () => {
    const session: SessionLock = { session: 'LONDON', softLock: false, confidenceMultiplier: 1 / 3 };

    expect(scoreFactors(factorSet({ trendAlignment: 1 }), DEFAULT_WEIGHTS, session).confidence).toBe(
      53.33
    );
  });

  it('should return a frozen result', () => {
    expect(Object.isFrozen(scoreFactors(allBullish))).toBe(true);
  });
});

describe('mapSignal', () => {
  it('should wait below the actionable threshold whatever the bias', () => {
    expect(mapSignal(score(44.99, 'BUY'), THRESHOLDS)).toBe('WAIT');
    expect(mapSignal(score(45, 'BUY'), THRESHOLDS)).toBe('WAIT');
    expect(mapSignal(score(59.99, 'SELL'), THRESHOLDS)).toBe('WAIT');
  });

  it('should map actionable and strong confidence by bias', () => {
    expect(mapSignal(score(60, 'BUY'), THRESHOLDS)).toBe('BUY');
    expect(mapSignal(score(79.99, 'BUY'), THRESHOLDS)).toBe('BUY');
    expect(mapSignal(score(80, 'BUY'), THRESHOLDS)).toBe('STRONG_BUY');
    expect(mapSignal(score(65, 'SELL'), THRESHOLDS)).toBe('SELL');
    expect(mapSignal(score(85, 'SELL'), THRESHOLDS)).toBe('STRONG_SELL');
  });

  it('should wait on a neutral bias', () => {
    expect(mapSignal(score(90, 'NEUTRAL'), THRESHOLDS)).toBe('WAIT');
  });
});

describe('signalProbabilities', () => {
  it('should give the confidence to the bias side', () => {
    expect(signalProbabilities(score(72.5, 'BUY'))).toEqual({ buy: 72.5, sell: 27.5 });
    expect(signalProbabilities(score(72.5, 'SELL'))).toEqual({ buy: 27.5, sell: 72.5 });
    expect(signalProbabilities(score(72.5, 'NEUTRAL'))).toEqual({ buy: 50, sell: 50 });
  });
});
