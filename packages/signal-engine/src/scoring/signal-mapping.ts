/**
 * @fileoverview Confidence and bias to discrete signal.
 * @module @xau-signal/signal-engine/scoring/signal-mapping
 */

import type { ScoreResult, Signal } from '@xau-signal/contracts';
import { roundTo } from '../utils/price-utils.js';

export interface SignalThresholds {
  insufficientEdge: number;
  actionable: number;
  strong: number;
}

/**
 * Below `actionable` the answer is always WAIT, whatever the bias. That
 * covers both the no-edge zone under `insufficientEdge` and the dead zone
 * between the two.
 */
export function mapSignal(score: ScoreResult, thresholds: SignalThresholds): Signal {
  if (score.bias === 'NEUTRAL' || score.confidence < thresholds.actionable) {
    return 'WAIT';
  }

  const strong = score.confidence >= thresholds.strong;
  if (score.bias === 'BUY') {
    return strong ? 'STRONG_BUY' : 'BUY';
  }
  return strong ? 'STRONG_SELL' : 'SELL';
}

/**
 * Buy and sell probabilities: the confidence goes to the bias side and the
 * remainder to the other; a neutral bias splits evenly.
 */
export function signalProbabilities(score: ScoreResult): { buy: number; sell: number } {
  switch (score.bias) {
    case 'BUY':
      return { buy: score.confidence, sell: roundTo(100 - score.confidence, 2) };
    case 'SELL':
      return { buy: roundTo(100 - score.confidence, 2), sell: score.confidence };
    case 'NEUTRAL':
      return { buy: 50, sell: 50 };
  }
}
