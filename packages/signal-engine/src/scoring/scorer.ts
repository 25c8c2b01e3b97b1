/**
 * @fileoverview Factor scoring engine.
 * @module @xau-signal/signal-engine/scoring/scorer
 */

import type { Bias, FactorSet, ScoreResult, SessionLock } from '@xau-signal/contracts';
import { clamp, roundTo } from '../utils/price-utils.js';
import { DEFAULT_WEIGHTS, type FactorWeights } from './weights.js';

const BASE_CONFIDENCE = 50;

type DirectionalFactors = Pick<
  FactorSet,
  'trendAlignment' | 'vsaConfirmation' | 'liquidityReversal' | 'momentum'
>;

/**
 * Weighted sum of the directional factors.
 */
export function netDirectional(
  factors: DirectionalFactors,
  weights: FactorWeights = DEFAULT_WEIGHTS
): number {
  return (
    factors.trendAlignment * weights.trendAlignment +
    factors.vsaConfirmation * weights.vsa +
    factors.liquidityReversal * weights.liquidity +
    factors.momentum * weights.momentum
  );
}

/**
 * Sign of the net sum; a tie is NEUTRAL.
 */
export function biasFromNet(net: number): Bias {
  if (net > 0) return 'BUY';
  if (net < 0) return 'SELL';
  return 'NEUTRAL';
}

/**
 * Bounded confidence and bias for a factor set.
 *
 * Confidence starts at 50, gains the absolute directional sum, moves with
 * yield support and loses the volatility penalty. The session multiplier
 * then scales its distance from 50 before clamping to [0, 100].
 *
 * @example
 * ```typescript
 * const score = scoreFactors(factors, DEFAULT_WEIGHTS, session);
 * // { confidence: 78, bias: 'BUY', netDirectional: 23 }
 * ```
 */
export function scoreFactors(
  factors: FactorSet,
  weights: FactorWeights = DEFAULT_WEIGHTS,
  session?: SessionLock
): ScoreResult {
  const net = netDirectional(factors, weights);

  let raw = BASE_CONFIDENCE + Math.abs(net) + weights.yieldSupport * factors.yieldSupport;
  if (factors.volatilityDanger) {
    raw -= weights.volatilityPenalty;
  }

  const multiplier = session?.confidenceMultiplier ?? 1;
  const scaled = BASE_CONFIDENCE + (raw - BASE_CONFIDENCE) * multiplier;

  return Object.freeze({
    confidence: roundTo(clamp(scaled, 0, 100), 2),
    bias: biasFromNet(net),
    netDirectional: net,
  });
}
