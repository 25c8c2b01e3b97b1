/**
 * @fileoverview Default factor weights.
 * @module @xau-signal/signal-engine/scoring/weights
 */

/**
 * Confidence points each factor moves the score by.
 */
export interface FactorWeights {
  /** Fast and slow trends agree */
  trendAlignment: number;
  /** Effort bar confirming or contradicting the trend */
  vsa: number;
  /** Stop-run sweep and reject */
  liquidity: number;
  /** RSI agreeing with the prevailing trend */
  momentum: number;
  /** Yields moving against price; adjusts confidence only */
  yieldSupport: number;
  /** Subtracted when the volatility proxy shocks */
  volatilityPenalty: number;
}

/**
 * Default weights for factor scoring.
 */
export const DEFAULT_WEIGHTS: Readonly<FactorWeights> = {
  trendAlignment: 10,
  vsa: 8,
  liquidity: 7,
  momentum: 5,
  yieldSupport: 5,
  volatilityPenalty: 15,
};
