/**
 * @fileoverview Forecast label selection.
 * @module @xau-signal/signal-engine/forecast/forecast
 */

import { trendSign } from '@xau-signal/contracts';
import type {
  FactorSet,
  ForecastLabel,
  LockState,
  ScoreResult,
  TrendDirection,
} from '@xau-signal/contracts';

export interface ForecastInput {
  lock: LockState;
  factors: FactorSet;
  score: ScoreResult;
  /** Trend the engine trades with (slow, falling back to fast) */
  trend: TrendDirection;
  thresholds: {
    insufficientEdge: number;
    institutional: number;
  };
}

/**
 * First matching rule wins. Two-sided labels carry no direction; read it
 * from the report's bias.
 *
 * 1. lock ON or volatility danger
 * 2. VSA confirmation at institutional confidence
 * 3. timeframe alignment
 * 4. stop-run
 * 5. yield support
 * 6. trend with agreeing momentum
 * 7. a directional bias with some edge
 * 8. consolidation
 */
export function generateForecast(input: ForecastInput): ForecastLabel {
  const { lock, factors, score, trend, thresholds } = input;

  if (lock.state === 'ON' || factors.volatilityDanger) {
    return 'Stay Out (Dangerous)';
  }

  if (
    factors.vsaLabel === 'confirm' &&
    factors.vsaConfirmation !== 0 &&
    score.confidence >= thresholds.institutional
  ) {
    return 'Institutional Rally/Dump';
  }

  if (factors.trendAlignment !== 0) {
    return 'Multi-Timeframe Confluence';
  }

  if (factors.liquidityReversal !== 0) {
    return 'Liquidity Reversal';
  }

  if (factors.yieldSupport === 1) {
    return 'Yield-Supported';
  }

  if (trend !== 'NEUTRAL' && factors.momentum === trendSign(trend)) {
    return 'High Probability Continuation';
  }

  if (score.bias !== 'NEUTRAL' && score.confidence >= thresholds.insufficientEdge) {
    return 'Probable Upside/Downside';
  }

  return 'Consolidation';
}
