/**
 * @fileoverview Report assembly.
 * @module @xau-signal/signal-engine/report/assemble
 */

import type {
  Bias,
  FactorSet,
  ForecastLabel,
  LockState,
  SessionLock,
  Signal,
  SignalReport,
  TrendDirection,
} from '@xau-signal/contracts';
import { ENGINE_VERSION } from '../config.js';
import { deepFreeze } from '../utils/freeze.js';
import type { PriceLevels } from './levels.js';

export interface ReportParts {
  symbol: string;
  evaluatedAt: string;
  signal: Signal;
  confidence: number;
  bias: Bias;
  probabilities: { buy: number; sell: number };
  lock: LockState;
  session: SessionLock;
  forecast: ForecastLabel;
  trendDirection: TrendDirection;
  entryPrice: number | null;
  levels: PriceLevels | null;
  riskReward: number;
  factors: FactorSet | null;
}

/**
 * Packages the cycle's results into a deep-frozen report. A locked report is
 * always WAIT and never actionable.
 */
export function assembleReport(parts: ReportParts): SignalReport {
  const locked = parts.lock.state === 'ON';
  const signal: Signal = locked ? 'WAIT' : parts.signal;

  return deepFreeze({
    symbol: parts.symbol,
    signal,
    confidence: parts.confidence,
    actionable: !locked && signal !== 'WAIT',
    lock: parts.lock,
    session: parts.session,
    forecast: parts.forecast,
    trendDirection: parts.trendDirection,
    bias: parts.bias,
    entryPrice: parts.entryPrice,
    stopLoss: parts.levels?.stopLoss ?? null,
    takeProfit: parts.levels?.takeProfit ?? null,
    riskReward: parts.riskReward,
    probabilities: { ...parts.probabilities },
    factors: parts.factors,
    evaluatedAt: parts.evaluatedAt,
    engineVersion: ENGINE_VERSION,
  });
}
