/**
 * @fileoverview Signal engine output DTOs.
 *
 * Defines the per-cycle values produced by the engine:
 * - Factor set (normalized signed contributions)
 * - Score result (bounded confidence and directional bias)
 * - Lock state (hard gate) and session lock (soft gate)
 * - Signal report (the single object handed to the presentation layer)
 *
 * @module @xau-signal/contracts/signal
 */

/** Direction of a trend estimate on one timeframe. */
export type TrendDirection = 'BULLISH' | 'BEARISH' | 'NEUTRAL';

/** Directional bias derived from the net weighted factor sum. */
export type Bias = 'BUY' | 'SELL' | 'NEUTRAL';

/** Discrete action signal. */
export type Signal = 'STRONG_BUY' | 'BUY' | 'WAIT' | 'SELL' | 'STRONG_SELL';

/** Normalized signed contribution: bearish, none, bullish. */
export type Ternary = -1 | 0 | 1;

/** Volume/spread classification of the latest bar against the trend. */
export type VsaLabel = 'confirm' | 'neutral' | 'contradict';

/** Why the hard lock is ON. */
export type LockReason = 'news-window' | 'volatility-shock' | 'data-unavailable' | 'none';

/** Trading sessions, lowest liquidity first. */
export type SessionName = 'ASIAN' | 'LONDON' | 'OVERLAP' | 'NEW_YORK' | 'LATE_NEW_YORK';

/**
 * Every forecast label the engine can emit.
 *
 * New labels are appended, never renamed, so consumers keep working.
 */
export const FORECAST_LABELS = [
  'Stay Out (Dangerous)',
  'Institutional Rally/Dump',
  'Multi-Timeframe Confluence',
  'Liquidity Reversal',
  'Yield-Supported',
  'High Probability Continuation',
  'Probable Upside/Downside',
  'Consolidation',
] as const;

export type ForecastLabel = (typeof FORECAST_LABELS)[number];

/**
 * Raw indicator values behind the factors, for display.
 *
 * Numbers are null when the indicator was undetermined; the flags are false.
 */
export interface IndicatorReadings {
  readonly rsi: number | null;
  readonly atr: number | null;
  /** Fast-timeframe moving average the trend reads against */
  readonly movingAverage: number | null;
  readonly volumeSpike: boolean;
  readonly expansion: boolean;
}

/**
 * Factor contributions for one evaluation cycle.
 *
 * Produced fresh on every evaluation and frozen on creation.
 *
 * @invariant each Ternary factor is -1, 0 or 1
 */
export interface FactorSet {
  /** Fast and slow trends agree (+1 both bullish, -1 both bearish) */
  readonly trendAlignment: Ternary;
  /** Latest bar's effort in the trend direction (+1 bullish, -1 bearish) */
  readonly vsaConfirmation: Ternary;
  /** Stop-run detected (+1 bullish sweep of lows, -1 bearish sweep of highs) */
  readonly liquidityReversal: Ternary;
  /** RSI agreeing with the prevailing trend */
  readonly momentum: Ternary;
  /** Yields moving inversely to price in the bias direction (+1) or with it (-1) */
  readonly yieldSupport: Ternary;
  /** Volatility proxy shock */
  readonly volatilityDanger: boolean;
  readonly fastTrend: TrendDirection;
  readonly slowTrend: TrendDirection;
  readonly vsaLabel: VsaLabel;
  readonly readings: IndicatorReadings;
  /** Names of factors excluded because their inputs were undetermined */
  readonly undetermined: readonly string[];
}

/**
 * Bounded confidence and bias derived from a FactorSet.
 *
 * @invariant 0 <= confidence <= 100
 */
export interface ScoreResult {
  readonly confidence: number;
  readonly bias: Bias;
  /** Net weighted sum of the directional factors */
  readonly netDirectional: number;
}

/**
 * Hard gate state, recomputed every cycle.
 *
 * @invariant state === 'OFF' iff reason === 'none'
 */
export interface LockState {
  readonly state: 'ON' | 'OFF';
  readonly reason: LockReason;
  /** Every trigger that fired, highest priority first */
  readonly triggers: readonly Exclude<LockReason, 'none'>[];
  /** Optional human-readable detail (e.g. the news event title) */
  readonly detail?: string;
}

/**
 * Soft gate from session liquidity; never forces WAIT.
 */
export interface SessionLock {
  readonly session: SessionName;
  /** True during the lowest-liquidity session */
  readonly softLock: boolean;
  /** Multiplier applied to the confidence distance from 50 */
  readonly confidenceMultiplier: number;
}

/**
 * The engine's single externally observed artifact per cycle.
 *
 * Immutable once emitted.
 *
 * @invariant lock.state === 'ON' implies signal === 'WAIT' and actionable === false
 * @invariant For BUY-side levels: stopLoss < entryPrice < takeProfit
 * @invariant For SELL-side levels: takeProfit < entryPrice < stopLoss
 */
export interface SignalReport {
  readonly symbol: string;
  readonly signal: Signal;
  /** Bounded confidence (0-100), reported even when locked */
  readonly confidence: number;
  /** False when locked or when the signal is WAIT */
  readonly actionable: boolean;
  readonly lock: LockState;
  readonly session: SessionLock;
  readonly forecast: ForecastLabel;
  readonly trendDirection: TrendDirection;
  readonly bias: Bias;
  /** Last fast-timeframe close; null when no price is available */
  readonly entryPrice: number | null;
  readonly stopLoss: number | null;
  readonly takeProfit: number | null;
  /** Configured reward-to-risk multiple used for takeProfit */
  readonly riskReward: number;
  readonly probabilities: {
    readonly buy: number;
    readonly sell: number;
  };
  readonly factors: FactorSet | null;
  /** Evaluation instant (ISO 8601 UTC), copied from the snapshot */
  readonly evaluatedAt: string;
  readonly engineVersion: string;
}

/**
 * Type guard for reports a trader may act on.
 */
export function isActionable(report: SignalReport): boolean {
  return report.actionable && report.lock.state === 'OFF' && report.signal !== 'WAIT';
}

/**
 * Trade direction implied by a signal, or null for WAIT.
 */
export function signalDirection(signal: Signal): 'BUY' | 'SELL' | null {
  switch (signal) {
    case 'STRONG_BUY':
    case 'BUY':
      return 'BUY';
    case 'STRONG_SELL':
    case 'SELL':
      return 'SELL';
    case 'WAIT':
      return null;
  }
}

/**
 * Numeric sign of a trend direction.
 */
export function trendSign(trend: TrendDirection): Ternary {
  if (trend === 'BULLISH') return 1;
  if (trend === 'BEARISH') return -1;
  return 0;
}

/**
 * Converts a number to its Ternary sign (0 for zero and NaN).
 */
export function toTernary(value: number): Ternary {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}
