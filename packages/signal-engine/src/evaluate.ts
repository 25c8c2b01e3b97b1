/**
 * @fileoverview Evaluation cycle orchestrator.
 *
 * One pure, synchronous pass over a market snapshot:
 * indicators → detectors → score → yield support → lock → forecast → report.
 * Market data problems never throw; they either exclude a factor or degrade
 * the whole cycle to a locked WAIT.
 *
 * @module @xau-signal/signal-engine/evaluate
 */

import { trendSign, undetermined } from '@xau-signal/contracts';
import type {
  FactorSet,
  IndicatorReadings,
  MarketSnapshot,
  Reading,
  SignalReport,
  Ternary,
} from '@xau-signal/contracts';
import { classifySession } from '@xau-signal/market-calendar';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import { movingAverage } from './indicators/moving-average.js';
import { trendDirection, prevailingTrend } from './indicators/trend.js';
import { averageTrueRange } from './indicators/atr.js';
import { relativeStrength, momentumSign } from './indicators/rsi.js';
import { classifyVolumeSpread, vsaFactor } from './indicators/vsa.js';
import { detectTimeframeAlignment } from './detectors/alignment.js';
import { detectLiquidityGrab } from './detectors/liquidity-grab.js';
import { analyzeYieldBias, type YieldBias } from './yield/yield-bias.js';
import { biasFromNet, netDirectional, scoreFactors } from './scoring/scorer.js';
import { mapSignal, signalProbabilities } from './scoring/signal-mapping.js';
import { detectVolatilityShock, type VolatilityShock } from './lock/volatility.js';
import { evaluateLock } from './lock/safety-lock.js';
import { generateForecast } from './forecast/forecast.js';
import { calculatePriceLevels } from './report/levels.js';
import { assembleReport } from './report/assemble.js';
import { roundTo } from './utils/price-utils.js';
import { validateMacroSeries, validateSeries } from './utils/validation.js';

/**
 * Evaluates one snapshot.
 *
 * Identical snapshots and configs give deep-equal reports; the clock is
 * never read (the instant comes from `snapshot.evaluatedAt`).
 *
 * @example
 * ```typescript
 * const report = evaluate(snapshot);
 * if (report.actionable) {
 *   console.log(report.signal, report.stopLoss, report.takeProfit);
 * }
 * ```
 */
export function evaluate(
  snapshot: MarketSnapshot,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): SignalReport {
  const evaluatedAt = new Date(snapshot.evaluatedAt);
  if (Number.isNaN(evaluatedAt.getTime())) {
    return degradedReport(snapshot.symbol, snapshot.evaluatedAt, 'invalid evaluatedAt', config);
  }

  const seriesProblem =
    validateSeries(snapshot.fast, 'fast') ?? validateSeries(snapshot.slow, 'slow');
  if (seriesProblem) {
    return degradedReport(snapshot.symbol, snapshot.evaluatedAt, seriesProblem.message, config);
  }

  const fastBars = snapshot.fast.bars;
  const lastBar = fastBars[fastBars.length - 1];
  if (!lastBar) {
    return degradedReport(snapshot.symbol, snapshot.evaluatedAt, 'fast series is empty', config);
  }

  const excluded: string[] = [];
  const note = <T>(name: string, reading: Reading<T>): Reading<T> => {
    if (!reading.determined) excluded.push(name);
    return reading;
  };

  // Indicators
  const fastTrend = note('fastTrend', trendDirection(fastBars, config.trend));
  const slowTrend = note('slowTrend', trendDirection(snapshot.slow.bars, config.trend));
  const trend = prevailingTrend(fastTrend, slowTrend);
  const atr = note('atr', averageTrueRange(fastBars, config.atr.period));
  const rsi = note('momentum', relativeStrength(fastBars, config.momentum.period));
  const vsa = note('vsa', classifyVolumeSpread(fastBars, trend, config.vsa));

  // Detectors
  const trendAlignment = detectTimeframeAlignment(fastTrend, slowTrend);
  const grab = note(
    'liquidity',
    detectLiquidityGrab(fastBars, { ...config.liquidity, atrPeriod: config.atr.period })
  );

  const trendDirectionSign = trend.determined ? trendSign(trend.value) : 0;
  let momentum: Ternary = 0;
  if (rsi.determined && trendDirectionSign !== 0) {
    const sign = momentumSign(rsi.value, config.momentum);
    momentum = sign === trendDirectionSign ? sign : 0;
  }

  const directional = {
    trendAlignment,
    vsaConfirmation: vsa.determined ? vsaFactor(vsa.value) : 0,
    liquidityReversal: grab.determined ? grab.value.direction : 0,
    momentum,
  } satisfies Partial<FactorSet>;
  const bias = biasFromNet(netDirectional(directional, config.weights));

  // Yield support needs the bias; a malformed yield series only drops this factor
  const yieldBias = validateMacroSeries(snapshot.yields)
    ? note('yield', undetermined<YieldBias>(`${snapshot.yields.name} is malformed`))
    : note('yield', analyzeYieldBias(fastBars, snapshot.yields, bias, config.yield));

  const volatility = validateMacroSeries(snapshot.volatility)
    ? note('volatility', undetermined<VolatilityShock>(`${snapshot.volatility.name} is malformed`))
    : note('volatility', detectVolatilityShock(snapshot.volatility, config.lock.volatility));

  const precision = config.levels.pricePrecision;
  const average = movingAverage(
    fastBars.map((bar) => bar.close),
    config.trend.period,
    config.trend.maType
  );
  const readings: IndicatorReadings = Object.freeze({
    rsi: rsi.determined ? roundTo(rsi.value, 2) : null,
    atr: atr.determined ? roundTo(atr.value, precision) : null,
    movingAverage: average.determined ? roundTo(average.value, precision) : null,
    volumeSpike: vsa.determined && vsa.value.volumeSpike,
    expansion: vsa.determined && vsa.value.expansion,
  });

  const factors: FactorSet = Object.freeze({
    ...directional,
    yieldSupport: yieldBias.determined ? yieldBias.value.support : 0,
    volatilityDanger: volatility.determined && volatility.value.shocked,
    fastTrend: fastTrend.determined ? fastTrend.value : 'NEUTRAL',
    slowTrend: slowTrend.determined ? slowTrend.value : 'NEUTRAL',
    vsaLabel: vsa.determined ? vsa.value.label : 'neutral',
    readings,
    undetermined: Object.freeze([...excluded]),
  });

  const session = classifySession(evaluatedAt, config.sessions);
  const score = scoreFactors(factors, config.weights, session);
  const lock = evaluateLock(
    { evaluatedAt, calendar: snapshot.calendar, volatility },
    config.lock.news
  );
  const trendValue = trend.determined ? trend.value : 'NEUTRAL';

  return assembleReport({
    symbol: snapshot.symbol,
    evaluatedAt: snapshot.evaluatedAt,
    signal: mapSignal(score, config.thresholds),
    confidence: score.confidence,
    bias: score.bias,
    probabilities: signalProbabilities(score),
    lock,
    session,
    forecast: generateForecast({
      lock,
      factors,
      score,
      trend: trendValue,
      thresholds: config.thresholds,
    }),
    trendDirection: trendValue,
    entryPrice: lastBar.close,
    levels: calculatePriceLevels(fastBars, score.bias, atr, config.levels),
    riskReward: config.levels.riskReward,
    factors,
  });
}

/**
 * The report for a cycle that could not run: locked WAIT with reason
 * `data-unavailable`, no factors and no levels.
 *
 * @example
 * ```typescript
 * degradedReport('XAUUSD', new Date().toISOString(), 'Yahoo chart request timed out');
 * ```
 */
export function degradedReport(
  symbol: string,
  evaluatedAt: string,
  detail: string,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): SignalReport {
  const at = new Date(evaluatedAt);
  const session = classifySession(Number.isNaN(at.getTime()) ? new Date(0) : at, config.sessions);

  return assembleReport({
    symbol,
    evaluatedAt,
    signal: 'WAIT',
    confidence: 50,
    bias: 'NEUTRAL',
    probabilities: { buy: 50, sell: 50 },
    lock: evaluateLock(
      { evaluatedAt: at, volatility: undetermined(detail), dataUnavailable: detail },
      config.lock.news
    ),
    session,
    forecast: 'Stay Out (Dangerous)',
    trendDirection: 'NEUTRAL',
    entryPrice: null,
    levels: null,
    riskReward: config.levels.riskReward,
    factors: null,
  });
}
