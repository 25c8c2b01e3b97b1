/**
 * @fileoverview Signal engine package exports.
 *
 * Pure scoring of multi-timeframe gold price data and macro series into a
 * discrete signal, bounded confidence, safety lock, forecast label and
 * ATR-based risk levels.
 *
 * @module @xau-signal/signal-engine
 */

// Entry points
export { evaluate, degradedReport } from './evaluate.js';
export { createSignalEngine, type SignalEngine } from './engine.js';

// Configuration
export {
  engineConfigSchema,
  resolveConfig,
  DEFAULT_ENGINE_CONFIG,
  ENGINE_VERSION,
  type EngineConfig,
  type EngineConfigInput,
} from './config.js';

// Components
export * from './indicators/index.js';
export * from './detectors/index.js';
export * from './scoring/index.js';
export {
  analyzeYieldBias,
  alignNearestPreceding,
  type YieldBias,
  type YieldBiasOptions,
} from './yield/yield-bias.js';
export {
  detectVolatilityShock,
  type VolatilityShock,
  type VolatilityShockOptions,
} from './lock/volatility.js';
export { evaluateLock, LOCK_OFF, type LockInputs } from './lock/safety-lock.js';
export { generateForecast, type ForecastInput } from './forecast/forecast.js';
export { calculatePriceLevels, type LevelOptions, type PriceLevels } from './report/levels.js';
export { assembleReport, type ReportParts } from './report/assemble.js';
export { validateSeries, validateMacroSeries, validateBar } from './utils/validation.js';
