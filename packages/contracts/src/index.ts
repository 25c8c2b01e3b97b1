/**
 * @fileoverview Main entry point for @xau-signal/contracts package.
 *
 * Exports all types, classes, and utilities shared by the signal engine, its
 * data providers and the application shell.
 *
 * @module @xau-signal/contracts
 */

// Timeframes
export {
  Timeframe,
  timeframeToMs,
} from './timeframes.js';

// Market data types
export type {
  Bar,
  TimeframeSeries,
  MacroPoint,
  MacroSeries,
  NewsImpact,
  NewsEvent,
  MarketSnapshot,
  Reading,
} from './market.js';

export { determined, undetermined, readingOr } from './market.js';

// Provider contract
export type { SnapshotRequest, SeriesWindow, SeriesProvider } from './provider.js';

// Signal output types
export type {
  TrendDirection,
  Bias,
  Signal,
  Ternary,
  VsaLabel,
  LockReason,
  SessionName,
  ForecastLabel,
  FactorSet,
  IndicatorReadings,
  ScoreResult,
  LockState,
  SessionLock,
  SignalReport,
} from './signal.js';

export {
  FORECAST_LABELS,
  isActionable,
  signalDirection,
  trendSign,
  toTernary,
} from './signal.js';

// Error classes and guards
export {
  SignalEngineError,
  MisalignedSeriesError,
  DataUnavailableError,
  ConfigurationError,
  isSignalEngineError,
  isMisalignedSeriesError,
  isDataUnavailableError,
  isConfigurationError,
} from './errors.js';
