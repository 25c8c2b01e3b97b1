export {
  simpleMovingAverage,
  exponentialMovingAverage,
  movingAverage,
  type MovingAverageKind,
} from './moving-average.js';
export { trendDirection, prevailingTrend, type TrendOptions } from './trend.js';
export { averageTrueRange } from './atr.js';
export { relativeStrength, momentumSign, type MomentumOptions } from './rsi.js';
export {
  classifyVolumeSpread,
  vsaFactor,
  type VsaOptions,
  type VsaClassification,
} from './vsa.js';
