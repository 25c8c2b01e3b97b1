export { DEFAULT_WEIGHTS, type FactorWeights } from './weights.js';
export { netDirectional, biasFromNet, scoreFactors } from './scorer.js';
export { mapSignal, signalProbabilities, type SignalThresholds } from './signal-mapping.js';
